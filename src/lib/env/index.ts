export { getEnv, parseEnv, type Env } from "./env";
