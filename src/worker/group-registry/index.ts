export { createGroupRegistry, type GroupRegistry, type GroupRegistryDeps } from "./registry";
