import * as v from "valibot";

import { type Env, envSchema } from "./schema";

const describeIssue = (issue: v.BaseIssue<unknown>): string => {
  const key = issue.path?.map((item) => String(item.key)).join(".") ?? "(root)";
  return `  - ${key}: ${issue.message}`;
};

/**
 * Validates the environment. Prints every problem and exits on failure, so a
 * misconfigured deployment stops before touching the database or the sheet.
 */
export const parseEnv = (source: Record<string, string | undefined> = process.env): Env => {
  const result = v.safeParse(envSchema, source);
  if (result.success) {
    return result.output;
  }
  console.error("Environment variable validation failed:");
  for (const issue of result.issues) {
    console.error(describeIssue(issue));
  }
  return process.exit(1);
};

// Parsed on first access so tests can shape process.env beforehand
let cachedEnv: Env | undefined;

export const getEnv = (): Env => {
  cachedEnv ??= parseEnv();
  return cachedEnv;
};

export type { Env } from "./schema";
