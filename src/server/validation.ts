import type { Context } from "hono";
import * as v from "valibot";

import { RequestValidationError } from "./errors";

const toValidationError = (issues: [v.BaseIssue<unknown>, ...v.BaseIssue<unknown>[]]) => {
  const [issue] = issues;
  const field = issue.path?.map((item) => String(item.key)).join(".");
  return new RequestValidationError(field ? `${field}: ${issue.message}` : issue.message, field);
};

export const parseInput = <TSchema extends v.GenericSchema>(
  schema: TSchema,
  input: unknown,
): v.InferOutput<TSchema> => {
  const result = v.safeParse(schema, input);
  if (!result.success) {
    throw toValidationError(result.issues);
  }
  return result.output;
};

/**
 * Reads and validates the JSON body; throws RequestValidationError.
 */
export const readJson = async <TSchema extends v.GenericSchema>(
  c: Context,
  schema: TSchema,
): Promise<v.InferOutput<TSchema>> => {
  let body: unknown;
  try {
    body = await c.req.json();
  } catch (error) {
    throw new RequestValidationError(
      `Request body must be JSON: ${error instanceof Error ? error.message : String(error)}`,
    );
  }
  return parseInput(schema, body);
};
