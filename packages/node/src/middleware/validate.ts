/**
 * JSON body parsing for the wallet routes.
 *
 * Reads the raw body, parses it and checks it against a Zod schema;
 * the typed result is exposed to the handler as `validatedBody`.
 *
 * Every failure is a 400 VALIDATION_ERROR whose message names the
 * offending fields in one line, e.g.
 * "Invalid request body: amount is required; to_public_key must be a string".
 * The same problems are listed under `details.fields`.
 */

import type { Context, MiddlewareHandler } from "hono";
import type { ZodError, ZodType, ZodTypeDef } from "zod";
import type { ValidatedEnv } from "../types/api-contract.js";
import { createErrorEnvelope } from "../types/error.js";

export interface FieldProblem {
  /** Dotted path into the body; "body" for the body itself */
  readonly field: string;
  readonly problem: string;
}

export function validateBody<T>(
  schema: ZodType<T, ZodTypeDef, unknown>,
): MiddlewareHandler<ValidatedEnv<T>> {
  return async (c, next) => {
    const raw = await c.req.text();
    if (raw.trim() === "") {
      return reject(c, [{ field: "body", problem: "is required" }]);
    }

    let body: unknown;
    try {
      body = JSON.parse(raw);
    } catch {
      return reject(c, [{ field: "body", problem: "is not valid JSON" }]);
    }

    const result = schema.safeParse(body);
    if (!result.success) {
      return reject(c, fieldProblems(result.error));
    }

    c.set("validatedBody", result.data);
    return next();
  };
}

function reject(c: Context, fields: readonly FieldProblem[]): Response {
  const summary = fields.map((f) => `${f.field} ${f.problem}`).join("; ");
  return c.json(
    createErrorEnvelope("VALIDATION_ERROR", `Invalid request body: ${summary}`, { fields }),
    400,
  );
}

function fieldProblems(error: ZodError): readonly FieldProblem[] {
  return error.issues.map((issue) => ({
    field: issue.path.length > 0 ? issue.path.join(".") : "body",
    problem: issue.message,
  }));
}
