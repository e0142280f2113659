/**
 * Validation Middleware
 *
 * Validates action input against the action's Zod schema
 * BEFORE the action executes. If validation fails, the action
 * is never called and a structured error is returned.
 */

import type { ActionDefinition, Resource } from "@issuedesk/contracts";

/** One rejected field, keyed by its dotted path in the payload */
export interface FieldError {
  field: string;
  message: string;
  code: string;
}

/**
 * Validates input against the action's inputSchema.
 * Returns the parsed (and possibly transformed) input on success.
 * Throws a ValidationError on failure.
 */
export function validateInput<TInput, TOutput, TTarget extends Resource | null>(
  action: ActionDefinition<TInput, TOutput, TTarget>,
  input: unknown
): TInput {
  const result = action.inputSchema.safeParse(input);

  if (!result.success) {
    const fieldErrors = result.error.issues.map((issue) => ({
      field: issue.path.join("."),
      message: issue.message,
      code: issue.code,
    }));

    throw new ValidationError(
      `Validation failed for action "${action.id}"`,
      fieldErrors
    );
  }

  return result.data;
}

/**
 * Structured validation error.
 * Contains per-field error details for API clients.
 */
export class ValidationError extends Error {
  public readonly fieldErrors: FieldError[];

  constructor(message: string, fieldErrors: FieldError[]) {
    super(message);
    this.name = "ValidationError";
    this.fieldErrors = fieldErrors;
  }
}
