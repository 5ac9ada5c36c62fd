/**
 * Validation wrapper — thin abstraction over Zod that returns Result<T, ValidationError>.
 *
 * Re-exports `z` so schemas are built from a single import path.
 */

import { z } from "zod";
import { CredentialError, ErrorCategory } from "../../shared/errors.js";
import { type Result, err, ok } from "../../shared/result.js";

export { z };

/** A single validation failure with the path to the invalid field and a message. */
export interface ValidationIssue {
	readonly path: readonly (string | number)[];
	readonly message: string;
}

/** Non-retryable error containing one or more validation issues. */
export class ValidationError extends CredentialError {
	readonly issues: readonly ValidationIssue[];

	constructor(message: string, issues: readonly ValidationIssue[]) {
		super(message, "VALIDATION_FAILED", ErrorCategory.NonRetryable, { issueCount: issues.length });
		this.name = "ValidationError";
		this.issues = issues;
	}
}

/** Type guard for ValidationError. */
export function isValidationError(e: unknown): e is ValidationError {
	return e instanceof ValidationError;
}

/** Builds a ValidationError whose message lists every issue message. */
export function validationError(issues: readonly ValidationIssue[]): ValidationError {
	const summary = issues.map((i) => i.message).join("; ");
	return new ValidationError(`Validation failed: ${summary}`, issues);
}

/** Validate data against a Zod schema, returning a Result instead of throwing. */
export function validate<T>(schema: z.ZodType<T>, data: unknown): Result<T, ValidationError> {
	const result = schema.safeParse(data);
	if (result.success) {
		return ok(result.data);
	}
	const issues: ValidationIssue[] = result.error.issues.map((i) => ({
		path: i.path.filter((p): p is string | number => typeof p !== "symbol"),
		message: i.message,
	}));
	return err(validationError(issues));
}

const BASE64_RE = /^(?:[A-Za-z0-9+/]{4})*(?:[A-Za-z0-9+/]{2}==|[A-Za-z0-9+/]{3}=)?$/;

/** True for a non-empty, padded, standard-alphabet base64 string. */
export function isBase64(value: string): boolean {
	return value.length > 0 && BASE64_RE.test(value);
}
