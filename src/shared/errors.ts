/**
 * CredentialError hierarchy — structured error classification.
 *
 * Every error has a category (retryable, non-retryable, fatal). Nothing in
 * this library is retryable: callers treat a failure as fatal to the current
 * connection attempt.
 */

/** Error severity categories. */
export const ErrorCategory = {
	Retryable: "retryable",
	NonRetryable: "non_retryable",
	Fatal: "fatal",
} as const;

export type ErrorCategory = (typeof ErrorCategory)[keyof typeof ErrorCategory];

/** Options for constructing CredentialError subclasses with optional cause chain. */
interface CredentialErrorOptions {
	readonly cause?: unknown;
}

/** Base error class for all credential operations. */
export class CredentialError extends Error {
	readonly category: ErrorCategory;
	readonly code: string;
	readonly context: Record<string, unknown>;
	readonly hint: string | undefined;

	constructor(
		message: string,
		code: string,
		category: ErrorCategory,
		context: Record<string, unknown> = {},
		hint?: string,
	) {
		super(message);
		this.name = "CredentialError";
		this.category = category;
		this.code = code;
		this.context = context;
		this.hint = hint;
	}

	get isRetryable(): boolean {
		return this.category === ErrorCategory.Retryable;
	}

	toJSON(): Record<string, unknown> {
		return {
			name: this.name,
			message: this.message,
			code: this.code,
			category: this.category,
			...(this.hint !== undefined && { hint: this.hint }),
			retryable: this.isRetryable,
			context: this.context,
		};
	}
}

// ── Specific error types ─────────────────────────────────────────────

/** A required argument was absent or unusable. */
export class InvalidArgumentError extends CredentialError {
	constructor(message: string, context: Record<string, unknown> & CredentialErrorOptions = {}) {
		const { cause, ...rest } = context;
		super(message, "INVALID_ARGUMENT", ErrorCategory.NonRetryable, rest);
		this.name = "InvalidArgumentError";
		if (cause !== undefined) this.cause = cause;
	}
}

/** The operation cannot proceed with the current key material. */
export class InvalidOperationError extends CredentialError {
	constructor(
		message: string,
		context: Record<string, unknown> & CredentialErrorOptions = {},
		hint?: string,
	) {
		const { cause, ...rest } = context;
		super(message, "INVALID_OPERATION", ErrorCategory.NonRetryable, rest, hint);
		this.name = "InvalidOperationError";
		if (cause !== undefined) this.cause = cause;
	}
}

/** Fatal error for invalid or missing configuration. */
export class ConfigError extends CredentialError {
	constructor(message: string, context: Record<string, unknown> & CredentialErrorOptions = {}) {
		const { cause, ...rest } = context;
		super(message, "CONFIG_ERROR", ErrorCategory.Fatal, rest);
		this.name = "ConfigError";
		if (cause !== undefined) this.cause = cause;
	}
}

/** Fatal error for a state the library should never reach. */
export class SystemError extends CredentialError {
	constructor(message: string, context: Record<string, unknown> & CredentialErrorOptions = {}) {
		const { cause, ...rest } = context;
		super(message, "SYSTEM_ERROR", ErrorCategory.Fatal, rest);
		this.name = "SystemError";
		if (cause !== undefined) this.cause = cause;
	}
}

// ── Type guards ──────────────────────────────────────────────────────

/** Type guard for InvalidArgumentError. */
export function isInvalidArgumentError(e: unknown): e is InvalidArgumentError {
	return e instanceof InvalidArgumentError;
}

/** Type guard for InvalidOperationError. */
export function isInvalidOperationError(e: unknown): e is InvalidOperationError {
	return e instanceof InvalidOperationError;
}

/** Type guard for ConfigError. */
export function isConfigError(e: unknown): e is ConfigError {
	return e instanceof ConfigError;
}

/** Type guard for SystemError. */
export function isSystemError(e: unknown): e is SystemError {
	return e instanceof SystemError;
}
