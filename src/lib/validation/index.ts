/**
 * Validation wrapper: thin abstraction over Zod that returns Result<T, SchemaValidationError>.
 *
 * Provider payloads, positions exports and environment values all pass through
 * here. Re-exports `z` so schemas can be declared without a direct zod import.
 */

import { z } from "zod";
import { AlertError, ErrorCategory } from "../../shared/errors.js";
import { err, ok } from "../../shared/result.js";
import type { Result } from "../../shared/result.js";

export { z };

/** A single validation failure with the path to the invalid field and a message. */
export interface ValidationIssue {
	readonly path: readonly (string | number)[];
	readonly message: string;
}

/** Non-retryable error containing one or more schema issues. */
export class SchemaValidationError extends AlertError {
	readonly issues: readonly ValidationIssue[];

	constructor(message: string, issues: readonly ValidationIssue[]) {
		super(message, "SCHEMA_INVALID", ErrorCategory.NonRetryable, { issues });
		this.name = "SchemaValidationError";
		this.issues = issues;
	}

	/** First issue rendered as `path: message`, for log lines. */
	describe(): string {
		const first = this.issues[0];
		if (!first) return this.message;
		return first.path.length > 0 ? `${first.path.join(".")}: ${first.message}` : first.message;
	}
}

/** Validate data against a Zod schema, returning a Result instead of throwing. */
export function validate<S extends z.ZodTypeAny>(
	schema: S,
	data: unknown,
): Result<z.output<S>, SchemaValidationError> {
	const result = schema.safeParse(data);
	if (result.success) {
		return ok(result.data);
	}
	const issues: ValidationIssue[] = result.error.issues.map((i) => ({
		path: i.path.filter((p): p is string | number => typeof p !== "symbol"),
		message: i.message,
	}));
	return err(new SchemaValidationError("Validation failed", issues));
}
