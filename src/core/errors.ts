// CHANGE: Typed domain error ADT for the cruncher using Effect.Data
// PURITY: CORE
// INVARIANT: Errors are values (no throw), discriminated by `_tag`
// COMPLEXITY: O(1)

import { Data } from "effect";

/**
 * Input could not be parsed (JSON report, workbook, document shape).
 *
 * @pure true (Data class)
 * @invariant detail.length > 0
 */
export class ParseError extends Data.TaggedError("ParseError")<{
	readonly entity: "application-report" | "spreadsheet";
	readonly detail: string;
	readonly path?: string;
}> {}

/**
 * Filesystem operation error
 *
 * @pure true (Data class)
 * @invariant detail.length > 0
 */
export class FSError extends Data.TaggedError("FS")<{
	readonly detail: string;
	readonly path?: string;
}> {}

/**
 * Configuration file exists but cannot be used.
 *
 * @pure true (Data class)
 */
export class ConfigError extends Data.TaggedError("ConfigError")<{
	readonly path: string;
	readonly detail: string;
}> {}

/**
 * A syscall whose status text is not one of the nine buckets was referenced
 * by an application, so it cannot be counted.
 *
 * @pure true (Data class)
 */
export class UnknownStatusError extends Data.TaggedError("UnknownStatus")<{
	readonly syscall: string;
	readonly status: string;
	readonly application: string;
}> {}

/**
 * Unrecognized command-line argument.
 *
 * @pure true (Data class)
 */
export class UsageError extends Data.TaggedError("UsageError")<{
	readonly argument: string;
}> {}

/**
 * Union type of all application errors for Effect signatures
 *
 * @pure true
 * @invariant All errors extend Data.TaggedError
 */
export type AppError =
	| ParseError
	| FSError
	| ConfigError
	| UnknownStatusError
	| UsageError;
