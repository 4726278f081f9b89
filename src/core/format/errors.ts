// CHANGE: Single-line, human-readable rendering of AppError values
// PURITY: CORE
// INVARIANT: Exhaustive over AppError tags; output has no trailing newline
// COMPLEXITY: O(1)

import { match } from "ts-pattern";

import type { AppError } from "../errors.js";

const withPath = (detail: string, path: string | undefined): string =>
	path === undefined ? detail : `${detail} (${path})`;

/**
 * @pure true
 *
 * @example
 * ```ts
 * formatAppError(new UsageError({ argument: "--bogus" }));
 * // "unrecognized argument: --bogus"
 * ```
 */
export function formatAppError(error: AppError): string {
	return match(error)
		.with({ _tag: "ParseError" }, (e) =>
			withPath(`Failed to parse ${e.entity}: ${e.detail}`, e.path),
		)
		.with({ _tag: "FS" }, (e) => withPath(e.detail, e.path))
		.with(
			{ _tag: "ConfigError" },
			(e) => `Invalid configuration ${e.path}: ${e.detail}`,
		)
		.with(
			{ _tag: "UnknownStatus" },
			(e) =>
				`Syscall ${e.syscall} used by ${e.application} has unrecognized status ${JSON.stringify(e.status)}`,
		)
		.with({ _tag: "UsageError" }, (e) => `unrecognized argument: ${e.argument}`)
		.exhaustive();
}
