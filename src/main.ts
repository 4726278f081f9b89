// CHANGE: Thin APP delegator: parse arguments, then run
// WHY: Usage errors exit 2 before any input is read
// PURITY: APP (no process.exit; only composition)
// INVARIANT: Returns ExitCode as value
// COMPLEXITY: O(1)

import { Effect, Either } from "effect";

import { runCruncher } from "./app/runCruncher.js";
import { formatAppError } from "./core/format/errors.js";
import type { ExitCode } from "./core/models.js";
import { parseCLIArgs, USAGE } from "./shell/config/cli.js";

/**
 * Entry for programmatic usage (without terminating process).
 *
 * @param args Arguments after the node binary and script path
 * @returns Effect<ExitCode, never>; 2 on a usage error
 *
 * @pure false (delegates to app orchestration), but does not call process.exit
 */
export function main(
	args: readonly string[] = process.argv.slice(2),
): Effect.Effect<ExitCode, never> {
	const parsed = parseCLIArgs(args);
	if (Either.isLeft(parsed)) {
		return Effect.sync((): ExitCode => {
			console.error(USAGE[0]);
			console.error(`syscall-cruncher: error: ${formatAppError(parsed.left)}`);
			return 2;
		});
	}
	return runCruncher(parsed.right);
}
