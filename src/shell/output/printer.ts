// CHANGE: Console output for CSV reports and progress lines
// PURITY: SHELL
// EFFECT: Effect<void>
// INVARIANT: CSV goes to stdout only; progress and diagnostics go to stderr
// COMPLEXITY: O(l) where l = printed lines

import { Effect } from "effect";

import type { AggregationSnapshot } from "../../core/models.js";
import {
	formatApplicationReport,
	formatSyscallReport,
} from "../../core/report/csv.js";
import type { CLIOptions } from "../../core/types/index.js";

/**
 * @pure false - writes to stdout
 */
export function printLines(lines: readonly string[]): Effect.Effect<void> {
	return Effect.sync(() => {
		for (const line of lines) {
			console.log(line);
		}
	});
}

/**
 * Prints the selected reports, application report first.
 *
 * @pure false - writes to stdout
 * @invariant Neither flag set ⇒ prints nothing
 */
export function printReports(
	snapshot: AggregationSnapshot,
	options: Pick<CLIOptions, "printApps" | "printSyscalls">,
): Effect.Effect<void> {
	return Effect.gen(function* () {
		if (options.printApps) {
			yield* printLines(formatApplicationReport(snapshot));
		}
		if (options.printSyscalls) {
			yield* printLines(formatSyscallReport(snapshot));
		}
	});
}

/**
 * Progress reporter bound to the verbose flag.
 *
 * @pure false - writes to stderr when enabled
 */
export function createProgressReporter(
	verbose: boolean,
): (message: string) => Effect.Effect<void> {
	return (message) =>
		verbose ? Effect.sync(() => console.error(message)) : Effect.void;
}
