// CHANGE: Application layer orchestration: load → aggregate → print
// WHY: Output is all-or-nothing; a failed input must not leave a half-printed CSV
// PURITY: APP (no process.exit; composes CORE with SHELL)
// EFFECT: Effect<ExitCode, never>
// INVARIANT: Reports are printed only after every input loaded and aggregated
// COMPLEXITY: O(r + Σ|symbols|) where r = status table rows

import { Effect, Either } from "effect";

import { aggregate } from "../core/aggregate/aggregator.js";
import { type AppError, ParseError } from "../core/errors.js";
import { formatAppError } from "../core/format/errors.js";
import type { AggregationSnapshot, ExitCode } from "../core/models.js";
import { decodeApplicationDocument } from "../core/report/document.js";
import { loadSyscallSeeds } from "../core/status/normalize.js";
import type { CLIOptions, CruncherConfig } from "../core/types/index.js";
import { walkApplicationReports } from "../shell/applications/walker.js";
import { USAGE } from "../shell/config/cli.js";
import { loadCruncherConfig } from "../shell/config/loader.js";
import {
	createProgressReporter,
	printLines,
	printReports,
} from "../shell/output/printer.js";
import { readSpreadsheetRows } from "../shell/spreadsheet/reader.js";

type Progress = (message: string) => Effect.Effect<void>;

/**
 * Loads both inputs and joins them.
 *
 * @pure false (reads the filesystem)
 * @effect Effect<AggregationSnapshot, AppError>
 * @invariant First failure aborts; no partial snapshot is returned
 */
export function crunch(
	config: CruncherConfig,
	progress: Progress = () => Effect.void,
): Effect.Effect<AggregationSnapshot, AppError> {
	return Effect.gen(function* () {
		yield* progress(`📄 Loading syscall status table: ${config.sheetPath}`);
		const rows = yield* readSpreadsheetRows(config.sheetPath, config.sheet);
		const seeds = loadSyscallSeeds(rows);
		yield* progress(`   ↳ ${seeds.length} syscalls`);

		yield* progress(`📂 Reading application reports: ${config.applicationsDir}`);
		const files = yield* walkApplicationReports(config.applicationsDir);
		const usages = yield* Effect.forEach(files, (file) =>
			Effect.gen(function* () {
				const decoded = decodeApplicationDocument(file.name, file.document);
				if (Either.isLeft(decoded)) {
					return yield* Effect.fail(
						new ParseError({
							entity: decoded.left.entity,
							detail: decoded.left.detail,
							path: file.path,
						}),
					);
				}
				const usage = decoded.right;
				yield* progress(`   ↳ ${usage.name}: ${usage.symbols.size} syscalls`);
				return usage;
			}),
		);

		const aggregated = aggregate(seeds, usages);
		if (Either.isLeft(aggregated)) {
			return yield* Effect.fail(aggregated.left);
		}
		const snapshot = aggregated.right;
		yield* progress(
			`✅ ${snapshot.applications.size} applications, ${snapshot.undefinedSyscalls.size} undefined syscalls`,
		);
		return snapshot;
	});
}

/**
 * Orchestrates one run and returns ExitCode as value (no process.exit).
 *
 * @param options Parsed CLI options
 * @param config Input locations; loaded from the working directory when omitted
 * @returns Effect<ExitCode, never> - errors are reported on stderr
 *
 * @pure false (coordinates effects), but does not terminate the process
 * @postcondition success → 0; AppError → 1
 */
export function runCruncher(
	options: CLIOptions,
	config?: CruncherConfig,
): Effect.Effect<ExitCode, never> {
	if (options.help) {
		return printLines(USAGE).pipe(Effect.map((): ExitCode => 0));
	}
	const progress = createProgressReporter(options.verbose);
	return Effect.gen(function* () {
		const resolved = config ?? (yield* loadCruncherConfig());
		const snapshot = yield* crunch(resolved, progress);
		yield* printReports(snapshot, options);
		return 0 as const;
	}).pipe(
		Effect.catchAll((error) =>
			Effect.sync((): ExitCode => {
				console.error(`❌ ${formatAppError(error)}`);
				return 1;
			}),
		),
	);
}
