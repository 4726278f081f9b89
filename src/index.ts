// CHANGE: Public API entry point for library consumers
// PURITY: Re-exports only (meta-module)
// INVARIANT: All exports are either pure functions, typed interfaces or Effect-returning loaders
// COMPLEXITY: O(1) - module resolution only

// ═══════════════════════════════════════════════════════════════════════════════
// MAIN ORCHESTRATOR (Programmatic Entry Point)
// ═══════════════════════════════════════════════════════════════════════════════

/**
 * Runs one crunch and returns the exit code.
 *
 * @example
 * ```typescript
 * import { Effect } from "effect";
 * import { runCruncher } from "syscall-cruncher";
 *
 * const exitCode = await Effect.runPromise(
 *   runCruncher({ printApps: true, printSyscalls: false, verbose: false, help: false }),
 * );
 * ```
 */
export { crunch, runCruncher } from "./app/runCruncher.js";
export { main } from "./main.js";

// ═══════════════════════════════════════════════════════════════════════════════
// CORE TYPES
// ═══════════════════════════════════════════════════════════════════════════════

export type {
	AggregationSnapshot,
	AggregationState,
	ApplicationRecord,
	ApplicationUsage,
	ExitCode,
	StatusBuckets,
	StatusText,
	SyscallRecord,
	SyscallSeed,
	SyscallStatus,
	UndefinedSyscallRecord,
} from "./core/models.js";
export { isSyscallStatus, SYSCALL_STATUSES } from "./core/models.js";
export type {
	CellValue,
	CLIOptions,
	CruncherConfig,
	JSONValue,
	RawRow,
	SheetSelector,
} from "./core/types/index.js";
export {
	type AppError,
	ConfigError,
	FSError,
	ParseError,
	UnknownStatusError,
	UsageError,
} from "./core/errors.js";

// ═══════════════════════════════════════════════════════════════════════════════
// CORE PURE FUNCTIONS
// ═══════════════════════════════════════════════════════════════════════════════

export {
	loadSyscallSeeds,
	normalizeStatus,
	parseSyscallId,
	STATUS_RULES,
	toSyscallSeed,
} from "./core/status/normalize.js";
export {
	collectSymbols,
	decodeApplicationDocument,
	parseApplicationDocument,
} from "./core/report/document.js";
export {
	aggregate,
	createAggregationState,
	ingestApplication,
} from "./core/aggregate/aggregator.js";
export {
	formatApplicationReport,
	formatSyscallReport,
} from "./core/report/csv.js";
export { formatAppError } from "./core/format/errors.js";

// ═══════════════════════════════════════════════════════════════════════════════
// SHELL LOADERS
// ═══════════════════════════════════════════════════════════════════════════════

export { readSpreadsheetRows } from "./shell/spreadsheet/reader.js";
export { walkApplicationReports } from "./shell/applications/walker.js";
export { loadCruncherConfig } from "./shell/config/loader.js";
