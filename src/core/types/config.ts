// CHANGE: Configuration and CLI option types for the cruncher
// PURITY: CORE
// INVARIANT: Types only, no runtime code

/**
 * Command-line options.
 *
 * @property printApps Print the per-application CSV report
 * @property printSyscalls Print the per-syscall CSV report
 * @property verbose Write progress lines to stderr
 * @property help Print usage and stop before loading anything
 */
export interface CLIOptions {
	readonly printApps: boolean;
	readonly printSyscalls: boolean;
	readonly verbose: boolean;
	readonly help: boolean;
}

/**
 * Sheet selector: zero-based index or sheet name.
 */
export type SheetSelector = number | string;

/**
 * Input locations, after defaults and syscall-cruncher.config.json are merged.
 *
 * @invariant sheetPath and applicationsDir are absolute
 */
export interface CruncherConfig {
	readonly sheetPath: string;
	readonly sheet: SheetSelector;
	readonly applicationsDir: string;
}
