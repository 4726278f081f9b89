// CHANGE: Boolean-flag CLI parsing for report selection
// PURITY: SHELL (reads process.argv only through the default parameter)
// EFFECT: Either<CLIOptions, UsageError>
// REF: POSIX utility syntax guideline 10 ("--" ends options)
// INVARIANT: No flag takes an argument; combined short flags expand left to right;
//            long flags accept unambiguous prefixes
// COMPLEXITY: O(n) where n = |args|

import { Either } from "effect";

import { UsageError } from "../../core/errors.js";
import type { CLIOptions } from "../../core/types/index.js";

type FlagKey = keyof CLIOptions;

const longFlags: Readonly<Partial<Record<string, FlagKey>>> = {
	"--apps": "printApps",
	"--syscalls": "printSyscalls",
	"--verbose": "verbose",
	"--help": "help",
};

const shortFlags: Readonly<Partial<Record<string, FlagKey>>> = {
	a: "printApps",
	s: "printSyscalls",
	v: "verbose",
	h: "help",
};

export const DEFAULT_CLI_OPTIONS: CLIOptions = {
	printApps: false,
	printSyscalls: false,
	verbose: false,
	help: false,
};

export const USAGE = [
	"usage: syscall-cruncher [-h] [-a] [-s] [-v]",
	"",
	"options:",
	"  -h, --help      show this help message and exit",
	"  -a, --apps      Print system call support in applications",
	"  -s, --syscalls  Print system call usage / popularity in apps",
	"  -v, --verbose   Print progress to stderr",
] as const;

/**
 * Long flag named exactly, or by a prefix that matches a single long flag.
 *
 * @pure true
 * @example longFlagOf("--sys") // "printSyscalls"
 */
function longFlagOf(arg: string): FlagKey | undefined {
	const exact = longFlags[arg];
	if (exact !== undefined) return exact;
	const candidates = Object.keys(longFlags).filter((name) =>
		name.startsWith(arg),
	);
	const only = candidates.length === 1 ? candidates[0] : undefined;
	return only === undefined ? undefined : longFlags[only];
}

/**
 * Flags named by one argument, or undefined if any part is unknown.
 *
 * @pure true
 */
function flagsOf(arg: string): readonly FlagKey[] | undefined {
	if (arg.startsWith("--")) {
		const flag = longFlagOf(arg);
		return flag === undefined ? undefined : [flag];
	}
	if (!arg.startsWith("-") || arg.length < 2) {
		return undefined;
	}
	const flags: FlagKey[] = [];
	for (const letter of arg.slice(1)) {
		const flag = shortFlags[letter];
		if (flag === undefined) return undefined;
		flags.push(flag);
	}
	return flags;
}

/**
 * Parses command-line arguments.
 *
 * @param args Arguments after the node binary and script path
 * @returns Options, or the first argument that is not a known flag
 *
 * @invariant `--` ends option parsing; any argument after it is rejected
 * @invariant "" is rejected like any other positional argument
 *
 * @example
 * ```ts
 * // Command: syscall-cruncher -as
 * parseCLIArgs(["-as"]);
 * // Right({ printApps: true, printSyscalls: true, verbose: false, help: false })
 * ```
 */
export function parseCLIArgs(
	args: readonly string[] = process.argv.slice(2),
): Either.Either<CLIOptions, UsageError> {
	let state: CLIOptions = DEFAULT_CLI_OPTIONS;
	let optionsEnded = false;
	for (const arg of args) {
		if (!optionsEnded && arg === "--") {
			optionsEnded = true;
			continue;
		}
		const flags = optionsEnded ? undefined : flagsOf(arg);
		if (flags === undefined) {
			return Either.left(new UsageError({ argument: arg }));
		}
		for (const flag of flags) {
			state = { ...state, [flag]: true };
		}
	}
	return Either.right(state);
}
