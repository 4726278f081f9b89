// CHANGE: Functional Core domain models for the status/usage join
// PURITY: CORE
// INVARIANT: CORE defines no effects
// COMPLEXITY: O(1)

/**
 * Exit code for the cruncher process.
 *
 * @remarks
 * - 0: success
 * - 1: load, parse or aggregation failure
 * - 2: usage error
 */
export type ExitCode = 0 | 1 | 2;

/**
 * Implementation states of a system call, in canonical bucket order.
 */
export const SYSCALL_STATUSES = [
	"OKAY",
	"ABSENT",
	"NOT_IMPL",
	"INCOMPLETE",
	"REG_MISS",
	"STUBBED",
	"BROKEN",
	"IN_PROGRESS",
	"PLANNED",
] as const;

export type SyscallStatus = (typeof SYSCALL_STATUSES)[number];

/**
 * Normalized status column: a known status, or the raw text when no
 * normalization rule matched.
 */
export type StatusText = SyscallStatus | (string & Record<never, never>);

/**
 * @pure true
 * @complexity O(1)
 */
export function isSyscallStatus(text: string): text is SyscallStatus {
	return (SYSCALL_STATUSES as readonly string[]).includes(text);
}

/**
 * One data row of the status table after normalization.
 */
export interface SyscallSeed {
	readonly id: number;
	readonly name: string;
	readonly status: StatusText;
}

/**
 * Status table entry plus the applications that use it (load order).
 */
export interface SyscallRecord extends SyscallSeed {
	readonly apps: string[];
}

/**
 * Symbol referenced by an application but missing from the status table.
 */
export interface UndefinedSyscallRecord {
	readonly name: string;
	readonly apps: string[];
}

export type StatusBuckets = Readonly<Record<SyscallStatus, readonly string[]>>;

export interface ApplicationRecord {
	readonly name: string;
	readonly buckets: StatusBuckets;
}

/**
 * Application name with the unique syscall symbols it references.
 *
 * @invariant symbols has no duplicates; static section symbols come first
 */
export interface ApplicationUsage {
	readonly name: string;
	readonly symbols: ReadonlySet<string>;
}

/**
 * Mutable mappings owned by one aggregation run.
 *
 * @invariant Map iteration order is insertion order of the first key
 */
export interface AggregationState {
	readonly syscalls: Map<string, SyscallRecord>;
	readonly applications: Map<string, ApplicationRecord>;
	readonly undefinedSyscalls: Map<string, UndefinedSyscallRecord>;
}

/**
 * Read-only view handed to the printers.
 */
export interface AggregationSnapshot {
	readonly syscalls: ReadonlyMap<string, Readonly<SyscallRecord>>;
	readonly applications: ReadonlyMap<string, ApplicationRecord>;
	readonly undefinedSyscalls: ReadonlyMap<
		string,
		Readonly<UndefinedSyscallRecord>
	>;
}
