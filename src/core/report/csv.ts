// CHANGE: Pure CSV rendering of the aggregation snapshot
// WHY: Column order follows the historical report header, not SYSCALL_STATUSES
// PURITY: CORE
// FORMAT THEOREM: formatApplicationReport(s).length = 1 + |s.applications|
// FORMAT THEOREM: formatSyscallReport(s).length = 1 + |s.syscalls| + |s.undefinedSyscalls|
// INVARIANT: Fields joined by "," without quoting; rows follow map insertion order
// COMPLEXITY: O(a + s) where a = applications, s = syscalls

import type {
	AggregationSnapshot,
	ApplicationRecord,
	SyscallStatus,
} from "../models.js";

/**
 * Count columns of the application report, in print order.
 */
export const APPLICATION_COUNT_COLUMNS: ReadonlyArray<{
	readonly header: string;
	readonly status: SyscallStatus;
}> = [
	{ header: "okay", status: "OKAY" },
	{ header: "not_impl", status: "NOT_IMPL" },
	{ header: "reg_miss", status: "REG_MISS" },
	{ header: "incomplete", status: "INCOMPLETE" },
	{ header: "stubbed", status: "STUBBED" },
	{ header: "planned", status: "PLANNED" },
	{ header: "broken", status: "BROKEN" },
	{ header: "in_progress", status: "IN_PROGRESS" },
	{ header: "absent", status: "ABSENT" },
];

export const SYSCALL_REPORT_HEADER = ["syscall", "status", "num_apps"] as const;

/**
 * Status label printed for symbols missing from the status table.
 */
export const UNDEFINED_SYSCALL_STATUS: SyscallStatus = "ABSENT";

export function csvLine(fields: ReadonlyArray<string | number>): string {
	return fields.join(",");
}

export interface ApplicationCounts {
	readonly counts: readonly number[];
	readonly total: number;
}

/**
 * Bucket sizes in column order and their sum.
 *
 * @pure true
 * @postcondition total = Σ counts
 */
export function countApplication(record: ApplicationRecord): ApplicationCounts {
	const counts = APPLICATION_COUNT_COLUMNS.map(
		(column) => record.buckets[column.status].length,
	);
	const total = counts.reduce((sum, count) => sum + count, 0);
	return { counts, total };
}

/**
 * @pure true
 *
 * @example
 * ```ts
 * formatApplicationReport(snapshot);
 * // ["app,total,okay,not_impl,...,absent", "app1,1,0,1,0,0,0,0,0,0,0"]
 * ```
 */
export function formatApplicationReport(
	snapshot: AggregationSnapshot,
): readonly string[] {
	const header = csvLine([
		"app",
		"total",
		...APPLICATION_COUNT_COLUMNS.map((column) => column.header),
	]);
	const rows = [...snapshot.applications.values()].map((record) => {
		const { counts, total } = countApplication(record);
		return csvLine([record.name, total, ...counts]);
	});
	return [header, ...rows];
}

/**
 * @pure true
 */
export function formatSyscallReport(
	snapshot: AggregationSnapshot,
): readonly string[] {
	const known = [...snapshot.syscalls.values()].map((record) =>
		csvLine([record.name, record.status, record.apps.length]),
	);
	const missing = [...snapshot.undefinedSyscalls.values()].map((record) =>
		csvLine([record.name, UNDEFINED_SYSCALL_STATUS, record.apps.length]),
	);
	return [csvLine(SYSCALL_REPORT_HEADER), ...known, ...missing];
}
