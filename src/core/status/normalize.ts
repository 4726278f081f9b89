// CHANGE: Status table row normalization (id coercion, status rules)
// WHY: Spreadsheet statuses are free text; earlier rules shadow later ones ("incomplete, planned" is INCOMPLETE)
// PURITY: CORE
// FORMAT THEOREM: ∀s ∈ normalizeStatus(String): normalizeStatus(s) = s
// INVARIANT: Rules evaluated in fixed priority order; first match wins
// COMPLEXITY: O(r·k) per status where r = |rules|, k = |text|

import { match, P } from "ts-pattern";

import type { StatusText, SyscallSeed, SyscallStatus } from "../models.js";
import type { CellValue, RawRow } from "../types/index.js";

/**
 * Column layout of the status table.
 */
export const SHEET_COLUMNS = {
	id: 0,
	name: 1,
	status: 2,
} as const;

/**
 * Sentinel id for rows whose id cell is not an integer.
 */
export const UNKNOWN_SYSCALL_ID = -1;

export interface StatusRule {
	readonly test: (text: string) => boolean;
	readonly status: SyscallStatus;
}

const contains =
	(keyword: string) =>
	(text: string): boolean =>
		text.includes(keyword);

/**
 * Ordered normalization rules. Order matters: "broken, in progress" is
 * IN_PROGRESS, not BROKEN.
 */
export const STATUS_RULES: readonly StatusRule[] = [
	{ test: (text) => text.length === 0, status: "NOT_IMPL" },
	{ test: contains("incomplete"), status: "INCOMPLETE" },
	{ test: contains("registration missing"), status: "REG_MISS" },
	{ test: contains("stubbed"), status: "STUBBED" },
	{ test: contains("planned"), status: "PLANNED" },
	{ test: contains("progress"), status: "IN_PROGRESS" },
	{ test: contains("broken"), status: "BROKEN" },
	{ test: contains("okay"), status: "OKAY" },
];

/**
 * Maps free-text status to a SyscallStatus, or returns the text unchanged
 * when no rule matches.
 *
 * @pure true
 * @invariant matching is case-sensitive
 *
 * @example
 * ```ts
 * normalizeStatus("okay, fully supported"); // "OKAY"
 * normalizeStatus("");                      // "NOT_IMPL"
 * normalizeStatus("Works");                 // "Works"
 * ```
 */
export function normalizeStatus(text: string): StatusText {
	const rule = STATUS_RULES.find((candidate) => candidate.test(text));
	return rule === undefined ? text : rule.status;
}

const INTEGER_TEXT = /^\s*[+-]?\d+\s*$/u;

/**
 * Coerces the id cell to an integer; never fails.
 *
 * @pure true
 * @postcondition result ∈ ℤ
 */
export function parseSyscallId(cell: CellValue): number {
	return match(cell)
		.with(P.number, (n) =>
			Number.isFinite(n) ? Math.trunc(n) : UNKNOWN_SYSCALL_ID,
		)
		.with(P.string, (text) =>
			INTEGER_TEXT.test(text)
				? Number.parseInt(text, 10)
				: UNKNOWN_SYSCALL_ID,
		)
		.with(P.boolean, (flag) => (flag ? 1 : 0))
		.otherwise(() => UNKNOWN_SYSCALL_ID);
}

/**
 * Reads a cell as text. Blank cells read as "".
 *
 * @pure true
 */
export function cellText(cell: CellValue): string {
	return match(cell)
		.with(P.nullish, () => "")
		.with(P.instanceOf(Date), (date) => date.toISOString())
		.otherwise((value) => String(value));
}

/**
 * @pure true
 * @complexity O(k) where k = |status text|
 */
export function toSyscallSeed(row: RawRow): SyscallSeed {
	return {
		id: parseSyscallId(row[SHEET_COLUMNS.id]),
		name: cellText(row[SHEET_COLUMNS.name]),
		status: normalizeStatus(cellText(row[SHEET_COLUMNS.status])),
	};
}

/**
 * Converts all data rows of the status table; row 0 is the header.
 *
 * @pure true
 * @postcondition result.length = max(0, rows.length - 1)
 */
export function loadSyscallSeeds(
	rows: readonly RawRow[],
): readonly SyscallSeed[] {
	return rows.slice(1).map(toSyscallSeed);
}
