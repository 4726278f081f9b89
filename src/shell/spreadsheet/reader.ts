// CHANGE: Spreadsheet access for the syscall status table
// PURITY: SHELL
// EFFECT: Effect<ReadonlyArray<RawRow>, FSError | ParseError>
// REF: SheetJS sheet_to_json with header: 1 (array of arrays)
// INVARIANT: Rows returned in sheet order, header included; blank cells read as ""
// COMPLEXITY: O(r·c) where r = rows, c = used columns

import * as fs from "node:fs";
import { Effect } from "effect";
import { match, P } from "ts-pattern";
import * as XLSX from "xlsx";

import { FSError, ParseError } from "../../core/errors.js";
import type { CellValue, RawRow, SheetSelector } from "../../core/types/index.js";

/**
 * Resolves a sheet selector against the workbook's sheet names.
 *
 * @pure true
 */
export function resolveSheetName(
	sheetNames: readonly string[],
	sheet: SheetSelector,
): string | undefined {
	return match(sheet)
		.with(P.number, (index) => sheetNames[index])
		.with(P.string, (name) => (sheetNames.includes(name) ? name : undefined))
		.exhaustive();
}

function parseWorkbook(
	filePath: string,
	content: Buffer,
): Effect.Effect<XLSX.WorkBook, ParseError> {
	return Effect.try({
		try: () => XLSX.read(content, { type: "buffer" }),
		catch: (error) =>
			new ParseError({
				entity: "spreadsheet",
				path: filePath,
				detail: `Failed to read workbook: ${error instanceof Error ? error.message : String(error)}`,
			}),
	});
}

/**
 * Reads every row of one sheet.
 *
 * @param filePath Workbook path (.xls, .xlsx, .ods, .csv)
 * @param sheet Zero-based sheet index or sheet name
 *
 * @pure false - reads the filesystem
 * @effect Effect<ReadonlyArray<RawRow>, FSError | ParseError>
 */
export function readSpreadsheetRows(
	filePath: string,
	sheet: SheetSelector = 0,
): Effect.Effect<readonly RawRow[], FSError | ParseError> {
	return Effect.gen(function* () {
		const content = yield* Effect.tryPromise({
			try: () => fs.promises.readFile(filePath),
			catch: (error) =>
				new FSError({
					path: filePath,
					detail: `Unable to read spreadsheet: ${error instanceof Error ? error.message : String(error)}`,
				}),
		});
		const workbook = yield* parseWorkbook(filePath, content);

		const sheetName = resolveSheetName(workbook.SheetNames, sheet);
		const worksheet =
			sheetName === undefined ? undefined : workbook.Sheets[sheetName];
		if (worksheet === undefined) {
			return yield* Effect.fail(
				new ParseError({
					entity: "spreadsheet",
					path: filePath,
					detail: `Sheet ${JSON.stringify(sheet)} not found (available: ${workbook.SheetNames.join(", ")})`,
				}),
			);
		}

		return XLSX.utils.sheet_to_json<CellValue[]>(worksheet, {
			header: 1,
			raw: true,
			defval: "",
		});
	});
}
