// CHANGE: Recursive walk over the application report directory
// PURITY: SHELL
// EFFECT: Effect<ReadonlyArray<ApplicationReportFile>, FSError | ParseError>
// WHY: Reports may be symlinks into a shared store; linked directories are not descended
// INVARIANT: Files sorted lexicographically per directory and visited before subdirectories;
//            subdirectories in readdir order; one file read at a time
// COMPLEXITY: O(n log n) where n = entries per directory

import * as fs from "node:fs";
import * as path from "node:path";
import { Effect } from "effect";

import { FSError, ParseError } from "../../core/errors.js";
import { REPORT_SUFFIX } from "../../core/report/document.js";
import type { JSONValue } from "../../core/types/index.js";

/**
 * A parsed report together with the application it describes.
 */
export interface ApplicationReportFile {
	readonly name: string;
	readonly path: string;
	readonly document: JSONValue;
}

/**
 * Application name derived from a report file name.
 *
 * @pure true
 * @precondition fileName ends with REPORT_SUFFIX
 */
export function applicationNameOf(fileName: string): string {
	return fileName.slice(0, fileName.length - REPORT_SUFFIX.length);
}

/**
 * Lexical (code unit) comparison, independent of locale.
 *
 * @pure true
 */
export function compareLexical(left: string, right: string): number {
	if (left < right) return -1;
	if (left > right) return 1;
	return 0;
}

/**
 * Reads and parses one report.
 *
 * @pure false - reads the filesystem
 * @effect Effect<ApplicationReportFile, FSError | ParseError>
 */
export function readApplicationReport(
	filePath: string,
): Effect.Effect<ApplicationReportFile, FSError | ParseError> {
	return Effect.gen(function* () {
		const raw = yield* Effect.tryPromise({
			try: () => fs.promises.readFile(filePath, "utf8"),
			catch: (error) =>
				new FSError({
					path: filePath,
					detail: `Unable to read report: ${error instanceof Error ? error.message : String(error)}`,
				}),
		});
		const document = yield* Effect.try({
			try: () => JSON.parse(raw) as JSONValue,
			catch: (error) =>
				new ParseError({
					entity: "application-report",
					path: filePath,
					detail: `Invalid JSON: ${error instanceof Error ? error.message : String(error)}`,
				}),
		});
		return {
			name: applicationNameOf(path.basename(filePath)),
			path: filePath,
			document,
		};
	});
}

function listDirectory(
	directory: string,
): Effect.Effect<readonly fs.Dirent[], FSError> {
	return Effect.tryPromise({
		try: () => fs.promises.readdir(directory, { withFileTypes: true }),
		catch: (error) =>
			new FSError({
				path: directory,
				detail: `Unable to list directory: ${error instanceof Error ? error.message : String(error)}`,
			}),
	});
}

/**
 * Whether an entry is a report to read: a `*.json` regular file, or a
 * `*.json` link that does not resolve to a directory.
 *
 * @pure false - stats link targets
 * @invariant links to directories are never followed
 */
function isReportEntry(
	directory: string,
	entry: fs.Dirent,
): Effect.Effect<boolean> {
	if (!entry.name.endsWith(REPORT_SUFFIX)) return Effect.succeed(false);
	if (entry.isFile()) return Effect.succeed(true);
	if (!entry.isSymbolicLink()) return Effect.succeed(false);
	return Effect.tryPromise(() =>
		fs.promises.stat(path.join(directory, entry.name)),
	).pipe(
		Effect.map((stats) => !stats.isDirectory()),
		// Dangling links stay reports; reading them fails with FSError
		Effect.orElseSucceed(() => true),
	);
}

/**
 * Visits `directory` and its subdirectories, reading every `*.json` file.
 *
 * @param directory Root of the report tree
 * @returns Reports in visit order
 *
 * @pure false - reads the filesystem
 * @effect Effect<ReadonlyArray<ApplicationReportFile>, FSError | ParseError>
 * @invariant first failure aborts the walk
 */
export function walkApplicationReports(
	directory: string,
): Effect.Effect<readonly ApplicationReportFile[], FSError | ParseError> {
	return Effect.gen(function* () {
		const entries = yield* listDirectory(directory);

		const reportEntries = yield* Effect.filter(entries, (entry) =>
			isReportEntry(directory, entry),
		);
		const reportFiles = reportEntries
			.map((entry) => entry.name)
			.sort(compareLexical);
		const subdirectories = entries.filter((entry) => entry.isDirectory());

		const reports = yield* Effect.forEach(reportFiles, (fileName) =>
			readApplicationReport(path.join(directory, fileName)),
		);
		const nested = yield* Effect.forEach(subdirectories, (entry) =>
			walkApplicationReports(path.join(directory, entry.name)),
		);

		return [...reports, ...nested.flat()];
	});
}
