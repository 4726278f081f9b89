// CHANGE: Decode application usage documents against an explicit optional-section schema
// REF: report layout { static_data?: { system_calls }, dynamic_data?: { system_calls } }
// PURITY: CORE
// EFFECT: Either<ApplicationUsage, ParseError>
// FORMAT THEOREM: symbols(doc) = keys(static.system_calls) ∪ keys(dynamic.system_calls)
// INVARIANT: Missing sections contribute ∅; a present section must hold system_calls
// COMPLEXITY: O(n) where n = total symbols listed

import { Either } from "effect";

import { ParseError } from "../errors.js";
import type { ApplicationUsage } from "../models.js";
import type { JSONValue } from "../types/index.js";
import { isJSONArray, isJSONObject } from "../types/index.js";

/**
 * Keys used by the syscall analysis reports.
 */
export const REPORT_KEYS = {
	staticData: "static_data",
	dynamicData: "dynamic_data",
	systemCalls: "system_calls",
} as const;

/**
 * File name suffix of application reports (case-sensitive).
 */
export const REPORT_SUFFIX = ".json";

type SectionKey = typeof REPORT_KEYS.staticData | typeof REPORT_KEYS.dynamicData;

/**
 * Typed view of a report once its shape has been validated.
 */
export interface ApplicationDocument {
	readonly staticData?: readonly string[];
	readonly dynamicData?: readonly string[];
}

const shapeError = (application: string, detail: string): ParseError =>
	new ParseError({
		entity: "application-report",
		detail: `${application}: ${detail}`,
	});

/**
 * Extracts symbols from a `system_calls` collection: keys of an object, or
 * string values of an array.
 */
function decodeSystemCalls(
	application: string,
	section: SectionKey,
	value: JSONValue,
): Either.Either<readonly string[], ParseError> {
	if (isJSONObject(value)) {
		return Either.right(Object.keys(value));
	}
	if (isJSONArray(value)) {
		const symbols: string[] = [];
		for (const entry of value) {
			if (typeof entry !== "string") {
				return Either.left(
					shapeError(
						application,
						`${section}.${REPORT_KEYS.systemCalls} must list strings, found ${JSON.stringify(entry)}`,
					),
				);
			}
			symbols.push(entry);
		}
		return Either.right(symbols);
	}
	return Either.left(
		shapeError(
			application,
			`${section}.${REPORT_KEYS.systemCalls} must be an object or an array`,
		),
	);
}

function decodeSection(
	application: string,
	document: { readonly [key: string]: JSONValue },
	section: SectionKey,
): Either.Either<readonly string[] | undefined, ParseError> {
	const value = document[section];
	if (value === undefined) {
		return Either.right(undefined);
	}
	if (!isJSONObject(value)) {
		return Either.left(
			shapeError(application, `${section} must be an object`),
		);
	}
	const systemCalls = value[REPORT_KEYS.systemCalls];
	if (systemCalls === undefined) {
		return Either.left(
			shapeError(
				application,
				`${section} has no ${REPORT_KEYS.systemCalls} entry`,
			),
		);
	}
	return decodeSystemCalls(application, section, systemCalls);
}

/**
 * Validates the document structure.
 *
 * @pure true
 * @invariant Left iff the document is not an object or a present section is malformed
 */
export function parseApplicationDocument(
	application: string,
	document: JSONValue,
): Either.Either<ApplicationDocument, ParseError> {
	if (!isJSONObject(document)) {
		return Either.left(shapeError(application, "report must be a JSON object"));
	}
	return Either.gen(function* () {
		const staticData = yield* decodeSection(
			application,
			document,
			REPORT_KEYS.staticData,
		);
		const dynamicData = yield* decodeSection(
			application,
			document,
			REPORT_KEYS.dynamicData,
		);
		return {
			...(staticData === undefined ? {} : { staticData }),
			...(dynamicData === undefined ? {} : { dynamicData }),
		};
	});
}

/**
 * Unions both sections into one symbol set, static symbols first.
 *
 * @pure true
 * @postcondition |symbols| = |staticData ∪ dynamicData|
 */
export function collectSymbols(
	document: ApplicationDocument,
): ReadonlySet<string> {
	return new Set([...(document.staticData ?? []), ...(document.dynamicData ?? [])]);
}

/**
 * Validates a parsed report and returns the application's usage.
 *
 * @pure true
 *
 * @example
 * ```ts
 * decodeApplicationDocument("app1", { static_data: { system_calls: { fork: 1 } } });
 * // Right({ name: "app1", symbols: Set { "fork" } })
 * ```
 */
export function decodeApplicationDocument(
	application: string,
	document: JSONValue,
): Either.Either<ApplicationUsage, ParseError> {
	return Either.map(
		parseApplicationDocument(application, document),
		(parsed) => ({ name: application, symbols: collectSymbols(parsed) }),
	);
}
