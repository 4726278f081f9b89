// CHANGE: JSON value model used instead of `any`/`unknown` for parsed documents
// PURITY: CORE
// INVARIANT: Must be serializable to JSON

export type JSONPrimitive = string | number | boolean | null;

export type JSONValue =
	| JSONPrimitive
	| readonly JSONValue[]
	| { readonly [key: string]: JSONValue };

export interface JSONObject {
	readonly [key: string]: JSONValue;
}

/**
 * @pure true
 * @complexity O(1)
 */
export function isJSONObject(value: JSONValue): value is JSONObject {
	return value !== null && typeof value === "object" && !Array.isArray(value);
}

/**
 * @pure true
 * @complexity O(1)
 */
export function isJSONArray(value: JSONValue): value is readonly JSONValue[] {
	return Array.isArray(value);
}
