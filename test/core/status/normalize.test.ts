// CHANGE: Deterministic and property-based specs for status table normalization
// FORMAT THEOREM: ∀s ∈ String: normalizeStatus(normalizeStatus(s)) = normalizeStatus(s)
// PURITY: CORE
// INVARIANT: First matching rule wins; unmatched text passes through unchanged

import fc from "fast-check";
import { describe, expect, it } from "vitest";

import { SYSCALL_STATUSES } from "../../../src/core/models.js";
import {
	cellText,
	loadSyscallSeeds,
	normalizeStatus,
	parseSyscallId,
	toSyscallSeed,
} from "../../../src/core/status/normalize.js";

describe("normalizeStatus", () => {
	it.each([
		["", "NOT_IMPL"],
		["okay, fully supported", "OKAY"],
		["incomplete", "INCOMPLETE"],
		["registration missing", "REG_MISS"],
		["stubbed (returns -ENOSYS)", "STUBBED"],
		["planned for next release", "PLANNED"],
		["in progress", "IN_PROGRESS"],
		["broken", "BROKEN"],
	])("maps %j to %s", (text, expected) => {
		expect(normalizeStatus(text)).toBe(expected);
	});

	it("applies rules in priority order when several keywords match", () => {
		expect(normalizeStatus("incomplete but okay")).toBe("INCOMPLETE");
		expect(normalizeStatus("broken, fix in progress")).toBe("IN_PROGRESS");
		expect(normalizeStatus("stubbed, planned")).toBe("STUBBED");
		expect(normalizeStatus("was okay, now broken")).toBe("BROKEN");
	});

	it("matches case-sensitively and passes unknown text through", () => {
		expect(normalizeStatus("Okay")).toBe("Okay");
		expect(normalizeStatus("works")).toBe("works");
		expect(normalizeStatus(" ")).toBe(" ");
	});

	it("returns every status name unchanged", () => {
		for (const status of SYSCALL_STATUSES) {
			expect(normalizeStatus(status)).toBe(status);
		}
	});

	it("is idempotent", () => {
		fc.assert(
			fc.property(fc.string(), (text) => {
				const once = normalizeStatus(text);
				expect(normalizeStatus(once)).toBe(once);
			}),
		);
	});
});

describe("parseSyscallId", () => {
	it.each([
		[57, 57],
		[57.9, 57],
		[-3.5, -3],
		["12", 12],
		[" 7 ", 7],
		["+4", 4],
		["", -1],
		["n/a", -1],
		["12abc", -1],
		["1.5", -1],
		[Number.NaN, -1],
		[Number.POSITIVE_INFINITY, -1],
		[null, -1],
		[undefined, -1],
		[true, 1],
		[false, 0],
	])("coerces %j to %d", (cell, expected) => {
		expect(parseSyscallId(cell)).toBe(expected);
	});

	it("coerces dates to the sentinel", () => {
		expect(parseSyscallId(new Date(0))).toBe(-1);
	});
});

describe("cellText", () => {
	it("reads blanks as empty text and stringifies numbers", () => {
		expect(cellText(null)).toBe("");
		expect(cellText(undefined)).toBe("");
		expect(cellText(42)).toBe("42");
		expect(cellText("fork")).toBe("fork");
		expect(cellText(new Date(0))).toBe("1970-01-01T00:00:00.000Z");
	});
});

describe("toSyscallSeed", () => {
	it("normalizes an unimplemented syscall row", () => {
		expect(toSyscallSeed([57, "fork", ""])).toEqual({
			id: 57,
			name: "fork",
			status: "NOT_IMPL",
		});
	});

	it("normalizes an implemented syscall row", () => {
		expect(toSyscallSeed([12, "brk", "okay, fully supported"])).toEqual({
			id: 12,
			name: "brk",
			status: "OKAY",
		});
	});

	it("ignores columns beyond the status and fills missing cells", () => {
		expect(toSyscallSeed(["x", "mmap", "okay", "note"])).toEqual({
			id: -1,
			name: "mmap",
			status: "OKAY",
		});
		expect(toSyscallSeed([5])).toEqual({ id: 5, name: "", status: "NOT_IMPL" });
	});
});

describe("loadSyscallSeeds", () => {
	it("skips the header row and keeps row order", () => {
		const seeds = loadSyscallSeeds([
			["rax", "name", "status"],
			[0, "read", "okay"],
			[1, "write", "in progress"],
		]);
		expect(seeds).toEqual([
			{ id: 0, name: "read", status: "OKAY" },
			{ id: 1, name: "write", status: "IN_PROGRESS" },
		]);
	});

	it("returns no seeds for an empty sheet", () => {
		expect(loadSyscallSeeds([])).toEqual([]);
		expect(loadSyscallSeeds([["rax", "name", "status"]])).toEqual([]);
	});
});
