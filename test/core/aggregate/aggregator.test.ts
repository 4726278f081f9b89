// CHANGE: Deterministic and property-based specs for the status/usage join
// FORMAT THEOREM: ∀app: Σ_status |buckets(app)[status]| = |symbols(app)|
// FORMAT THEOREM: ∀s ∈ syscalls: |s.apps| = |{app : s.name ∈ symbols(app)}|
// PURITY: CORE
// INVARIANT: Unknown symbols land in ABSENT and in undefinedSyscalls

import { Either } from "effect";
import fc from "fast-check";
import { describe, expect, it } from "vitest";

import {
	aggregate,
	createAggregationState,
	emptyBuckets,
	ingestApplication,
} from "../../../src/core/aggregate/aggregator.js";
import {
	type ApplicationUsage,
	SYSCALL_STATUSES,
	type SyscallSeed,
} from "../../../src/core/models.js";
import { seed, usage } from "../../utils/builders.js";

describe("createAggregationState", () => {
	it("keeps the last row for a repeated syscall name", () => {
		const state = createAggregationState([
			seed(0, "read", "OKAY"),
			seed(63, "read", "BROKEN"),
		]);
		expect(state.syscalls.size).toBe(1);
		expect(state.syscalls.get("read")).toEqual({
			id: 63,
			name: "read",
			status: "BROKEN",
			apps: [],
		});
	});
});

describe("emptyBuckets", () => {
	it("creates one empty list per status in canonical order", () => {
		const buckets = emptyBuckets();
		expect(Object.keys(buckets)).toEqual([...SYSCALL_STATUSES]);
		expect(Object.values(buckets).every((list) => list.length === 0)).toBe(true);
	});
});

describe("ingestApplication", () => {
	it("files a table syscall under its status", () => {
		const state = createAggregationState([seed(57, "fork", "NOT_IMPL")]);
		const record = Either.getOrThrow(
			ingestApplication(state, usage("app1", ["fork"])),
		);

		expect(record.buckets).toEqual({ ...emptyBuckets(), NOT_IMPL: ["fork"] });
		expect(state.syscalls.get("fork")?.apps).toEqual(["app1"]);
		expect(state.applications.get("app1")).toBe(record);
		expect(state.undefinedSyscalls.size).toBe(0);
	});

	it("files an unknown symbol under ABSENT and records it as undefined", () => {
		const state = createAggregationState([seed(12, "brk", "OKAY")]);
		const record = Either.getOrThrow(
			ingestApplication(state, usage("app1", ["xyz_unknown"])),
		);

		expect(record.buckets.ABSENT).toEqual(["xyz_unknown"]);
		expect(state.undefinedSyscalls.get("xyz_unknown")).toEqual({
			name: "xyz_unknown",
			apps: ["app1"],
		});
		expect(state.syscalls.get("brk")?.apps).toEqual([]);
	});

	it("fails on a referenced syscall whose status has no bucket, leaving state untouched", () => {
		const state = createAggregationState([
			seed(12, "brk", "OKAY"),
			seed(16, "ioctl", "works"),
		]);
		const result = ingestApplication(state, usage("app1", ["brk", "ioctl"]));

		expect(Either.isLeft(result)).toBe(true);
		if (Either.isLeft(result)) {
			expect(result.left._tag).toBe("UnknownStatus");
			expect(result.left.syscall).toBe("ioctl");
			expect(result.left.status).toBe("works");
			expect(result.left.application).toBe("app1");
		}
		expect(state.applications.size).toBe(0);
		expect(state.syscalls.get("brk")?.apps).toEqual([]);
	});
});

describe("aggregate", () => {
	it("records applications sharing a syscall in load order", () => {
		const snapshot = Either.getOrThrow(
			aggregate(
				[seed(12, "brk", "OKAY")],
				[usage("first", ["brk"]), usage("second", ["brk"])],
			),
		);
		expect(snapshot.syscalls.get("brk")?.apps).toEqual(["first", "second"]);
	});

	it("accumulates every application referencing an undefined syscall", () => {
		const snapshot = Either.getOrThrow(
			aggregate(
				[],
				[usage("a", ["socketcall"]), usage("b", ["socketcall", "ipc"])],
			),
		);
		expect([...snapshot.undefinedSyscalls.keys()]).toEqual(["socketcall", "ipc"]);
		expect(snapshot.undefinedSyscalls.get("socketcall")?.apps).toEqual(["a", "b"]);
	});

	it("replaces the record of a repeated application name", () => {
		const snapshot = Either.getOrThrow(
			aggregate(
				[seed(0, "read", "OKAY"), seed(1, "write", "STUBBED")],
				[usage("app", ["read"]), usage("other", []), usage("app", ["write"])],
			),
		);
		expect([...snapshot.applications.keys()]).toEqual(["app", "other"]);
		expect(snapshot.applications.get("app")?.buckets.STUBBED).toEqual(["write"]);
		expect(snapshot.applications.get("app")?.buckets.OKAY).toEqual([]);
		expect(snapshot.syscalls.get("read")?.apps).toEqual(["app"]);
	});

	it("leaves every apps list empty when no application is loaded", () => {
		const snapshot = Either.getOrThrow(
			aggregate([seed(0, "read", "OKAY"), seed(57, "fork", "NOT_IMPL")], []),
		);
		expect(snapshot.applications.size).toBe(0);
		expect(snapshot.undefinedSyscalls.size).toBe(0);
		for (const record of snapshot.syscalls.values()) {
			expect(record.apps).toEqual([]);
		}
	});

	it("ignores unbucketable statuses that no application references", () => {
		const result = aggregate(
			[seed(16, "ioctl", "works")],
			[usage("app", ["read"])],
		);
		expect(Either.isRight(result)).toBe(true);
	});

	describe("properties", () => {
		const symbolArb = fc.constantFrom(
			"read",
			"write",
			"open",
			"close",
			"fork",
			"brk",
			"mmap",
			"xyz_unknown",
		);
		const seedArb: fc.Arbitrary<SyscallSeed> = fc.record({
			id: fc.integer({ min: -1, max: 450 }),
			name: symbolArb,
			status: fc.constantFrom(...SYSCALL_STATUSES),
		});
		const usagesArb: fc.Arbitrary<ApplicationUsage[]> = fc
			.array(fc.uniqueArray(symbolArb, { maxLength: 8 }), { maxLength: 6 })
			.map((lists) => lists.map((symbols, index) => usage(`app${index}`, symbols)));

		it("partitions each application's symbols across the nine buckets", () => {
			fc.assert(
				fc.property(fc.array(seedArb, { maxLength: 10 }), usagesArb, (seeds, usages) => {
					const snapshot = Either.getOrThrow(aggregate(seeds, usages));
					for (const app of usages) {
						const record = snapshot.applications.get(app.name);
						const bucketed = SYSCALL_STATUSES.flatMap(
							(status) => record?.buckets[status] ?? [],
						);
						expect(bucketed).toHaveLength(app.symbols.size);
						expect(new Set(bucketed)).toEqual(app.symbols);
					}
				}),
			);
		});

		it("counts each syscall once per application using it", () => {
			fc.assert(
				fc.property(fc.array(seedArb, { maxLength: 10 }), usagesArb, (seeds, usages) => {
					const snapshot = Either.getOrThrow(aggregate(seeds, usages));
					for (const record of snapshot.syscalls.values()) {
						const users = usages.filter((app) => app.symbols.has(record.name));
						expect(record.apps).toEqual(users.map((app) => app.name));
					}
					for (const record of snapshot.undefinedSyscalls.values()) {
						expect(snapshot.syscalls.has(record.name)).toBe(false);
					}
				}),
			);
		});
	});
});
