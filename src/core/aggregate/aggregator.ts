// CHANGE: Join status table seeds with per-application usage into three mappings
// WHY: Status validation runs before any mutation so a failing app leaves the state untouched
// PURITY: CORE (mutation confined to the AggregationState passed in)
// FORMAT THEOREM: ∀app: Σ_status |buckets(app)[status]| = |symbols(app)|
// FORMAT THEOREM: ∀s ∈ syscalls: |s.apps| = |{app ∈ ingested : s.name ∈ symbols(app)}|
// INVARIANT: No module-level state; each run owns its own AggregationState
// COMPLEXITY: O(Σ|symbols|) amortized (Map lookups)

import { Either } from "effect";

import { UnknownStatusError } from "../errors.js";
import type {
	AggregationSnapshot,
	AggregationState,
	ApplicationRecord,
	ApplicationUsage,
	SyscallSeed,
	SyscallStatus,
} from "../models.js";
import { isSyscallStatus } from "../models.js";

/**
 * Builds a fresh state from the status table.
 *
 * @pure true
 * @invariant A repeated name replaces the earlier record (last row wins)
 */
export function createAggregationState(
	seeds: readonly SyscallSeed[],
): AggregationState {
	const syscalls: AggregationState["syscalls"] = new Map();
	for (const seed of seeds) {
		syscalls.set(seed.name, { ...seed, apps: [] });
	}
	return {
		syscalls,
		applications: new Map(),
		undefinedSyscalls: new Map(),
	};
}

/**
 * One empty list per status, keyed in canonical order (SYSCALL_STATUSES).
 *
 * @pure true
 */
export function emptyBuckets(): Record<SyscallStatus, string[]> {
	return {
		OKAY: [],
		ABSENT: [],
		NOT_IMPL: [],
		INCOMPLETE: [],
		REG_MISS: [],
		STUBBED: [],
		BROKEN: [],
		IN_PROGRESS: [],
		PLANNED: [],
	};
}

function recordUndefinedUse(
	state: AggregationState,
	symbol: string,
	application: string,
): void {
	const existing = state.undefinedSyscalls.get(symbol);
	if (existing === undefined) {
		state.undefinedSyscalls.set(symbol, { name: symbol, apps: [application] });
		return;
	}
	existing.apps.push(application);
}

/**
 * Classifies every symbol of one application and records the references.
 *
 * Validation runs before any mutation, so a Left leaves `state` untouched.
 *
 * @pure false (mutates state)
 * @invariant buckets(app) partitions symbols(app)
 * @postcondition state.applications.get(usage.name) is the new record
 */
export function ingestApplication(
	state: AggregationState,
	usage: ApplicationUsage,
): Either.Either<ApplicationRecord, UnknownStatusError> {
	for (const symbol of usage.symbols) {
		const syscall = state.syscalls.get(symbol);
		if (syscall !== undefined && !isSyscallStatus(syscall.status)) {
			return Either.left(
				new UnknownStatusError({
					syscall: symbol,
					status: syscall.status,
					application: usage.name,
				}),
			);
		}
	}

	const buckets = emptyBuckets();
	for (const symbol of usage.symbols) {
		const syscall = state.syscalls.get(symbol);
		if (syscall !== undefined && isSyscallStatus(syscall.status)) {
			buckets[syscall.status].push(symbol);
			syscall.apps.push(usage.name);
		} else {
			buckets.ABSENT.push(symbol);
			recordUndefinedUse(state, symbol, usage.name);
		}
	}

	const record: ApplicationRecord = { name: usage.name, buckets };
	state.applications.set(usage.name, record);
	return Either.right(record);
}

/**
 * Runs the whole join: seeds first, then applications in load order.
 *
 * @pure true (state is local)
 *
 * @example
 * ```ts
 * const result = aggregate(
 *   [{ id: 57, name: "fork", status: "NOT_IMPL" }],
 *   [{ name: "app1", symbols: new Set(["fork"]) }],
 * );
 * // Right(snapshot) with snapshot.applications.get("app1").buckets.NOT_IMPL = ["fork"]
 * ```
 */
export function aggregate(
	seeds: readonly SyscallSeed[],
	usages: Iterable<ApplicationUsage>,
): Either.Either<AggregationSnapshot, UnknownStatusError> {
	const state = createAggregationState(seeds);
	for (const usage of usages) {
		const ingested = ingestApplication(state, usage);
		if (Either.isLeft(ingested)) {
			return Either.left(ingested.left);
		}
	}
	return Either.right(state);
}
