// CHANGE: Specs for report selection and progress routing
// INVARIANT: CSV lines go through console.log; progress through console.error only when verbose
// PURITY: SHELL - console spied

import { Effect, Either } from "effect";
import { describe, expect, it, vi } from "vitest";

import { aggregate } from "../../../src/core/aggregate/aggregator.js";
import {
	createProgressReporter,
	printReports,
} from "../../../src/shell/output/printer.js";
import { seed, usage } from "../../utils/builders.js";

const snapshot = Either.getOrThrow(
	aggregate([seed(0, "read", "OKAY")], [usage("cat", ["read"])]),
);

describe("printReports", () => {
	it("prints only the syscall report when selected", () => {
		const log = vi.spyOn(console, "log").mockImplementation(() => undefined);
		Effect.runSync(
			printReports(snapshot, { printApps: false, printSyscalls: true }),
		);
		expect(log.mock.calls).toEqual([["syscall,status,num_apps"], ["read,OKAY,1"]]);
	});

	it("prints the application report before the syscall report", () => {
		const log = vi.spyOn(console, "log").mockImplementation(() => undefined);
		Effect.runSync(
			printReports(snapshot, { printApps: true, printSyscalls: true }),
		);
		expect(log.mock.calls.map(([line]) => line)).toEqual([
			"app,total,okay,not_impl,reg_miss,incomplete,stubbed,planned,broken,in_progress,absent",
			"cat,1,1,0,0,0,0,0,0,0,0",
			"syscall,status,num_apps",
			"read,OKAY,1",
		]);
	});
});

describe("createProgressReporter", () => {
	it("writes to stderr when verbose", () => {
		const error = vi.spyOn(console, "error").mockImplementation(() => undefined);
		Effect.runSync(createProgressReporter(true)("loading"));
		expect(error).toHaveBeenCalledWith("loading");
	});

	it("is silent otherwise", () => {
		const error = vi.spyOn(console, "error").mockImplementation(() => undefined);
		Effect.runSync(createProgressReporter(false)("loading"));
		expect(error).not.toHaveBeenCalled();
	});
});
