#!/usr/bin/env node

// CHANGE: Thin CLI shell wrapper - single point of process.exit
// WHY: APP returns ExitCode; only BIN may terminate the process
// PURITY: SHELL (BIN layer)
// INVARIANT: Single point of termination; no process.exit in APP or CORE
// COMPLEXITY: O(1) time/space (delegates to APP)

import { Effect } from "effect";

import { main } from "../main.js";

/**
 * CLI entry point for syscall-cruncher.
 *
 * @remarks
 * - @pure false (process termination and console I/O)
 * - @invariant exit code is 0 on success, 1 on failure, 2 on usage error
 * - @postcondition process terminates exactly once
 */
void (async (): Promise<void> => {
	try {
		const code = await Effect.runPromise(main());
		// Shell boundary: single process exit
		process.exit(code);
	} catch (error) {
		// Defects only; typed failures are reported by APP
		console.error("Fatal error:", error);
		process.exit(1);
	}
})();
