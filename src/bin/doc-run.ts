#!/usr/bin/env node

// CHANGE: Thin CLI shell wrapper
// WHY: The lifecycle controller owns termination; BIN only starts the program
// PURITY: SHELL (BIN layer)
// INVARIANT: Every path ends in process.exit with 0 or 1
// COMPLEXITY: O(1) time/space (delegates to APP)

import { Effect } from "effect";

import { main } from "../main.js";

/**
 * CLI entry point for doc-run.
 *
 * @remarks
 * - @pure false (process termination and console I/O)
 * - @postcondition process terminates exactly once with ExitCode ∈ {0,1}
 */
void (async (): Promise<void> => {
	try {
		await Effect.runPromise(main());
	} catch (error) {
		// Only reachable if the runtime itself fails before the controller halts
		console.error("doc-run: fatal error:", error);
		process.exit(1);
	}
})();
