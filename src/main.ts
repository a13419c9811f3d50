// CHANGE: Make main.ts a thin APP delegator
// WHY: Enforce FCIS: main binds the live process to the application; BIN only runs it
// PURITY: APP (composition only)
// INVARIANT: The returned effect terminates the process through the host; it never completes normally
// COMPLEXITY: O(1)

import type { Effect } from "effect";

import { runInvocation } from "./app/runInvocation.js";
import { nodeHost } from "./shell/host/process-host.js";

/**
 * Program for the current Node.js process.
 *
 * @returns Effect<never> that halts with 0 or 1
 *
 * @pure false (reads process.argv, cwd and environment)
 */
export function main(): Effect.Effect<never> {
	return runInvocation(process.argv.slice(2), nodeHost(), {
		cwd: process.cwd(),
		env: process.env,
	});
}
