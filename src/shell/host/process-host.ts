// CHANGE: Host process boundary (output streams, flush and termination)
// WHY: Single point of process.exit; the lifecycle controller talks to this interface so tests can stand in
// PURITY: SHELL (BIN layer)
// INVARIANT: halt never returns

import { Effect, Option } from "effect";

import type { ExitCode } from "../../core/models.js";

/**
 * What the lifecycle controller needs from the hosting process.
 */
export interface HostProcess {
	/** Writes one diagnostic line to the error channel. */
	readonly report: (line: string) => Effect.Effect<void>;
	/** Writes regular output (usage text). */
	readonly print: (text: string) => Effect.Effect<void>;
	/** Waits until buffered diagnostics are written, when the sink supports it. */
	readonly flush: Option.Option<Effect.Effect<void>>;
	readonly halt: (code: ExitCode) => Effect.Effect<never>;
}

/**
 * The live Node.js process.
 *
 * @remarks
 * - flush writes an empty chunk to stderr and resumes from its write callback,
 *   which Node invokes once everything queued before it has been handed off
 */
export const nodeHost = (proc: NodeJS.Process = process): HostProcess => ({
	report: (line) =>
		Effect.sync(() => {
			console.error(line);
		}),
	print: (text) =>
		Effect.sync(() => {
			console.log(text);
		}),
	flush: Option.some(
		Effect.async<void>((resume) => {
			proc.stderr.write("", () => resume(Effect.void));
		}),
	),
	halt: (code) => Effect.sync(() => proc.exit(code)),
});
