// CHANGE: Functional Core domain models for one launcher invocation
// WHY: Keep the values that flow between decoder, dispatcher and lifecycle controller immutable and typed
// PURITY: CORE
// INVARIANT: CORE defines no effects; nothing here outlives a single process invocation
// COMPLEXITY: O(1)

import { Data } from "effect";

import type { Term } from "./term/types.js";

/**
 * Exit code for the hosting process.
 *
 * @remarks
 * - @pure true
 * - @invariant exitCode ∈ {0, 1}
 */
export type ExitCode = 0 | 1;

/**
 * A token as received from the launcher. A symbol stands for a bare
 * symbolic literal; its key (or description) is the text that gets parsed.
 */
export type RawArgument = string | symbol;

/**
 * Decoded arguments in positional order.
 */
export type ArgumentList = ReadonlyArray<Term>;

/**
 * The documentation operations the adapter exposes.
 */
export type EntryPointName = "file" | "files" | "packages" | "application" | "toc";

/**
 * Tri-state result of running a unit of work.
 *
 * @remarks
 * - Succeeded: the work returned; its value is discarded
 * - CaughtFailure: a recognized failure was trapped
 * - UncaughtAbnormal: anything else escaped (non-Error throw, defect, interruption)
 */
export type Outcome = Data.TaggedEnum<{
	Succeeded: {};
	CaughtFailure: { readonly detail: string };
	UncaughtAbnormal: { readonly detail: string };
}>;

export const Outcome = Data.taggedEnum<Outcome>();
