// CHANGE: Pure mapping Exit → Outcome → ExitCode, plus the diagnostic line for each failure shape
// WHY: Centralize termination logic in Functional Core; the controller only executes the decision
// FORMAT THEOREM: ∀o ∈ Outcome: exitCodeOf(o) = 0 ↔ o._tag = "Succeeded"
// PURITY: CORE
// INVARIANT: Recognized failures → CaughtFailure; AbnormalSignal, defects and interruption → UncaughtAbnormal
// COMPLEXITY: O(size of the rendered detail), bounded by the report depth

import { inspect } from "node:util";

import { Cause, Exit, Option } from "effect";
import { match } from "ts-pattern";

import type { RunFailure } from "./errors.js";
import { type ExitCode, Outcome } from "./models.js";
import { escapeText, formatTerm } from "./term/format.js";
import { isTerm } from "./term/types.js";

/**
 * Depth bounds used when rendering failure details.
 *
 * @invariant caught ≥ 1 ∧ abnormal ≥ 1
 */
export interface ReportDepth {
	readonly caught: number;
	readonly abnormal: number;
}

export const DEFAULT_REPORT_DEPTH: ReportDepth = { caught: 10, abnormal: 15 };

const oneLine = (text: string): string => text.replace(/\s*\n\s*/g, " ").trim();

/**
 * Renders an arbitrary value on one line with a nesting bound. Terms are
 * printed in literal syntax, errors by name and message.
 *
 * @pure true
 */
export const renderValue = (value: unknown, depth: number): string => {
	if (value instanceof Error) return oneLine(`${value.name}: ${value.message}`);
	if (isTerm(value)) return formatTerm(value, depth);
	return oneLine(
		inspect(value, { depth, breakLength: Number.POSITIVE_INFINITY, compact: true }),
	);
};

const ABNORMAL_PREFIX = "internal error: throw without catch in doc generation";
const TERMINATED_PREFIX = "doc generation terminated abnormally";

const describeFailure = (failure: RunFailure, depth: ReportDepth): Outcome =>
	match(failure)
		.with({ _tag: "DecodeError" }, (e) =>
			Outcome.CaughtFailure({
				detail: `error parsing argument '${escapeText(e.token, "'")}': ${oneLine(e.detail)}`,
			}),
		)
		.with({ _tag: "InvalidArguments" }, (e) =>
			Outcome.CaughtFailure({
				detail: `invalid arguments to ${e.where}: ${JSON.stringify(e.tokens)}`,
			}),
		)
		.with({ _tag: "EngineError" }, (e) =>
			Outcome.CaughtFailure({
				detail: `${TERMINATED_PREFIX}: ${e.method}: ${renderValue(e.error, depth.caught)}`,
			}),
		)
		.with({ _tag: "EngineUnavailable" }, (e) =>
			Outcome.CaughtFailure({ detail: `${TERMINATED_PREFIX}: ${oneLine(e.reason)}` }),
		)
		.with({ _tag: "ConfigError" }, (e) =>
			Outcome.CaughtFailure({
				detail: `${TERMINATED_PREFIX}: bad configuration ${e.path}: ${oneLine(e.detail)}`,
			}),
		)
		.with({ _tag: "AbnormalSignal" }, (e) =>
			Outcome.UncaughtAbnormal({
				detail: `${ABNORMAL_PREFIX}: ${renderValue(e.value, depth.abnormal)}`,
			}),
		)
		.exhaustive();

/**
 * Classifies how a unit of work ended.
 *
 * @param exit - Exit of the work; its success value is ignored
 * @returns The outcome, with a ready-to-print detail line for failures
 *
 * @pure true
 * @complexity O(1) plus rendering
 *
 * @example
 * ```ts
 * classifyExit(Exit.succeed(42)) // Outcome.Succeeded()
 * classifyExit(Exit.fail(new InvalidArguments({ where: "doc-run:toc/1", tokens: ["\".\""] })))
 * // CaughtFailure { detail: 'invalid arguments to doc-run:toc/1: ["\".\""]' }
 * ```
 */
export const classifyExit = <A>(
	exit: Exit.Exit<A, RunFailure>,
	depth: ReportDepth = DEFAULT_REPORT_DEPTH,
): Outcome =>
	Exit.match(exit, {
		onSuccess: () => Outcome.Succeeded(),
		onFailure: (cause) =>
			Option.match(Cause.failureOption(cause), {
				onSome: (failure) => describeFailure(failure, depth),
				onNone: () =>
					Outcome.UncaughtAbnormal({
						detail: Cause.isInterruptedOnly(cause)
							? `${ABNORMAL_PREFIX}: interrupted`
							: `${ABNORMAL_PREFIX}: ${renderValue(Cause.squash(cause), depth.abnormal)}`,
					}),
			}),
	});

/**
 * @pure true
 * @invariant result ∈ {0, 1}
 */
export const exitCodeOf = (outcome: Outcome): ExitCode =>
	Outcome.$match(outcome, {
		Succeeded: (): ExitCode => 0,
		CaughtFailure: (): ExitCode => 1,
		UncaughtAbnormal: (): ExitCode => 1,
	});

/**
 * Diagnostic line for a failed outcome; none for success.
 *
 * @pure true
 */
export const diagnosticOf = (outcome: Outcome): Option.Option<string> =>
	Outcome.$match(outcome, {
		Succeeded: () => Option.none<string>(),
		CaughtFailure: ({ detail }) => Option.some(`doc-run: ${detail}`),
		UncaughtAbnormal: ({ detail }) => Option.some(`doc-run: ${detail}`),
	});
