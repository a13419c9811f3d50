// CHANGE: Lifecycle controller: Starting → Running → {Succeeded | CaughtFailure | UncaughtAbnormal} → Terminated
// WHY: Exactly one place decides the process exit status; every path reports and terminates
// FORMAT THEOREM: ∀work: runLifecycle(…) halts exactly once with exitCodeOf(classifyExit(exit(work)))
// PURITY: SHELL
// EFFECT: Effect<never, never, never>
// INVARIANT: Failure paths emit exactly one diagnostic, then flush, then halt(1); success halts(0) immediately
// COMPLEXITY: O(1) plus the work itself

import { Duration, Effect, Option } from "effect";

import {
	classifyExit,
	DEFAULT_REPORT_DEPTH,
	diagnosticOf,
	exitCodeOf,
	type ReportDepth,
} from "../../core/decision.js";
import type { RunFailure } from "../../core/errors.js";
import type { Outcome } from "../../core/models.js";
import type { HostProcess } from "../host/process-host.js";

export interface LifecycleOptions {
	/** Wait used when the host cannot flush its diagnostic sink. */
	readonly flushDelay: Duration.Duration;
	readonly reportDepth: ReportDepth;
}

export const DEFAULT_LIFECYCLE_OPTIONS: LifecycleOptions = {
	flushDelay: Duration.seconds(1),
	reportDepth: DEFAULT_REPORT_DEPTH,
};

/**
 * Runs `work` and classifies how it ended. Never fails: every failure,
 * defect or interruption of `work` becomes an Outcome.
 *
 * @effect Effect<Outcome>
 */
export const runBoundary = <A>(
	work: Effect.Effect<A, RunFailure>,
	depth: ReportDepth = DEFAULT_REPORT_DEPTH,
): Effect.Effect<Outcome> =>
	Effect.exit(work).pipe(Effect.map((exit) => classifyExit(exit, depth)));

const flushWindow = (host: HostProcess, fallback: Duration.Duration): Effect.Effect<void> =>
	Option.match(host.flush, {
		onSome: (flush) => flush,
		onNone: () => Effect.sleep(fallback),
	});

/**
 * Terminated state: report (on failure), flush, halt.
 */
export const terminate = (
	outcome: Outcome,
	host: HostProcess,
	options: LifecycleOptions = DEFAULT_LIFECYCLE_OPTIONS,
): Effect.Effect<never> =>
	Option.match(diagnosticOf(outcome), {
		onNone: () => host.halt(exitCodeOf(outcome)),
		onSome: (line) =>
			host
				.report(line)
				.pipe(
					Effect.zipRight(flushWindow(host, options.flushDelay)),
					Effect.zipRight(host.halt(exitCodeOf(outcome))),
				),
	});

/**
 * Waits for readiness, runs the work against the ready service, and
 * terminates the host. Does not return on any path.
 *
 * @param ready - Startup gate; completes once the service is available
 * @param work - The unit of work, given the ready service
 *
 * @example
 * ```ts
 * runLifecycle(awaitReady(registry, "doc-engine"), (slot) => operation(slot), nodeHost())
 * ```
 */
export const runLifecycle = <S>(
	ready: Effect.Effect<S>,
	work: (service: S) => Effect.Effect<unknown, RunFailure>,
	host: HostProcess,
	options: LifecycleOptions = DEFAULT_LIFECYCLE_OPTIONS,
): Effect.Effect<never> =>
	Effect.gen(function* () {
		const service = yield* ready;
		const outcome = yield* runBoundary(
			Effect.suspend(() => work(service)),
			options.reportDepth,
		);
		return yield* terminate(outcome, host, options);
	});
