// CHANGE: Application orchestration for one process invocation
// WHY: Compose configuration, engine provisioning and the selected entry point; BIN only supplies the process
// PURITY: APP (no process.exit here; the host decides)
// EFFECT: Effect<never>
// INVARIANT: The engine slot is registered exactly once, whether loading succeeds or fails
// COMPLEXITY: O(1) orchestration

import { Duration, Effect, Either } from "effect";

import type { ConfigError } from "../core/errors.js";
import type { RunnerConfig } from "../core/types/config.js";
import { parseCLIArgs, USAGE } from "../shell/config/cli.js";
import { loadRunnerConfig } from "../shell/config/loader.js";
import { loadEngine } from "../shell/engine/loader.js";
import type { HostProcess } from "../shell/host/process-host.js";
import {
	DEFAULT_LIFECYCLE_OPTIONS,
	type LifecycleOptions,
	runLifecycle,
} from "../shell/lifecycle/controller.js";
import { ServiceRegistry } from "../shell/runtime/registry.js";
import { ENGINE_SERVICE, type EngineSlot, runNamed } from "./entry-points.js";

/**
 * Lifecycle timings and depth bounds derived from configuration.
 *
 * @pure true
 */
export const lifecycleOptionsOf = (config: RunnerConfig): LifecycleOptions => ({
	flushDelay: Duration.millis(config.flushDelayMs),
	reportDepth: { caught: config.reportDepth, abnormal: config.reportDepth + 5 },
});

/**
 * Loads the engine (or records why there is none) and registers the slot.
 *
 * @effect Effect<void>: never fails; failures are stored in the slot
 */
export const provisionEngine = (
	config: Either.Either<RunnerConfig, ConfigError>,
	registry: ServiceRegistry<EngineSlot>,
	cwd: string,
): Effect.Effect<void> =>
	Either.match(config, {
		onLeft: (error) => Effect.sync(() => registry.register(ENGINE_SERVICE, Either.left(error))),
		onRight: (cfg) =>
			loadEngine(cfg.engine, cwd).pipe(
				Effect.either,
				Effect.flatMap((slot) => Effect.sync(() => registry.register(ENGINE_SERVICE, slot))),
			),
	});

export interface InvocationContext {
	readonly cwd: string;
	readonly env: NodeJS.ProcessEnv;
}

/**
 * Runs the command line `argv` to termination.
 *
 * @param argv - Arguments after the node and script entries
 *
 * @example
 * ```ts
 * Effect.runFork(runInvocation(["file", '"a.src"'], nodeHost(), { cwd: process.cwd(), env: process.env }))
 * ```
 */
export const runInvocation = (
	argv: ReadonlyArray<string>,
	host: HostProcess,
	context: InvocationContext,
): Effect.Effect<never> =>
	Effect.gen(function* () {
		const invocation = parseCLIArgs(argv);
		if (invocation.kind === "help") {
			return yield* runLifecycle(Effect.void, () => host.print(USAGE), host);
		}

		const config = loadRunnerConfig(context.cwd, context.env);
		const options = Either.match(config, {
			onLeft: () => DEFAULT_LIFECYCLE_OPTIONS,
			onRight: lifecycleOptionsOf,
		});

		const registry = new ServiceRegistry<EngineSlot>();
		yield* Effect.forkDaemon(provisionEngine(config, registry, context.cwd));

		return yield* runNamed(invocation.entry, invocation.tokens, { registry, host, options });
	});
