// CHANGE: Entry points, one per documentation operation, each Dispatcher + Lifecycle Controller
// WHY: APP composes CORE decoding/dispatch with SHELL engine calls and termination
// PURITY: APP
// EFFECT: Effect<never> per entry point (terminates the host)
// INVARIANT: decode → dispatch → engine, in that order; a failure at any stage skips the later ones
// COMPLEXITY: O(Σ|tokens|) plus the engine's own work

import { Effect, Either, Option } from "effect";

import { decodeArguments, tokenText } from "../core/decode.js";
import {
	ENTRY_POINTS,
	entryPointId,
	isEntryPointName,
	resolveCall,
} from "../core/dispatch.js";
import {
	InvalidArguments,
	type RecognizedFailure,
	type RunFailure,
} from "../core/errors.js";
import type { EntryPointName, RawArgument } from "../core/models.js";
import type { DocEngine } from "../core/types/engine.js";
import { invokeEngine } from "../shell/engine/invoke.js";
import type { HostProcess } from "../shell/host/process-host.js";
import {
	DEFAULT_LIFECYCLE_OPTIONS,
	type LifecycleOptions,
	runLifecycle,
} from "../shell/lifecycle/controller.js";
import type { ServiceRegistry } from "../shell/runtime/registry.js";
import { awaitReady } from "../shell/runtime/startup-gate.js";

/**
 * Name the engine registers under once its module has settled.
 */
export const ENGINE_SERVICE = "doc-engine";

/**
 * What gets registered: the engine, or the reason there is none.
 */
export type EngineSlot = Either.Either<DocEngine, RecognizedFailure>;

export interface RunEnvironment {
	readonly registry: ServiceRegistry<EngineSlot>;
	readonly host: HostProcess;
	readonly options?: LifecycleOptions;
}

const engineOf = (slot: EngineSlot): Effect.Effect<DocEngine, RecognizedFailure> =>
	Either.match(slot, {
		onLeft: (failure) => Effect.fail(failure),
		onRight: (engine) => Effect.succeed(engine),
	});

/**
 * The unit of work behind an entry point: decode, dispatch, call the engine.
 * The slot is opened only once a call has been selected, so argument errors
 * are reported even when no engine is available.
 *
 * @effect Effect<unknown, RunFailure>
 *
 * @example
 * ```ts
 * operation("file", ['"a.src"'])(Either.right(engine)) // calls engine.file(str("a.src"), [])
 * ```
 */
export const operation =
	(entry: EntryPointName, tokens: ReadonlyArray<RawArgument>) =>
	(slot: EngineSlot): Effect.Effect<unknown, RunFailure> =>
		Effect.gen(function* () {
			const args = yield* decodeArguments(tokens);
			const call = yield* Option.match(resolveCall(entry, args), {
				onNone: () =>
					Effect.fail(
						new InvalidArguments({
							where: entryPointId(entry),
							tokens: tokens.map(tokenText),
						}),
					),
				onSome: (found) => Effect.succeed(found),
			});
			const engine = yield* engineOf(slot);
			return yield* invokeEngine(engine, call);
		});

const entryPoint =
	(entry: EntryPointName) =>
	(tokens: ReadonlyArray<RawArgument>, env: RunEnvironment): Effect.Effect<never> =>
		runLifecycle(
			awaitReady(env.registry, ENGINE_SERVICE),
			operation(entry, tokens),
			env.host,
			env.options ?? DEFAULT_LIFECYCLE_OPTIONS,
		);

/** `[File]` or `[File, Options]`; one source file. */
export const file = entryPoint("file");

/** `[Files]` or `[Files, Options]`. */
export const files = entryPoint("files");

/** `[Packages]` or `[Packages, Options]`. */
export const packages = entryPoint("packages");

/** `[App]`, `[App, Options]` or `[App, Dir, Options]`. */
export const application = entryPoint("application");

/** `[Dir, Paths]` or `[Dir, Paths, Options]`. */
export const toc = entryPoint("toc");

const ENTRY_POINT_RUNNERS: Readonly<
	Record<
		EntryPointName,
		(tokens: ReadonlyArray<RawArgument>, env: RunEnvironment) => Effect.Effect<never>
	>
> = { file, files, packages, application, toc };

/**
 * Runs the entry point called `name`. An unknown or missing name is an
 * invalid-arguments failure, terminated through the same lifecycle.
 */
export const runNamed = (
	name: string | null,
	tokens: ReadonlyArray<RawArgument>,
	env: RunEnvironment,
): Effect.Effect<never> => {
	if (name !== null && isEntryPointName(name)) {
		return ENTRY_POINT_RUNNERS[name](tokens, env);
	}
	const where =
		name === null
			? `doc-run (no entry point given; expected one of ${ENTRY_POINTS.join(", ")})`
			: `${entryPointId(name)} (unknown entry point; expected one of ${ENTRY_POINTS.join(", ")})`;
	return runLifecycle(
		Effect.void,
		() => Effect.fail(new InvalidArguments({ where, tokens: tokens.map(tokenText) })),
		env.host,
		env.options ?? DEFAULT_LIFECYCLE_OPTIONS,
	);
};
