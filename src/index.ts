// CHANGE: Public API entry point for library consumers
// WHY: Embedders call entry points programmatically with their own host and registry
// PURITY: Re-exports only (meta-module)
// INVARIANT: All exports are either pure functions, typed interfaces or APP compositions
// COMPLEXITY: O(1) - module resolution only

// ═══════════════════════════════════════════════════════════════════════════════
// ENTRY POINTS (APP)
// ═══════════════════════════════════════════════════════════════════════════════

/**
 * Documentation entry points; each never returns and halts the host.
 *
 * @example
 * ```typescript
 * import { Either, Effect } from "effect";
 * import { application, ENGINE_SERVICE, type EngineSlot, nodeHost, ServiceRegistry } from "doc-run";
 *
 * const registry = new ServiceRegistry<EngineSlot>();
 * registry.register(ENGINE_SERVICE, Either.right(myEngine));
 * Effect.runFork(application(["myapp", '"."', "[{vsn, \"1.0\"}]"], { registry, host: nodeHost() }));
 * ```
 */
export {
	application,
	ENGINE_SERVICE,
	type EngineSlot,
	file,
	files,
	operation,
	packages,
	type RunEnvironment,
	runNamed,
	toc,
} from "./app/entry-points.js";
export {
	type InvocationContext,
	lifecycleOptionsOf,
	provisionEngine,
	runInvocation,
} from "./app/runInvocation.js";

// ═══════════════════════════════════════════════════════════════════════════════
// CORE (pure)
// ═══════════════════════════════════════════════════════════════════════════════

export type {
	ArgumentList,
	EntryPointName,
	ExitCode,
	RawArgument,
} from "./core/models.js";
export { Outcome } from "./core/models.js";
export {
	AbnormalSignal,
	ConfigError,
	DecodeError,
	EngineError,
	EngineUnavailable,
	InvalidArguments,
	type RecognizedFailure,
	type RunFailure,
	TermSyntaxError,
} from "./core/errors.js";
export { decodeArgument, decodeArguments, tokenText } from "./core/decode.js";
export {
	ACCEPTED_LENGTHS,
	ENTRY_POINTS,
	entryPointId,
	resolveCall,
} from "./core/dispatch.js";
export {
	classifyExit,
	diagnosticOf,
	exitCodeOf,
	type ReportDepth,
} from "./core/decision.js";
export type { DocEngine, EngineCall, EngineMethod } from "./core/types/engine.js";
export type { Invocation, RunnerConfig } from "./core/types/config.js";
export { parseTerm } from "./core/term/parser.js";
export { formatTerm } from "./core/term/format.js";
export {
	atom,
	binary,
	EMPTY_LIST,
	float,
	int,
	list,
	map,
	str,
	type Term,
	tuple,
} from "./core/term/types.js";

// ═══════════════════════════════════════════════════════════════════════════════
// SHELL (host, lifecycle, runtime)
// ═══════════════════════════════════════════════════════════════════════════════

export { type HostProcess, nodeHost } from "./shell/host/process-host.js";
export {
	type LifecycleOptions,
	runBoundary,
	runLifecycle,
	terminate,
} from "./shell/lifecycle/controller.js";
export { ServiceRegistry } from "./shell/runtime/registry.js";
export { awaitReady } from "./shell/runtime/startup-gate.js";
export { engineFromModule, loadEngine } from "./shell/engine/loader.js";
export { loadRunnerConfig } from "./shell/config/loader.js";
