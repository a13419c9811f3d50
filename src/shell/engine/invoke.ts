// CHANGE: Apply a dispatched EngineCall to the engine under a typed error boundary
// WHY: The engine is opaque; its throws (sync or async) must become typed failures, never escape
// PURITY: SHELL
// EFFECT: Effect<unknown, EngineError | AbnormalSignal>
// INVARIANT: thrown Error → EngineError; any other thrown value → AbnormalSignal
// COMPLEXITY: O(1) plus the engine's own work

import { Effect } from "effect";

import { AbnormalSignal, EngineError } from "../../core/errors.js";
import type { DocEngine, EngineCall } from "../../core/types/engine.js";

function apply(engine: DocEngine, call: EngineCall): unknown {
	switch (call.method) {
		case "file":
			return engine.file(...call.args);
		case "files":
			return engine.files(...call.args);
		case "filesWithOptions":
			return engine.filesWithOptions(...call.args);
		case "packages":
			return engine.packages(...call.args);
		case "packagesWithOptions":
			return engine.packagesWithOptions(...call.args);
		case "application":
			return engine.application(...call.args);
		case "applicationWithOptions":
			return engine.applicationWithOptions(...call.args);
		case "applicationWithDir":
			return engine.applicationWithDir(...call.args);
		case "toc":
			return engine.toc(...call.args);
		case "tocWithOptions":
			return engine.tocWithOptions(...call.args);
	}
}

/**
 * Runs one engine operation. A returned promise is awaited; its value is
 * passed through untouched.
 *
 * @pure false (runs engine code)
 * @effect Effect<unknown, EngineError | AbnormalSignal>
 */
export const invokeEngine = (
	engine: DocEngine,
	call: EngineCall,
): Effect.Effect<unknown, EngineError | AbnormalSignal> =>
	Effect.tryPromise({
		try: async () => apply(engine, call),
		catch: (thrown) =>
			thrown instanceof Error
				? new EngineError({ method: call.method, error: thrown })
				: new AbnormalSignal({ method: call.method, value: thrown }),
	});
