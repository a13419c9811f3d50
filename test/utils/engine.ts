// CHANGE: Recording documentation engine for APP and SHELL tests
// WHY: Assert which engine method ran with which decoded terms, and simulate engine failures

import type { Term } from "../../src/core/term/types.js";
import type { DocEngine, EngineMethod } from "../../src/core/types/engine.js";

export interface RecordedCall {
	readonly method: EngineMethod;
	readonly args: ReadonlyArray<Term>;
}

export interface RecordingEngine {
	readonly engine: DocEngine;
	readonly calls: RecordedCall[];
}

/**
 * Engine whose every method records its call and then runs `behavior`.
 */
export const recordingEngine = (
	behavior: (method: EngineMethod) => unknown = () => "ok",
): RecordingEngine => {
	const calls: RecordedCall[] = [];
	const method =
		(name: EngineMethod) =>
		(...args: Term[]): unknown => {
			calls.push({ method: name, args });
			return behavior(name);
		};
	return {
		calls,
		engine: {
			file: method("file"),
			files: method("files"),
			filesWithOptions: method("filesWithOptions"),
			packages: method("packages"),
			packagesWithOptions: method("packagesWithOptions"),
			application: method("application"),
			applicationWithOptions: method("applicationWithOptions"),
			applicationWithDir: method("applicationWithDir"),
			toc: method("toc"),
			tocWithOptions: method("tocWithOptions"),
		},
	};
};
