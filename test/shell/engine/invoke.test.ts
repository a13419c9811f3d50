// CHANGE: Specs for the engine call boundary
// WHY: Engine throws (sync or async) must become typed failures; Error and non-Error throws are told apart
// PURITY: SHELL
// INVARIANT: Error → EngineError, anything else → AbnormalSignal

import { Effect } from "effect";
import { describe, expect, it } from "vitest";

import { atom, EMPTY_LIST, list, str } from "../../../src/core/term/types.js";
import { invokeEngine } from "../../../src/shell/engine/invoke.js";
import { recordingEngine } from "../../utils/engine.js";

describe("invokeEngine", () => {
	it("calls the selected method with the dispatched terms", async () => {
		const { engine, calls } = recordingEngine();
		const result = await Effect.runPromise(
			invokeEngine(engine, { method: "tocWithOptions", args: [str("."), list([str("a")]), EMPTY_LIST] }),
		);
		expect(result).toBe("ok");
		expect(calls).toEqual([
			{ method: "tocWithOptions", args: [str("."), list([str("a")]), EMPTY_LIST] },
		]);
	});

	it("awaits a returned promise", async () => {
		const { engine } = recordingEngine(() => Promise.resolve("done"));
		const result = await Effect.runPromise(
			invokeEngine(engine, { method: "application", args: [atom("myapp")] }),
		);
		expect(result).toBe("done");
	});

	it("maps a thrown Error to EngineError", async () => {
		const { engine } = recordingEngine(() => {
			throw new Error("disk full");
		});
		const error = await Effect.runPromise(
			Effect.flip(invokeEngine(engine, { method: "file", args: [str("a.src"), EMPTY_LIST] })),
		);
		expect(error._tag).toBe("EngineError");
		expect(error).toMatchObject({ method: "file", error: new Error("disk full") });
	});

	it("maps a rejected promise to EngineError", async () => {
		const { engine } = recordingEngine(() => Promise.reject(new RangeError("too deep")));
		const error = await Effect.runPromise(
			Effect.flip(invokeEngine(engine, { method: "files", args: [list([str("a.src")])] })),
		);
		expect(error._tag).toBe("EngineError");
		expect(error.method).toBe("files");
	});

	it("maps a thrown non-Error to AbnormalSignal", async () => {
		const { engine } = recordingEngine(() => {
			throw "oops";
		});
		const error = await Effect.runPromise(
			Effect.flip(invokeEngine(engine, { method: "packages", args: [atom("pkg")] })),
		);
		expect(error).toMatchObject({ _tag: "AbnormalSignal", method: "packages", value: "oops" });
	});
});
