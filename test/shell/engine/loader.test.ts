// CHANGE: Specs for building a DocEngine from a module namespace
// WHY: The engine is bound by name at startup; a module without engine functions must be rejected up front
// PURITY: SHELL
// INVARIANT: A method the module does not export throws when called, not when loaded

import * as os from "node:os";

import { Effect, Either } from "effect";
import { describe, expect, it } from "vitest";

import { atom, EMPTY_LIST, str, type Term } from "../../../src/core/term/types.js";
import {
	engineFromModule,
	engineModuleId,
	loadEngine,
} from "../../../src/shell/engine/loader.js";

describe("engineFromModule", () => {
	it("binds named exports", () => {
		const mod = { file: (file: Term, options: Term): unknown => ["file", file, options] };
		const engine = Either.getOrThrow(engineFromModule(mod, "./engine.js"));
		expect(engine.file(str("a.src"), EMPTY_LIST)).toEqual(["file", str("a.src"), EMPTY_LIST]);
	});

	it("throws when a method the module lacks is called", () => {
		const engine = Either.getOrThrow(engineFromModule({ files: () => 1 }, "./engine.js"));
		expect(() => engine.toc(str("."), EMPTY_LIST)).toThrow(
			"engine module './engine.js' does not export 'toc'",
		);
	});

	it("falls back to a default-exported object and keeps its receiver", () => {
		const impl = {
			runs: 0,
			files(): number {
				this.runs += 1;
				return this.runs;
			},
		};
		const engine = Either.getOrThrow(engineFromModule({ default: impl }, "doc-engine"));
		expect(engine.files(atom("a"))).toBe(1);
		expect(impl.runs).toBe(1);
	});

	it("rejects modules that export no engine function", () => {
		const error = Either.getOrThrow(Either.flip(engineFromModule({ version: 1 }, "x")));
		expect(error.reason).toBe(
			"engine module 'x' exports none of: file, files, filesWithOptions, packages, packagesWithOptions, application, applicationWithOptions, applicationWithDir, toc, tocWithOptions",
		);
		expect(Either.isLeft(engineFromModule(42, "x"))).toBe(true);
	});
});

describe("engineModuleId", () => {
	it("turns paths into file URLs and leaves package names alone", () => {
		expect(engineModuleId("./engine.js", "/work")).toBe("file:///work/engine.js");
		expect(engineModuleId("/opt/engine.js", "/work")).toBe("file:///opt/engine.js");
		expect(engineModuleId("doc-engine", "/work")).toBe("doc-engine");
	});
});

describe("loadEngine", () => {
	it("fails when no engine is configured", async () => {
		const error = await Effect.runPromise(Effect.flip(loadEngine(null, os.tmpdir())));
		expect(error.reason).toBe(
			'no engine configured (set DOC_RUN_ENGINE or "engine" in doc-run.config.json)',
		);
	});

	it("fails when the module cannot be imported", async () => {
		const error = await Effect.runPromise(
			Effect.flip(loadEngine("./missing-doc-engine.mjs", os.tmpdir())),
		);
		expect(error._tag).toBe("EngineUnavailable");
		expect(error.reason).toMatch(/^cannot load engine module '\.\/missing-doc-engine\.mjs': /);
	});
});
