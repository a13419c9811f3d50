// CHANGE: Load the documentation engine from a configured ES module
// WHY: The engine is an external collaborator; the adapter binds to it by name at startup
// PURITY: SHELL (dynamic import)
// EFFECT: Effect<DocEngine, EngineUnavailable>
// INVARIANT: A loaded engine exposes every DocEngine method; missing exports fail when called
// COMPLEXITY: O(1)

import * as path from "node:path";
import { pathToFileURL } from "node:url";

import { Effect, Either } from "effect";

import { EngineUnavailable } from "../../core/errors.js";
import {
	type DocEngine,
	ENGINE_METHODS,
	type EngineMethod,
} from "../../core/types/engine.js";
import type { Term } from "../../core/term/types.js";

type ModuleRecord = Readonly<Record<string, unknown>>;

const isRecord = (value: unknown): value is ModuleRecord =>
	(typeof value === "object" || typeof value === "function") && value !== null;

const exportsAnyMethod = (source: ModuleRecord): boolean =>
	ENGINE_METHODS.some((m) => typeof source[m] === "function");

/**
 * Named exports win; a default-exported object is used when the module has
 * no named engine functions.
 */
function engineSource(mod: unknown): ModuleRecord | null {
	if (!isRecord(mod)) return null;
	if (exportsAnyMethod(mod)) return mod;
	const fallback = mod["default"];
	return isRecord(fallback) && exportsAnyMethod(fallback) ? fallback : null;
}

/**
 * Builds a DocEngine from a loaded module namespace.
 *
 * @returns Right(engine), or Left when the module exports none of the engine methods
 *
 * @pure true (the returned functions call into the module)
 */
export function engineFromModule(
	mod: unknown,
	specifier: string,
): Either.Either<DocEngine, EngineUnavailable> {
	const source = engineSource(mod);
	if (source === null) {
		return Either.left(
			new EngineUnavailable({
				reason: `engine module '${specifier}' exports none of: ${ENGINE_METHODS.join(", ")}`,
			}),
		);
	}

	const method =
		(name: EngineMethod) =>
		(...args: Term[]): unknown => {
			const fn = source[name];
			if (typeof fn !== "function") {
				throw new Error(`engine module '${specifier}' does not export '${name}'`);
			}
			return Reflect.apply(fn, source, args);
		};

	return Either.right({
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
	});
}

/**
 * Module URL for an engine specifier: paths are resolved against `cwd`,
 * bare package names are left to the module resolver.
 *
 * @pure true
 */
export function engineModuleId(specifier: string, cwd: string): string {
	const isPath =
		specifier.startsWith(".") || path.isAbsolute(specifier);
	return isPath ? pathToFileURL(path.resolve(cwd, specifier)).href : specifier;
}

/**
 * Imports and validates the engine module.
 *
 * @pure false (module loading)
 * @effect Effect<DocEngine, EngineUnavailable>
 */
export const loadEngine = (
	specifier: string | null,
	cwd: string,
): Effect.Effect<DocEngine, EngineUnavailable> => {
	if (specifier === null) {
		return Effect.fail(
			new EngineUnavailable({
				reason: "no engine configured (set DOC_RUN_ENGINE or \"engine\" in doc-run.config.json)",
			}),
		);
	}
	return Effect.tryPromise({
		try: (): Promise<unknown> => import(engineModuleId(specifier, cwd)),
		catch: (error) =>
			new EngineUnavailable({
				reason: `cannot load engine module '${specifier}': ${
					error instanceof Error ? error.message : String(error)
				}`,
			}),
	}).pipe(
		Effect.flatMap((mod) =>
			Either.match(engineFromModule(mod, specifier), {
				onLeft: (e) => Effect.fail(e),
				onRight: (engine) => Effect.succeed(engine),
			}),
		),
	);
};
