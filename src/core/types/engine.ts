// CHANGE: Contract of the external documentation engine
// WHY: The adapter only ever reaches the engine through this fixed set of operations
// PURITY: CORE (types only)
// INVARIANT: Every method receives decoded terms in positional order; return values are opaque

import type { Term } from "../term/types.js";

/**
 * The documentation engine. Methods may return anything, or a promise of
 * anything; only "returned" versus "threw" is observed.
 */
export interface DocEngine {
	/** Single source file; `options` is `[]` when the caller gave none. */
	readonly file: (file: Term, options: Term) => unknown;
	readonly files: (files: Term) => unknown;
	readonly filesWithOptions: (files: Term, options: Term) => unknown;
	readonly packages: (packages: Term) => unknown;
	readonly packagesWithOptions: (packages: Term, options: Term) => unknown;
	readonly application: (app: Term) => unknown;
	readonly applicationWithOptions: (app: Term, options: Term) => unknown;
	readonly applicationWithDir: (app: Term, dir: Term, options: Term) => unknown;
	/** Table of contents for `dir` over the given paths. */
	readonly toc: (dir: Term, paths: Term) => unknown;
	readonly tocWithOptions: (dir: Term, paths: Term, options: Term) => unknown;
}

export type EngineMethod = keyof DocEngine;

export const ENGINE_METHODS: ReadonlyArray<EngineMethod> = [
	"file",
	"files",
	"filesWithOptions",
	"packages",
	"packagesWithOptions",
	"application",
	"applicationWithOptions",
	"applicationWithDir",
	"toc",
	"tocWithOptions",
];

/**
 * The dispatcher's decision: which engine method to call, with which terms.
 *
 * @invariant args.length === arity of DocEngine[method]
 */
export type EngineCall = {
	readonly [M in EngineMethod]: {
		readonly method: M;
		readonly args: Readonly<Parameters<DocEngine[M]>>;
	};
}[EngineMethod];
