// CHANGE: Length-based overload resolution from decoded arguments to engine methods
// WHY: One textual call surface serves several call shapes without a flags syntax
// PURITY: CORE
// INVARIANT: resolveCall depends only on entry and args.length; element contents are never inspected
// COMPLEXITY: O(1)

import { Option } from "effect";
import { match, P } from "ts-pattern";

import type { ArgumentList, EntryPointName } from "./models.js";
import { EMPTY_LIST } from "./term/types.js";
import type { EngineCall } from "./types/engine.js";

export const ENTRY_POINTS: ReadonlyArray<EntryPointName> = [
	"file",
	"files",
	"packages",
	"application",
	"toc",
];

/**
 * Argument-list lengths each entry point accepts.
 */
export const ACCEPTED_LENGTHS: Readonly<Record<EntryPointName, ReadonlyArray<number>>> = {
	file: [1, 2],
	files: [1, 2],
	packages: [1, 2],
	application: [1, 2, 3],
	toc: [2, 3],
};

export const isEntryPointName = (name: string): name is EntryPointName =>
	ENTRY_POINTS.some((entry) => entry === name);

/**
 * Identity used in invalid-arguments diagnostics, e.g. `doc-run:files/1`.
 */
export const entryPointId = (name: string): string => `doc-run:${name}/1`;

const fileCall = (args: ArgumentList): Option.Option<EngineCall> =>
	match(args)
		.with([P._], ([file]) => Option.some<EngineCall>({ method: "file", args: [file, EMPTY_LIST] }))
		.with([P._, P._], ([file, options]) =>
			Option.some<EngineCall>({ method: "file", args: [file, options] }),
		)
		.otherwise(() => Option.none());

const filesCall = (args: ArgumentList): Option.Option<EngineCall> =>
	match(args)
		.with([P._], ([files]) => Option.some<EngineCall>({ method: "files", args: [files] }))
		.with([P._, P._], ([files, options]) =>
			Option.some<EngineCall>({ method: "filesWithOptions", args: [files, options] }),
		)
		.otherwise(() => Option.none());

const packagesCall = (args: ArgumentList): Option.Option<EngineCall> =>
	match(args)
		.with([P._], ([packages]) =>
			Option.some<EngineCall>({ method: "packages", args: [packages] }),
		)
		.with([P._, P._], ([packages, options]) =>
			Option.some<EngineCall>({ method: "packagesWithOptions", args: [packages, options] }),
		)
		.otherwise(() => Option.none());

const applicationCall = (args: ArgumentList): Option.Option<EngineCall> =>
	match(args)
		.with([P._], ([app]) => Option.some<EngineCall>({ method: "application", args: [app] }))
		.with([P._, P._], ([app, options]) =>
			Option.some<EngineCall>({ method: "applicationWithOptions", args: [app, options] }),
		)
		.with([P._, P._, P._], ([app, dir, options]) =>
			Option.some<EngineCall>({ method: "applicationWithDir", args: [app, dir, options] }),
		)
		.otherwise(() => Option.none());

const tocCall = (args: ArgumentList): Option.Option<EngineCall> =>
	match(args)
		.with([P._, P._], ([dir, paths]) =>
			Option.some<EngineCall>({ method: "toc", args: [dir, paths] }),
		)
		.with([P._, P._, P._], ([dir, paths, options]) =>
			Option.some<EngineCall>({ method: "tocWithOptions", args: [dir, paths, options] }),
		)
		.otherwise(() => Option.none());

const RESOLVERS: Readonly<
	Record<EntryPointName, (args: ArgumentList) => Option.Option<EngineCall>>
> = {
	file: fileCall,
	files: filesCall,
	packages: packagesCall,
	application: applicationCall,
	toc: tocCall,
};

/**
 * Selects the engine method for an entry point and a decoded argument list.
 *
 * @returns Some(call) when the length is accepted, otherwise None
 *
 * @pure true
 * @postcondition Option.isSome(result) ↔ ACCEPTED_LENGTHS[entry].includes(args.length)
 *
 * @example
 * ```ts
 * resolveCall("file", [str("a.src")])
 * // Some({ method: "file", args: [str("a.src"), EMPTY_LIST] })
 * resolveCall("toc", [str(".")]) // None
 * ```
 */
export const resolveCall = (
	entry: EntryPointName,
	args: ArgumentList,
): Option.Option<EngineCall> => RESOLVERS[entry](args);
