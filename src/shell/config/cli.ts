// CHANGE: Command-line surface `doc-run <entry-point> <token>...`
// WHY: Tokens are term literals, not flags; only the first argument selects the operation
// PURITY: CORE-like (pure over the given argv)
// INVARIANT: tokens are passed through verbatim and in order, including empty strings
// COMPLEXITY: O(n) where n = |argv|

import type { Invocation } from "../../core/types/config.js";

export const USAGE = [
	"usage: doc-run <entry-point> <term>...",
	"",
	"entry points:",
	"  file <File> [<Options>]",
	"  files <Files> [<Options>]",
	"  packages <Packages> [<Options>]",
	"  application <App> [<Options>] | <App> <Dir> <Options>",
	"  toc <Dir> <Paths> [<Options>]",
	"",
	"Each term is a constant literal, e.g.",
	`  doc-run application myapp '"."' '[{def,{vsn,"1.0"}}]'`,
].join("\n");

/**
 * Parses the command line (without the node and script entries).
 *
 * @example
 * ```ts
 * parseCLIArgs(["file", '"a.src"']) // { kind: "run", entry: "file", tokens: ['"a.src"'] }
 * parseCLIArgs(["--help"])          // { kind: "help" }
 * ```
 */
export function parseCLIArgs(argv: ReadonlyArray<string>): Invocation {
	const [entry, ...tokens] = argv;
	if (entry === undefined) return { kind: "run", entry: null, tokens: [] };
	if (tokens.length === 0 && (entry === "--help" || entry === "-h")) {
		return { kind: "help" };
	}
	return { kind: "run", entry, tokens };
}
