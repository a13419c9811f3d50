// CHANGE: Printer for constant terms with an optional depth bound
// WHY: Diagnostics must render decoded values on one line without dumping unbounded structures
// PURITY: CORE
// INVARIANT: depth = ∞ ⇒ parseTerm(formatTerm(t)) = Right(t)
// COMPLEXITY: O(size of the printed prefix)

import { match } from "ts-pattern";

import { RESERVED_WORDS, type Term } from "./types.js";

const BARE_ATOM = /^[a-z][A-Za-z0-9_@]*$/;

export function escapeText(value: string, quote: string): string {
	let out = "";
	for (const ch of value) {
		const code = ch.codePointAt(0) ?? 0;
		if (ch === "\\" || ch === quote) out += `\\${ch}`;
		else if (ch === "\n") out += "\\n";
		else if (ch === "\t") out += "\\t";
		else if (ch === "\r") out += "\\r";
		else if (code < 32 || code === 127) out += `\\x{${code.toString(16)}}`;
		else out += ch;
	}
	return out;
}

export function formatAtom(name: string): string {
	return BARE_ATOM.test(name) && !RESERVED_WORDS.has(name)
		? name
		: `'${escapeText(name, "'")}'`;
}

/**
 * Prints a float so that it always scans back as a float (`5` → `5.0`,
 * `1e+21` → `1.0e21`).
 */
export function formatFloat(value: number): string {
	if (Object.is(value, -0)) return "-0.0";
	const text = String(value);
	const [mantissa = text, exponent] = text.split("e");
	const withPoint = mantissa.includes(".") ? mantissa : `${mantissa}.0`;
	return exponent === undefined
		? withPoint
		: `${withPoint}e${exponent.replace("+", "")}`;
}

/**
 * Joins the first `depth - 1` elements; the rest become `...`.
 */
function bounded<T>(
	items: ReadonlyArray<T>,
	depth: number,
	render: (item: T, depth: number) => string,
	more: string,
): string {
	if (items.length === 0) return "";
	if (depth <= 1) return "...";
	const shown = items.slice(0, depth - 1).map((item) => render(item, depth - 1));
	return items.length > shown.length ? `${shown.join(",")}${more}` : shown.join(",");
}

/**
 * Renders a term in literal syntax.
 *
 * @param depth - Nesting/length bound; `Infinity` prints everything
 *
 * @example
 * ```ts
 * formatTerm(list([tuple([atom("dir"), str("out")])])) // '[{dir,"out"}]'
 * formatTerm(list([int(1), int(2), int(3)]), 2)        // '[1|...]'
 * ```
 */
export function formatTerm(term: Term, depth = Number.POSITIVE_INFINITY): string {
	if (depth <= 0) return "...";
	return match(term)
		.with({ _tag: "Atom" }, (t) => formatAtom(t.name))
		.with({ _tag: "Str" }, (t) => `"${escapeText(t.value, '"')}"`)
		.with({ _tag: "Int" }, (t) => t.value.toString())
		.with({ _tag: "Float" }, (t) => formatFloat(t.value))
		.with({ _tag: "List" }, (t) => {
			const body = bounded(t.items, depth, formatTerm, "|...");
			const truncated = depth <= 1 || t.items.length > depth - 1;
			const tail =
				t.tail === null || truncated ? "" : `|${formatTerm(t.tail, depth - 1)}`;
			return `[${body}${tail}]`;
		})
		.with({ _tag: "Tuple" }, (t) => `{${bounded(t.items, depth, formatTerm, ",...")}}`)
		.with(
			{ _tag: "Map" },
			(t) =>
				`#{${bounded(
					t.entries,
					depth,
					([k, v], d) => `${formatTerm(k, d)} => ${formatTerm(v, d)}`,
					",...",
				)}}`,
		)
		.with(
			{ _tag: "Binary" },
			(t) => `<<${bounded(t.bytes, depth, (b) => String(b), ",...")}>>`,
		)
		.exhaustive();
}
