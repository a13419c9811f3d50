// CHANGE: Introduce the constant-term model for decoded command-line arguments
// WHY: Every token the launcher hands over is a literal term; downstream code needs a typed, immutable shape
// PURITY: CORE
// INVARIANT: Terms are plain readonly records discriminated by `_tag`; deep equality = structural equality
// COMPLEXITY: O(1) per constructor

/**
 * Atom (symbol), e.g. `myapp` or `'hello world'`.
 */
export interface AtomTerm {
	readonly _tag: "Atom";
	readonly name: string;
}

/**
 * Double-quoted string literal.
 */
export interface StrTerm {
	readonly _tag: "Str";
	readonly value: string;
}

/**
 * Integer of arbitrary precision (decimal, radix or character literal).
 */
export interface IntTerm {
	readonly _tag: "Int";
	readonly value: bigint;
}

export interface FloatTerm {
	readonly _tag: "Float";
	readonly value: number;
}

/**
 * List literal. `tail` is `null` for proper lists; an improper list such as
 * `[a | b]` keeps its non-list tail.
 *
 * @invariant tail === null ∨ (items.length > 0 ∧ tail._tag !== "List")
 */
export interface ListTerm {
	readonly _tag: "List";
	readonly items: ReadonlyArray<Term>;
	readonly tail: Term | null;
}

export interface TupleTerm {
	readonly _tag: "Tuple";
	readonly items: ReadonlyArray<Term>;
}

/**
 * Map literal `#{k => v}`; entries are kept in source order.
 */
export interface MapTerm {
	readonly _tag: "Map";
	readonly entries: ReadonlyArray<readonly [Term, Term]>;
}

/**
 * Binary literal `<<1, 2, "ab">>` flattened to its bytes.
 *
 * @invariant ∀b ∈ bytes: 0 ≤ b ≤ 255
 */
export interface BinaryTerm {
	readonly _tag: "Binary";
	readonly bytes: ReadonlyArray<number>;
}

/**
 * A decoded argument: any constant literal term.
 */
export type Term =
	| AtomTerm
	| StrTerm
	| IntTerm
	| FloatTerm
	| ListTerm
	| TupleTerm
	| MapTerm
	| BinaryTerm;

const TERM_TAGS: ReadonlySet<string> = new Set([
	"Atom",
	"Str",
	"Int",
	"Float",
	"List",
	"Tuple",
	"Map",
	"Binary",
]);

/**
 * Recognizes a term among arbitrary values (e.g. a value an engine threw).
 */
export const isTerm = (value: unknown): value is Term =>
	typeof value === "object" &&
	value !== null &&
	"_tag" in value &&
	typeof value._tag === "string" &&
	TERM_TAGS.has(value._tag);

export const atom = (name: string): AtomTerm => ({ _tag: "Atom", name });

export const str = (value: string): StrTerm => ({ _tag: "Str", value });

export const int = (value: bigint | number): IntTerm => ({
	_tag: "Int",
	value: typeof value === "bigint" ? value : BigInt(value),
});

export const float = (value: number): FloatTerm => ({ _tag: "Float", value });

/**
 * Builds a list, folding a list-shaped tail into the items.
 *
 * @example
 * ```ts
 * list([atom("a")], list([atom("b")])) // same as list([atom("a"), atom("b")])
 * ```
 */
export const list = (
	items: ReadonlyArray<Term>,
	tail: Term | null = null,
): ListTerm => {
	if (tail !== null && tail._tag === "List") {
		return list([...items, ...tail.items], tail.tail);
	}
	return { _tag: "List", items, tail: items.length === 0 ? null : tail };
};

export const tuple = (items: ReadonlyArray<Term>): TupleTerm => ({
	_tag: "Tuple",
	items,
});

export const map = (
	entries: ReadonlyArray<readonly [Term, Term]>,
): MapTerm => ({ _tag: "Map", entries });

export const binary = (bytes: ReadonlyArray<number>): BinaryTerm => ({
	_tag: "Binary",
	bytes,
});

/**
 * The empty list `[]`, used as the implied "no options" value.
 */
export const EMPTY_LIST: ListTerm = list([]);

/**
 * Words that scan as atoms but are reserved by the term language and
 * therefore must be quoted when printed.
 */
export const RESERVED_WORDS: ReadonlySet<string> = new Set([
	"after",
	"and",
	"andalso",
	"band",
	"begin",
	"bnot",
	"bor",
	"bsl",
	"bsr",
	"bxor",
	"case",
	"catch",
	"cond",
	"div",
	"else",
	"end",
	"fun",
	"if",
	"let",
	"maybe",
	"not",
	"of",
	"or",
	"orelse",
	"receive",
	"rem",
	"try",
	"when",
	"xor",
]);
