// CHANGE: Specs for the constant-term grammar
// WHY: The decoder accepts only literal values; every rejected form must fail with a stable message and column
// PURITY: CORE
// INVARIANT: parseTerm returns Left exactly for non-constant or malformed input
// COMPLEXITY: O(n) per assertion

import { Either } from "effect";
import { describe, expect, it } from "vitest";

import { formatTerm } from "../../../src/core/term/format.js";
import { parseTerm } from "../../../src/core/term/parser.js";
import {
	atom,
	binary,
	EMPTY_LIST,
	float,
	int,
	list,
	map,
	str,
	type Term,
	tuple,
} from "../../../src/core/term/types.js";

const parsed = (text: string): Term =>
	Either.getOrThrowWith(parseTerm(text), (e) => new Error(`${e.message} (column ${e.column})`));

const rejected = (text: string): { readonly message: string; readonly column: number } =>
	Either.match(parseTerm(text), {
		onLeft: (e) => ({ message: e.message, column: e.column }),
		onRight: (term) => {
			throw new Error(`unexpectedly parsed as ${formatTerm(term)}`);
		},
	});

describe("parseTerm: atoms and strings", () => {
	it("reads bare and quoted atoms", () => {
		expect(parsed("myapp")).toEqual(atom("myapp"));
		expect(parsed("'hello world'")).toEqual(atom("hello world"));
		expect(parsed("node@host")).toEqual(atom("node@host"));
	});

	it("accepts a reserved word when it is quoted", () => {
		expect(parsed("'after'")).toEqual(atom("after"));
	});

	it("reads strings with escapes", () => {
		expect(parsed('"a.src"')).toEqual(str("a.src"));
		expect(parsed('"a\\x41b"')).toEqual(str("aAb"));
		expect(parsed('"tab\\there"')).toEqual(str("tab\there"));
		expect(parsed('"\\x{1F600}"')).toEqual(str("😀"));
		expect(parsed('"\\101"')).toEqual(str("A"));
		expect(parsed('"say \\"hi\\""')).toEqual(str('say "hi"'));
	});

	it("concatenates adjacent string literals", () => {
		expect(parsed('"ab" "cd"')).toEqual(str("abcd"));
	});
});

describe("parseTerm: numbers", () => {
	it("reads integers with a sign, radix and digit separators", () => {
		expect(parsed("42")).toEqual(int(42));
		expect(parsed("-7")).toEqual(int(-7));
		expect(parsed("+3")).toEqual(int(3));
		expect(parsed("16#ff")).toEqual(int(255));
		expect(parsed("2#101")).toEqual(int(5));
		expect(parsed("1_000_000")).toEqual(int(1_000_000));
	});

	it("keeps integers beyond the double range exact", () => {
		expect(parsed("123456789012345678901234567890")).toEqual(
			int(123456789012345678901234567890n),
		);
	});

	it("reads character literals as their code point", () => {
		expect(parsed("$a")).toEqual(int(97));
		expect(parsed("$\\n")).toEqual(int(10));
	});

	it("reads floats with an optional exponent", () => {
		expect(parsed("2.5")).toEqual(float(2.5));
		expect(parsed("2.5e3")).toEqual(float(2500));
		expect(parsed("1.0e-2")).toEqual(float(0.01));
		expect(parsed("-0.5")).toEqual(float(-0.5));
	});
});

describe("parseTerm: compound terms", () => {
	it("reads lists, including improper tails", () => {
		expect(parsed("[]")).toEqual(EMPTY_LIST);
		expect(parsed('[{dir, "out"}]')).toEqual(list([tuple([atom("dir"), str("out")])]));
		expect(parsed("[a | b]")).toEqual(list([atom("a")], atom("b")));
		expect(parsed("[a | [b]]")).toEqual(list([atom("a"), atom("b")]));
	});

	it("reads tuples", () => {
		expect(parsed("{}")).toEqual(tuple([]));
		expect(parsed('{vsn, "1.0"}')).toEqual(tuple([atom("vsn"), str("1.0")]));
	});

	it("reads maps in source order", () => {
		expect(parsed('#{a => 1, "k" => [x]}')).toEqual(
			map([
				[atom("a"), int(1)],
				[str("k"), list([atom("x")])],
			]),
		);
	});

	it("reads binaries from byte and string segments", () => {
		expect(parsed('<<1, 2, "ab">>')).toEqual(binary([1, 2, 97, 98]));
		expect(parsed("<<>>")).toEqual(binary([]));
	});

	it("allows parentheses and comments around a term", () => {
		expect(parsed("(ok)")).toEqual(atom("ok"));
		expect(parsed("[a] % trailing comment")).toEqual(list([atom("a")]));
	});
});

describe("parseTerm: rejected input", () => {
	it.each([
		["X", "variable 'X' is not a constant term", 1],
		["[a, _]", "variable '_' is not a constant term", 5],
		["foo(1)", "call to 'foo' is not a constant term", 4],
		["lists:reverse([])", "remote call 'lists:...' is not a constant term", 6],
		["1 + 2", "operator '+' is not allowed in a constant term", 3],
		["-a", "operators other than a sign on a number are not constant", 1],
		["#rec{a = 1}", "records are not constant terms", 2],
		["#{a := 1}", "map updates are not constant terms", 5],
		["#{a => 1}#{}", "map updates are not constant terms", 10],
		["<<256>>", "binary segment out of range 0..255", 3],
		["<<1:8>>", "binary segment size and type specifiers are not supported", 4],
		["[1](2)", "calls are not constant terms", 4],
		["begin", "'begin' is not a constant term", 1],
		["not a term", "'not' is not a constant term", 1],
	])("%s → %s", (text, message, column) => {
		expect(rejected(text)).toEqual({ message, column });
	});

	it("reports truncated and trailing input", () => {
		expect(rejected("")).toEqual({ message: "syntax error before: end of input", column: 1 });
		expect(rejected("[a, b")).toEqual({
			message: "syntax error before: end of input",
			column: 6,
		});
		expect(rejected("a b")).toEqual({ message: "syntax error before: 'b'", column: 3 });
		expect(rejected("a.")).toEqual({ message: "syntax error before: '.'", column: 2 });
	});

	it("reports lexical errors at the offending character", () => {
		expect(rejected('"abc')).toEqual({ message: "unterminated string", column: 1 });
		expect(rejected("x 'abc")).toEqual({ message: "unterminated quoted atom", column: 3 });
		expect(rejected("&")).toEqual({ message: "illegal character '&'", column: 1 });
		expect(rejected("@foo")).toEqual({ message: "illegal character '@'", column: 1 });
		expect(rejected("{a, @b}")).toEqual({ message: "illegal character '@'", column: 5 });
		expect(rejected("1#0")).toEqual({ message: "illegal base '1'", column: 2 });
		expect(rejected("16#")).toEqual({ message: "illegal integer in base 16", column: 4 });
		expect(rejected("2#102")).toEqual({ message: "illegal digit '2' in base 2", column: 5 });
		expect(rejected('"\\x4"')).toEqual({ message: "illegal \\x escape sequence", column: 4 });
		expect(rejected("1.0e999")).toEqual({ message: "float '1.0e999' out of range", column: 1 });
	});
});
