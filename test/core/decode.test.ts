// CHANGE: Specs for raw-token decoding
// WHY: Each token becomes one term; the first undecodable token aborts with a DecodeError naming it
// PURITY: CORE
// INVARIANT: decodeArguments preserves order and length on success

import { Effect, Either } from "effect";
import { describe, expect, it } from "vitest";

import { decodeArgument, decodeArguments, tokenText } from "../../src/core/decode.js";
import { atom, list, str, tuple } from "../../src/core/term/types.js";

describe("tokenText", () => {
	it("uses strings verbatim and symbols by key or description", () => {
		expect(tokenText('"a.src"')).toBe('"a.src"');
		expect(tokenText(Symbol.for("myapp"))).toBe("myapp");
		expect(tokenText(Symbol("toc"))).toBe("toc");
		expect(tokenText(Symbol())).toBe("");
	});
});

describe("decodeArgument", () => {
	it("decodes string and symbol tokens", () => {
		expect(Either.getOrThrow(decodeArgument('"a.src"'))).toEqual(str("a.src"));
		expect(Either.getOrThrow(decodeArgument(Symbol.for("myapp")))).toEqual(atom("myapp"));
	});

	it("names the token and the column of the first error", () => {
		const error = Either.getOrThrow(Either.flip(decodeArgument("X")));
		expect(error).toMatchObject({
			_tag: "DecodeError",
			token: "X",
			detail: "variable 'X' is not a constant term (column 1)",
		});
	});
});

describe("decodeArguments", () => {
	it("decodes every token in order", () => {
		const args = Effect.runSync(decodeArguments(['"a.src"', '[{dir, "out"}]']));
		expect(args).toEqual([str("a.src"), list([tuple([atom("dir"), str("out")])])]);
	});

	it("decodes an empty token list to an empty argument list", () => {
		expect(Effect.runSync(decodeArguments([]))).toEqual([]);
	});

	it("stops at the first invalid token", () => {
		const error = Effect.runSync(Effect.flip(decodeArguments(["ok", "[a", "X"])));
		expect(error).toMatchObject({
			_tag: "DecodeError",
			token: "[a",
			detail: "syntax error before: end of input (column 3)",
		});
	});

	it("rejects text that is not a term at all", () => {
		const error = Effect.runSync(Effect.flip(decodeArguments(["not a term"])));
		expect(error.token).toBe("not a term");
		expect(error.detail).toBe("'not' is not a constant term (column 1)");
	});
});
