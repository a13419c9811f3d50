// CHANGE: Recursive-descent parser for constant terms
// WHY: Arguments must be literal values; anything that would need evaluation (variables, calls,
//      operators) is rejected instead of being coerced
// PURITY: CORE
// INVARIANT: parseTerm(s) = Right(t) ⇒ s contains exactly one complete constant term
// COMPLEXITY: O(n) where n = number of tokens

import { Either } from "effect";

import { TermSyntaxError } from "../errors.js";
import { scan, type Token } from "./scanner.js";
import {
	atom,
	binary,
	float,
	int,
	list,
	map,
	str,
	type Term,
	tuple,
} from "./types.js";

const INFIX_OPERATORS: ReadonlySet<string> = new Set([
	"+",
	"-",
	"*",
	"/",
	"=",
	"<",
	">",
	"!",
	"++",
	"--",
	"->",
	"||",
]);

const describeToken = (token: Token): string => {
	switch (token.kind) {
		case "eof":
			return "end of input";
		case "string":
			return JSON.stringify(token.value);
		case "integer":
			return token.value.toString();
		case "float":
			return String(token.value);
		default:
			return `'${token.value}'`;
	}
};

class TokenStream {
	private index = 0;

	constructor(private readonly tokens: ReadonlyArray<Token>) {}

	peek(offset = 0): Token {
		const last = this.tokens.length - 1;
		return this.tokens[Math.min(this.index + offset, last)] ?? {
			kind: "eof",
			column: 1,
		};
	}

	next(): Token {
		const token = this.peek();
		if (token.kind !== "eof") this.index += 1;
		return token;
	}

	isPunct(value: string, offset = 0): boolean {
		const token = this.peek(offset);
		return token.kind === "punct" && token.value === value;
	}

	expect(value: string): void {
		if (!this.isPunct(value)) this.unexpected();
		this.next();
	}

	fail(message: string, token: Token = this.peek()): never {
		throw new TermSyntaxError({ message, column: token.column });
	}

	unexpected(token: Token = this.peek()): never {
		return this.fail(`syntax error before: ${describeToken(token)}`, token);
	}
}

/**
 * Comma-separated terms up to (not including) `close`.
 */
function parseSequence(
	ts: TokenStream,
	close: string,
	item: (ts: TokenStream) => Term,
): Term[] {
	const items: Term[] = [];
	if (ts.isPunct(close)) return items;
	items.push(item(ts));
	while (ts.isPunct(",")) {
		ts.next();
		items.push(item(ts));
	}
	return items;
}

function parseList(ts: TokenStream): Term {
	ts.expect("[");
	const items = parseSequence(ts, "]", parseExpr);
	let tail: Term | null = null;
	if (items.length > 0 && ts.isPunct("|")) {
		ts.next();
		tail = parseExpr(ts);
	}
	ts.expect("]");
	return list(items, tail);
}

function parseTuple(ts: TokenStream): Term {
	ts.expect("{");
	const items = parseSequence(ts, "}", parseExpr);
	ts.expect("}");
	return tuple(items);
}

function parseMap(ts: TokenStream): Term {
	ts.expect("#");
	if (!ts.isPunct("{")) {
		return ts.fail("records are not constant terms");
	}
	ts.next();
	const entries: Array<readonly [Term, Term]> = [];
	const entry = (): void => {
		const key = parseExpr(ts);
		if (ts.isPunct(":=")) ts.fail("map updates are not constant terms");
		ts.expect("=>");
		entries.push([key, parseExpr(ts)]);
	};
	if (!ts.isPunct("}")) {
		entry();
		while (ts.isPunct(",")) {
			ts.next();
			entry();
		}
	}
	ts.expect("}");
	if (ts.isPunct("#")) ts.fail("map updates are not constant terms");
	return map(entries);
}

function parseBinary(ts: TokenStream): Term {
	ts.expect("<<");
	const bytes: number[] = [];
	const segment = (): void => {
		const token = ts.next();
		if (token.kind === "string") {
			for (const ch of token.value) bytes.push((ch.codePointAt(0) ?? 0) & 255);
		} else if (token.kind === "integer") {
			if (token.value > 255n) ts.fail("binary segment out of range 0..255", token);
			bytes.push(Number(token.value));
		} else {
			ts.unexpected(token);
		}
		if (ts.isPunct(":") || ts.isPunct("/")) {
			ts.fail("binary segment size and type specifiers are not supported");
		}
	};
	if (!ts.isPunct(">>")) {
		segment();
		while (ts.isPunct(",")) {
			ts.next();
			segment();
		}
	}
	ts.expect(">>");
	return binary(bytes);
}

function parseSigned(ts: TokenStream): Term {
	const sign = ts.next();
	const operand = ts.next();
	const negate = sign.kind === "punct" && sign.value === "-";
	if (operand.kind === "integer") return int(negate ? -operand.value : operand.value);
	if (operand.kind === "float") return float(negate ? -operand.value : operand.value);
	return ts.fail("operators other than a sign on a number are not constant", sign);
}

function parseAtom(ts: TokenStream, name: string): Term {
	if (ts.isPunct("(")) ts.fail(`call to '${name}' is not a constant term`);
	if (ts.isPunct(":")) ts.fail(`remote call '${name}:...' is not a constant term`);
	return atom(name);
}

function parsePrimary(ts: TokenStream): Term {
	const token = ts.peek();
	switch (token.kind) {
		case "atom":
			ts.next();
			return parseAtom(ts, token.value);
		case "string": {
			let value = "";
			while (ts.peek().kind === "string") {
				const part = ts.next();
				if (part.kind === "string") value += part.value;
			}
			return str(value);
		}
		case "integer":
			ts.next();
			return int(token.value);
		case "float":
			ts.next();
			return float(token.value);
		case "var":
			return ts.fail(`variable '${token.value}' is not a constant term`);
		case "reserved":
			return ts.fail(`'${token.value}' is not a constant term`);
		case "eof":
			return ts.unexpected();
		case "punct":
			return parsePunctPrimary(ts, token.value);
	}
}

function parsePunctPrimary(ts: TokenStream, punct: string): Term {
	switch (punct) {
		case "[":
			return parseList(ts);
		case "{":
			return parseTuple(ts);
		case "#":
			return parseMap(ts);
		case "<<":
			return parseBinary(ts);
		case "+":
		case "-":
			return parseSigned(ts);
		case "(": {
			ts.next();
			const inner = parseExpr(ts);
			ts.expect(")");
			return inner;
		}
		default:
			return ts.unexpected();
	}
}

/**
 * A primary term that is not followed by an infix operator.
 */
function parseExpr(ts: TokenStream): Term {
	const term = parsePrimary(ts);
	const next = ts.peek();
	if (next.kind === "punct" && INFIX_OPERATORS.has(next.value)) {
		ts.fail(`operator '${next.value}' is not allowed in a constant term`);
	}
	if (ts.isPunct("(")) ts.fail("calls are not constant terms");
	return term;
}

/**
 * Parses `text` as exactly one constant term.
 *
 * @returns Right(term) or Left(TermSyntaxError)
 *
 * @pure true
 * @complexity O(n)
 *
 * @example
 * ```ts
 * parseTerm('[{dir, "out"}]')
 * // Right(list([tuple([atom("dir"), str("out")])]))
 * parseTerm("X") // Left(variable 'X' is not a constant term)
 * ```
 */
export function parseTerm(text: string): Either.Either<Term, TermSyntaxError> {
	try {
		const ts = new TokenStream(scan(text));
		const term = parseExpr(ts);
		const rest = ts.peek();
		if (rest.kind !== "eof") ts.unexpected(rest);
		return Either.right(term);
	} catch (error) {
		if (error instanceof TermSyntaxError) return Either.left(error);
		throw error;
	}
}
