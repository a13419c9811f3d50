// CHANGE: Tokenizer for the constant-term language
// WHY: Separate lexical rules (escapes, radix integers, floats) from the recursive-descent parser
// PURITY: CORE
// INVARIANT: scan(text) yields tokens in source order terminated by exactly one `eof`
// COMPLEXITY: O(n) where n = |text|

import { TermSyntaxError } from "../errors.js";
import { RESERVED_WORDS } from "./types.js";

export type Token =
	| { readonly kind: "atom"; readonly value: string; readonly column: number }
	| { readonly kind: "reserved"; readonly value: string; readonly column: number }
	| { readonly kind: "var"; readonly value: string; readonly column: number }
	| { readonly kind: "string"; readonly value: string; readonly column: number }
	| { readonly kind: "integer"; readonly value: bigint; readonly column: number }
	| { readonly kind: "float"; readonly value: number; readonly column: number }
	| { readonly kind: "punct"; readonly value: string; readonly column: number }
	| { readonly kind: "eof"; readonly column: number };

const MULTI_CHAR_PUNCT = ["=>", "<<", ">>", ":=", "->", "||", "++", "--"];
const SINGLE_CHAR_PUNCT = "[]{}(),|#+-*/:;=<>!?.";

const SIMPLE_ESCAPES: Readonly<Record<string, number>> = {
	b: 8,
	d: 127,
	e: 27,
	f: 12,
	n: 10,
	r: 13,
	s: 32,
	t: 9,
	v: 11,
};

const isDigit = (c: string): boolean => c >= "0" && c <= "9";
const isLower = (c: string): boolean => c >= "a" && c <= "z";
const isUpper = (c: string): boolean => c >= "A" && c <= "Z";
const isNameChar = (c: string): boolean =>
	isLower(c) || isUpper(c) || isDigit(c) || c === "_" || c === "@";
const isOctal = (c: string): boolean => c >= "0" && c <= "7";
const isHex = (c: string): boolean => /^[0-9a-fA-F]$/.test(c);

/**
 * Value of an alphanumeric digit in bases up to 36, or -1.
 */
function digitValue(c: string): number {
	if (isDigit(c)) return c.charCodeAt(0) - 48;
	const lower = c.toLowerCase();
	if (isLower(lower)) return lower.charCodeAt(0) - 87;
	return -1;
}

class Cursor {
	index = 0;

	constructor(readonly text: string) {}

	get done(): boolean {
		return this.index >= this.text.length;
	}

	peek(offset = 0): string {
		return this.text.charAt(this.index + offset);
	}

	next(): string {
		const c = this.text.charAt(this.index);
		this.index += 1;
		return c;
	}

	fail(message: string, at = this.index): never {
		throw new TermSyntaxError({ message, column: at + 1 });
	}
}

/**
 * Reads a run of digits in `base`, allowing single `_` separators between digits.
 */
function readDigits(cur: Cursor, base: number): string {
	let digits = "";
	for (;;) {
		const c = cur.peek();
		const v = digitValue(c);
		if (v >= 0 && v < base) {
			digits += cur.next();
			continue;
		}
		const after = digitValue(cur.peek(1));
		if (c === "_" && digits.length > 0 && after >= 0 && after < base) {
			cur.next();
			continue;
		}
		return digits;
	}
}

function parseRadix(digits: string, base: number): bigint {
	const b = BigInt(base);
	let value = 0n;
	for (const d of digits) {
		value = value * b + BigInt(digitValue(d));
	}
	return value;
}

function scanNumber(cur: Cursor): Token {
	const column = cur.index + 1;
	const whole = readDigits(cur, 10);

	if (cur.peek() === "#") {
		const base = Number(whole);
		if (base < 2 || base > 36) cur.fail(`illegal base '${whole}'`);
		cur.next();
		const digits = readDigits(cur, base);
		if (digits.length === 0) cur.fail(`illegal integer in base ${base}`);
		if (isNameChar(cur.peek())) cur.fail(`illegal digit '${cur.peek()}' in base ${base}`);
		return { kind: "integer", value: parseRadix(digits, base), column };
	}

	if (cur.peek() === "." && isDigit(cur.peek(1))) {
		cur.next();
		let text = `${whole}.${readDigits(cur, 10)}`;
		const marker = cur.peek();
		const sign = cur.peek(1);
		const hasSign = sign === "+" || sign === "-";
		if (
			(marker === "e" || marker === "E") &&
			isDigit(cur.peek(hasSign ? 2 : 1))
		) {
			cur.next();
			if (hasSign) text += `e${cur.next()}`;
			else text += "e";
			text += readDigits(cur, 10);
		}
		const value = Number(text);
		if (!Number.isFinite(value)) cur.fail(`float '${text}' out of range`, column - 1);
		return { kind: "float", value, column };
	}

	return { kind: "integer", value: BigInt(whole), column };
}

/**
 * Reads one escape sequence after the backslash and returns its code point.
 */
function scanEscape(cur: Cursor): number {
	if (cur.done) cur.fail("unterminated escape sequence");
	const c = cur.next();

	if (isOctal(c)) {
		let digits = c;
		while (digits.length < 3 && isOctal(cur.peek())) digits += cur.next();
		return Number.parseInt(digits, 8);
	}

	if (c === "x") {
		if (cur.peek() === "{") {
			cur.next();
			let digits = "";
			while (isHex(cur.peek())) digits += cur.next();
			if (digits.length === 0 || cur.peek() !== "}") {
				cur.fail("illegal \\x{...} escape sequence");
			}
			cur.next();
			const code = Number.parseInt(digits, 16);
			if (code > 0x10ffff) cur.fail("illegal \\x{...} escape sequence");
			return code;
		}
		const digits = cur.peek() + cur.peek(1);
		if (!isHex(cur.peek()) || !isHex(cur.peek(1))) {
			cur.fail("illegal \\x escape sequence");
		}
		cur.next();
		cur.next();
		return Number.parseInt(digits, 16);
	}

	if (c === "^") {
		if (cur.done) cur.fail("unterminated escape sequence");
		return cur.next().charCodeAt(0) & 31;
	}

	// Any other escaped character stands for itself (\\, \", \').
	return SIMPLE_ESCAPES[c] ?? (c.codePointAt(0) ?? 0);
}

function scanQuoted(cur: Cursor, quote: string, what: string): string {
	const start = cur.index;
	cur.next();
	let value = "";
	for (;;) {
		if (cur.done) cur.fail(`unterminated ${what}`, start);
		const c = cur.next();
		if (c === quote) return value;
		value += c === "\\" ? String.fromCodePoint(scanEscape(cur)) : c;
	}
}

function scanChar(cur: Cursor): Token {
	const column = cur.index + 1;
	cur.next();
	if (cur.done) cur.fail("unterminated character literal");
	const c = cur.next();
	if (c === "\\") {
		return { kind: "integer", value: BigInt(scanEscape(cur)), column };
	}
	const code = c.codePointAt(0) ?? 0;
	// Astral characters occupy two UTF-16 units.
	if (code > 0xffff) cur.next();
	return { kind: "integer", value: BigInt(code), column };
}

function scanName(cur: Cursor): Token {
	const column = cur.index + 1;
	let name = "";
	while (!cur.done && isNameChar(cur.peek())) name += cur.next();
	const first = name.charAt(0);
	if (isUpper(first) || first === "_") return { kind: "var", value: name, column };
	if (RESERVED_WORDS.has(name)) return { kind: "reserved", value: name, column };
	return { kind: "atom", value: name, column };
}

function scanPunct(cur: Cursor): Token {
	const column = cur.index + 1;
	const two = cur.peek() + cur.peek(1);
	if (MULTI_CHAR_PUNCT.includes(two)) {
		cur.next();
		cur.next();
		return { kind: "punct", value: two, column };
	}
	const c = cur.peek();
	if (SINGLE_CHAR_PUNCT.includes(c)) {
		cur.next();
		return { kind: "punct", value: c, column };
	}
	return cur.fail(`illegal character '${c}'`);
}

function skipBlank(cur: Cursor): void {
	while (!cur.done) {
		const c = cur.peek();
		if (c === "%") {
			while (!cur.done && cur.peek() !== "\n") cur.next();
		} else if (/\s/.test(c)) {
			cur.next();
		} else {
			return;
		}
	}
}

function scanToken(cur: Cursor): Token {
	const c = cur.peek();
	if (isDigit(c)) return scanNumber(cur);
	if (c === '"') {
		const column = cur.index + 1;
		return { kind: "string", value: scanQuoted(cur, '"', "string"), column };
	}
	if (c === "'") {
		const column = cur.index + 1;
		return { kind: "atom", value: scanQuoted(cur, "'", "quoted atom"), column };
	}
	if (c === "$") return scanChar(cur);
	// `@` and digits may continue a name but never start one.
	if (isLower(c) || isUpper(c) || c === "_") return scanName(cur);
	return scanPunct(cur);
}

/**
 * Splits `text` into tokens.
 *
 * @throws TermSyntaxError on the first lexical error (caught by `parseTerm`)
 */
export function scan(text: string): ReadonlyArray<Token> {
	const cur = new Cursor(text);
	const tokens: Token[] = [];
	for (;;) {
		skipBlank(cur);
		if (cur.done) {
			tokens.push({ kind: "eof", column: cur.index + 1 });
			return tokens;
		}
		tokens.push(scanToken(cur));
	}
}
