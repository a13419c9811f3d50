// CHANGE: Argument decoder from raw launcher tokens to constant terms
// WHY: Operations take structured values; the launcher only delivers text
// PURITY: CORE
// EFFECT: Effect<ArgumentList, DecodeError>
// INVARIANT: ∀i: decodeArguments(ts)[i] depends only on ts[i]; first invalid token aborts the whole decode
// COMPLEXITY: O(Σ|tᵢ|)

import { Effect, Either, pipe } from "effect";

import { DecodeError } from "./errors.js";
import type { ArgumentList, RawArgument } from "./models.js";
import { parseTerm } from "./term/parser.js";
import type { Term } from "./term/types.js";

/**
 * Text a raw token is parsed from.
 *
 * @pure true
 */
export const tokenText = (raw: RawArgument): string =>
	typeof raw === "string" ? raw : (Symbol.keyFor(raw) ?? raw.description ?? "");

/**
 * Decodes one token.
 *
 * @pure true
 * @invariant Left ⇒ error.token === tokenText(raw)
 */
export const decodeArgument = (raw: RawArgument): Either.Either<Term, DecodeError> => {
	const text = tokenText(raw);
	return pipe(
		parseTerm(text),
		Either.mapLeft(
			(e) =>
				new DecodeError({
					token: text,
					detail: `${e.message} (column ${e.column})`,
				}),
		),
	);
};

/**
 * Decodes all tokens left to right, stopping at the first invalid one.
 *
 * @example
 * ```ts
 * Effect.runSync(decodeArguments(['"a.src"', '[{dir, "out"}]']))
 * // [str("a.src"), list([tuple([atom("dir"), str("out")])])]
 * ```
 */
export const decodeArguments = (
	tokens: ReadonlyArray<RawArgument>,
): Effect.Effect<ArgumentList, DecodeError> =>
	Effect.forEach(tokens, (raw) =>
		Either.match(decodeArgument(raw), {
			onLeft: (error) => Effect.fail(error),
			onRight: (term) => Effect.succeed(term),
		}),
	);
