// CHANGE: Typed failure ADT for the argument-decoding and lifecycle protocol
// WHY: Every failure path ends in one diagnostic and exit 1; typed variants let the controller tell
//      recognized failures from abnormal signals without inspecting messages
// SOURCE: https://effect.website/docs/data-types/data
// PURITY: CORE
// INVARIANT: Errors are values discriminated by `_tag`; only AbnormalSignal maps to UncaughtAbnormal
// COMPLEXITY: O(1)

import { Data } from "effect";

/**
 * Lexical or syntactic error inside a single term.
 *
 * @invariant column ≥ 1 (1-based position in the token text)
 */
export class TermSyntaxError extends Data.TaggedError("TermSyntaxError")<{
	readonly message: string;
	readonly column: number;
}> {}

/**
 * A raw argument is not a valid constant term.
 *
 * @invariant token is the text that was parsed, detail names the position
 */
export class DecodeError extends Data.TaggedError("DecodeError")<{
	readonly token: string;
	readonly detail: string;
}> {}

/**
 * The decoded argument list has a length the entry point does not accept,
 * or the entry point itself is unknown.
 */
export class InvalidArguments extends Data.TaggedError("InvalidArguments")<{
	readonly where: string;
	readonly tokens: ReadonlyArray<string>;
}> {}

/**
 * The engine threw (or rejected with) an `Error` while running an operation.
 */
export class EngineError extends Data.TaggedError("EngineError")<{
	readonly method: string;
	readonly error: Error;
}> {}

/**
 * No usable engine could be loaded.
 */
export class EngineUnavailable extends Data.TaggedError("EngineUnavailable")<{
	readonly reason: string;
}> {}

export class ConfigError extends Data.TaggedError("ConfigError")<{
	readonly path: string;
	readonly detail: string;
}> {}

/**
 * The engine threw something that is not an `Error`.
 *
 * @invariant !(value instanceof Error)
 */
export class AbnormalSignal extends Data.TaggedError("AbnormalSignal")<{
	readonly method: string;
	readonly value: unknown;
}> {}

/**
 * Failures the lifecycle controller reports as caught failures.
 */
export type RecognizedFailure =
	| DecodeError
	| InvalidArguments
	| EngineError
	| EngineUnavailable
	| ConfigError;

/**
 * Everything a unit of work may fail with.
 */
export type RunFailure = RecognizedFailure | AbnormalSignal;
