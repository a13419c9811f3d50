// CHANGE: Load runner configuration from doc-run.config.json and the environment
// WHY: The engine location and the failure-path timings differ between projects and CI hosts
// PURITY: SHELL (reads the filesystem and environment)
// INVARIANT: Absent file ⇒ defaults; malformed file or variable ⇒ ConfigError (never silently ignored)
// COMPLEXITY: O(size of the config file)

import * as fs from "node:fs";
import * as path from "node:path";

import { Either } from "effect";

import { ConfigError } from "../../core/errors.js";
import type { RunnerConfig } from "../../core/types/config.js";

export const CONFIG_FILE = "doc-run.config.json";

export const DEFAULT_CONFIG: RunnerConfig = {
	engine: null,
	flushDelayMs: 1000,
	reportDepth: 10,
};

/**
 * Type representing any valid JSON value.
 *
 * @invariant Must be serializable to JSON
 */
type JSONValue =
	| string
	| number
	| boolean
	| null
	| ReadonlyArray<JSONValue>
	| { readonly [key: string]: JSONValue };

function isJSONObject(
	value: JSONValue,
): value is { readonly [key: string]: JSONValue } {
	return value !== null && typeof value === "object" && !Array.isArray(value);
}

const isNonNegativeInteger = (value: JSONValue | undefined): value is number =>
	typeof value === "number" && Number.isInteger(value) && value >= 0;

/**
 * Validates the parsed file against RunnerConfig, field by field.
 *
 * @pure true
 */
function validateConfig(
	value: JSONValue,
	file: string,
): Either.Either<RunnerConfig, ConfigError> {
	const fail = (detail: string): Either.Either<RunnerConfig, ConfigError> =>
		Either.left(new ConfigError({ path: file, detail }));

	if (!isJSONObject(value)) return fail("expected a JSON object");

	const { engine, flushDelayMs, reportDepth } = value;
	if (engine !== undefined && typeof engine !== "string") {
		return fail('"engine" must be a string');
	}
	if (flushDelayMs !== undefined && !isNonNegativeInteger(flushDelayMs)) {
		return fail('"flushDelayMs" must be a non-negative integer');
	}
	if (reportDepth !== undefined && !(isNonNegativeInteger(reportDepth) && reportDepth > 0)) {
		return fail('"reportDepth" must be a positive integer');
	}

	return Either.right({
		engine: engine === undefined || engine.length === 0 ? DEFAULT_CONFIG.engine : engine,
		flushDelayMs: flushDelayMs ?? DEFAULT_CONFIG.flushDelayMs,
		reportDepth: reportDepth ?? DEFAULT_CONFIG.reportDepth,
	});
}

function readConfigFile(file: string): Either.Either<RunnerConfig, ConfigError> {
	if (!fs.existsSync(file)) return Either.right(DEFAULT_CONFIG);
	try {
		const parsed: JSONValue = JSON.parse(fs.readFileSync(file, "utf8"));
		return validateConfig(parsed, file);
	} catch (error) {
		const detail = error instanceof Error ? error.message : String(error);
		return Either.left(new ConfigError({ path: file, detail }));
	}
}

/**
 * Applies DOC_RUN_ENGINE and DOC_RUN_FLUSH_DELAY_MS on top of the file settings.
 *
 * @pure true
 */
function applyEnvironment(
	config: RunnerConfig,
	env: NodeJS.ProcessEnv,
): Either.Either<RunnerConfig, ConfigError> {
	const engine = env["DOC_RUN_ENGINE"];
	const delay = env["DOC_RUN_FLUSH_DELAY_MS"];
	const withEngine =
		engine !== undefined && engine.length > 0 ? { ...config, engine } : config;
	if (delay === undefined || delay.length === 0) return Either.right(withEngine);
	if (!/^\d+$/.test(delay)) {
		return Either.left(
			new ConfigError({
				path: "DOC_RUN_FLUSH_DELAY_MS",
				detail: `expected a non-negative integer, got '${delay}'`,
			}),
		);
	}
	return Either.right({ ...withEngine, flushDelayMs: Number(delay) });
}

/**
 * Loads the runner configuration for `cwd`.
 *
 * @returns Right(config) or Left(ConfigError); an absent file yields the defaults
 *
 * @example
 * ```ts
 * // doc-run.config.json: { "engine": "./engine.js" }
 * loadRunnerConfig("/project", {})
 * // Right({ engine: "./engine.js", flushDelayMs: 1000, reportDepth: 10 })
 * ```
 */
export function loadRunnerConfig(
	cwd: string,
	env: NodeJS.ProcessEnv,
): Either.Either<RunnerConfig, ConfigError> {
	return Either.flatMap(readConfigFile(path.join(cwd, CONFIG_FILE)), (config) =>
		applyEnvironment(config, env),
	);
}
