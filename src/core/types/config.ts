// CHANGE: Runner configuration and command-line invocation types
// WHY: Shell loaders produce these; the app layer consumes them without re-validating
// PURITY: CORE (types only)

/**
 * Settings from `doc-run.config.json` and the environment.
 *
 * @property engine Module specifier of the documentation engine, or null when none is configured
 * @property flushDelayMs Fallback wait before halting on failure when the sink cannot be flushed
 * @property reportDepth Nesting bound for caught-failure details (abnormal ones get 5 more)
 */
export interface RunnerConfig {
	readonly engine: string | null;
	readonly flushDelayMs: number;
	readonly reportDepth: number;
}

/**
 * What the command line asked for.
 */
export type Invocation =
	| { readonly kind: "help" }
	| {
			readonly kind: "run";
			readonly entry: string | null;
			readonly tokens: ReadonlyArray<string>;
	  };
