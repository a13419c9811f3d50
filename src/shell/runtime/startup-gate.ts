// CHANGE: Startup gate: wait until a named service is registered
// WHY: The engine module loads asynchronously; no operation may run before it is there
// PURITY: SHELL
// EFFECT: Effect<S, never, never>
// INVARIANT: Each unsuccessful check is followed by a yield to the event loop (no tight loop)
// COMPLEXITY: O(k) checks where k = event-loop turns until registration

import { Duration, Effect, Option } from "effect";

import type { ServiceRegistry } from "./registry.js";

/**
 * Polls `registry` for `name`, yielding to the event loop between checks.
 *
 * There is no timeout: if the service is never registered the
 * effect never completes. The hosting process guarantees registration.
 *
 * @returns The registered service
 *
 * @example
 * ```ts
 * const engineSlot = yield* awaitReady(registry, "doc-engine");
 * ```
 */
export const awaitReady = <S>(
	registry: ServiceRegistry<S>,
	name: string,
): Effect.Effect<S> =>
	Effect.suspend(() =>
		Option.match(registry.whereis(name), {
			onSome: (service) => Effect.succeed(service),
			// sleep(0) schedules a timer, so pending I/O callbacks run before the next check
			onNone: () =>
				Effect.sleep(Duration.zero).pipe(
					Effect.zipRight(awaitReady(registry, name)),
				),
		}),
	);
