// CHANGE: Specs for the lifecycle controller
// WHY: Every run ends in exactly one halt; failures report exactly one line and flush before halting
// FORMAT THEOREM: events(success) = [halt:0]; events(failure) = [report, flush, halt:1]
// PURITY: SHELL (host replaced by an in-process recorder)

import { Duration, Effect } from "effect";
import { describe, expect, it } from "vitest";

import { AbnormalSignal, InvalidArguments } from "../../../src/core/errors.js";
import { runLifecycle } from "../../../src/shell/lifecycle/controller.js";
import { FAST_LIFECYCLE, recordingHost } from "../../utils/host.js";

describe("runLifecycle", () => {
	it("halts with 0 and reports nothing when the work succeeds", async () => {
		const { host, events } = recordingHost();
		await Effect.runPromiseExit(
			runLifecycle(Effect.succeed("svc"), () => Effect.succeed(42), host, FAST_LIFECYCLE),
		);
		expect(events).toEqual(["halt:0"]);
	});

	it("waits for readiness before running the work", async () => {
		const { host, events } = recordingHost();
		const ready = Effect.sync(() => {
			events.push("ready");
			return "svc";
		});
		await Effect.runPromiseExit(
			runLifecycle(
				ready,
				(service) =>
					Effect.sync(() => {
						events.push(`work:${service}`);
					}),
				host,
				FAST_LIFECYCLE,
			),
		);
		expect(events).toEqual(["ready", "work:svc", "halt:0"]);
	});

	it("reports a caught failure once, flushes, then halts with 1", async () => {
		const { host, events } = recordingHost();
		await Effect.runPromiseExit(
			runLifecycle(
				Effect.void,
				() => Effect.fail(new InvalidArguments({ where: "doc-run:files/1", tokens: [] })),
				host,
				FAST_LIFECYCLE,
			),
		);
		expect(events).toEqual([
			"report:doc-run: invalid arguments to doc-run:files/1: []",
			"flush",
			"halt:1",
		]);
	});

	it("reports an abnormal signal as an uncaught throw", async () => {
		const { host, events } = recordingHost();
		await Effect.runPromiseExit(
			runLifecycle(
				Effect.void,
				() => Effect.fail(new AbnormalSignal({ method: "file", value: "oops" })),
				host,
				FAST_LIFECYCLE,
			),
		);
		expect(events).toEqual([
			"report:doc-run: internal error: throw without catch in doc generation: 'oops'",
			"flush",
			"halt:1",
		]);
	});

	it("turns a throw from the work function itself into an abnormal outcome", async () => {
		const { host, reports, halts } = recordingHost();
		await Effect.runPromiseExit(
			runLifecycle(
				Effect.void,
				() => {
					throw new TypeError("bad state");
				},
				host,
				FAST_LIFECYCLE,
			),
		);
		expect(reports).toEqual([
			"doc-run: internal error: throw without catch in doc generation: TypeError: bad state",
		]);
		expect(halts).toEqual([1]);
	});

	it("turns a defect inside the work into an abnormal outcome", async () => {
		const { host, reports, halts } = recordingHost();
		await Effect.runPromiseExit(
			runLifecycle(
				Effect.void,
				() =>
					Effect.sync(() => {
						throw new Error("crash");
					}),
				host,
				FAST_LIFECYCLE,
			),
		);
		expect(reports).toEqual([
			"doc-run: internal error: throw without catch in doc generation: Error: crash",
		]);
		expect(halts).toEqual([1]);
	});

	it("waits the fallback delay when the host cannot flush", async () => {
		const { host, events } = recordingHost(false);
		const started = Date.now();
		await Effect.runPromiseExit(
			runLifecycle(
				Effect.void,
				() => Effect.fail(new InvalidArguments({ where: "doc-run:toc/1", tokens: [] })),
				host,
				{ ...FAST_LIFECYCLE, flushDelay: Duration.millis(40) },
			),
		);
		expect(Date.now() - started).toBeGreaterThanOrEqual(30);
		expect(events).toEqual([
			"report:doc-run: invalid arguments to doc-run:toc/1: []",
			"halt:1",
		]);
	});
});
