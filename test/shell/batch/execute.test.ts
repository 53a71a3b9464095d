import { Effect, Either } from "effect";
import fc from "fast-check";
import { describe, expect, it } from "vitest";

import { standardSteps } from "../../../src/core/modes/index.js";
import type { ModePlan, RawCommand } from "../../../src/core/types/index.js";
import { executeBatch } from "../../../src/shell/batch/index.js";
import { makeReporter } from "../../../src/shell/output/index.js";
import {
	missingExecutableRunner,
	recordingConsole,
	scriptedRunner,
} from "../../utils/stubs.js";

const hookPlan: ModePlan = {
	mode: "hook",
	executable: ["/usr/bin/ruff"],
	source: "standard",
	steps: standardSteps("hook"),
};

const rawPlan = (count: number): ModePlan => ({
	mode: "custom",
	executable: ["ruff"],
	source: "user",
	steps: Array.from(
		{ length: count },
		(_, index): RawCommand => ({
			kind: "raw",
			index,
			text: `check --select E${String(index)}`,
			args: ["check", "--select", `E${String(index)}`],
		}),
	),
});

describe("executeBatch", () => {
	it("runs every step against the paths when all succeed", async () => {
		const { runner, calls } = scriptedRunner([0, 0]);
		const reporter = makeReporter(recordingConsole(), 0);

		const code = await Effect.runPromise(
			executeBatch(hookPlan, ["a.py", "b.py"], runner, reporter),
		);

		expect(code).toBe(0);
		expect(calls).toEqual([
			["/usr/bin/ruff", "format", "a.py", "b.py"],
			["/usr/bin/ruff", "check", "--no-fix", "a.py", "b.py"],
		]);
	});

	it("stops at the first failing step and returns its status", async () => {
		const { runner, calls } = scriptedRunner([1, 0]);
		const reporter = makeReporter(recordingConsole(), 0);

		const code = await Effect.runPromise(
			executeBatch(hookPlan, ["a.py"], runner, reporter),
		);

		expect(code).toBe(1);
		expect(calls).toEqual([["/usr/bin/ruff", "format", "a.py"]]);
	});

	it("succeeds without running anything for an empty plan", async () => {
		const { runner, calls } = scriptedRunner();
		const reporter = makeReporter(recordingConsole(), 0);

		const code = await Effect.runPromise(
			executeBatch(rawPlan(0), ["a.py"], runner, reporter),
		);

		expect(code).toBe(0);
		expect(calls).toEqual([]);
	});

	it("echoes commands and the stopping point when verbose", async () => {
		const sink = recordingConsole();
		const { runner } = scriptedRunner([0, 2]);

		await Effect.runPromise(
			executeBatch(hookPlan, ["a.py"], runner, makeReporter(sink, 1)),
		);

		expect(sink.stdout).toEqual([]);
		expect(sink.stderr).toEqual([
			"<<< /usr/bin/ruff format a.py >>>",
			"<<< /usr/bin/ruff check --no-fix a.py >>>",
			"hook: stopped at command 2 of 2 (hook (standard)), exit status 2",
		]);
	});

	it("propagates a failure to start Ruff", async () => {
		const { runner, calls } = missingExecutableRunner();
		const reporter = makeReporter(recordingConsole(), 0);

		const result = await Effect.runPromise(
			Effect.either(executeBatch(hookPlan, ["a.py"], runner, reporter)),
		);

		expect(Either.isLeft(result)).toBe(true);
		expect(calls).toHaveLength(1);
	});

	it("never runs a step after a failing one", async () => {
		await fc.assert(
			fc.asyncProperty(
				fc.array(fc.integer({ min: 0, max: 3 }), { minLength: 1, maxLength: 8 }),
				async (statuses) => {
					const { runner, calls } = scriptedRunner(statuses);
					const reporter = makeReporter(recordingConsole(), 0);
					const plan = rawPlan(statuses.length);

					const code = await Effect.runPromise(
						executeBatch(plan, ["x.py"], runner, reporter),
					);

					const firstFailure = statuses.findIndex((s) => s !== 0);
					const expectedRuns =
						firstFailure === -1 ? statuses.length : firstFailure + 1;
					expect(calls).toHaveLength(expectedRuns);
					expect(code).toBe(firstFailure === -1 ? 0 : statuses[firstFailure]);
					for (const argv of calls) expect(argv.at(-1)).toBe("x.py");
				},
			),
		);
	});
});
