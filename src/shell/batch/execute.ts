// CHANGE: Batch Executor: run plan steps in order, stop at the first failure
// WHY: A batch mode is the logical AND of its commands; later steps must not run once one fails
// PURITY: SHELL (delegates to the injected runner)
// EFFECT: Effect<ExitCode, SpawnError>
// FORMAT THEOREM: first failure at step i ⇒ runner called for steps 1..i only ∧ result = status(i)
// INVARIANT: steps run strictly sequentially, each awaited before the next starts
// COMPLEXITY: O(k) runner calls where k = |plan.steps|

import { Effect } from "effect";

import { isSuccess } from "../../core/decision.js";
import type { SpawnError } from "../../core/errors.js";
import { describeStep, expandStep } from "../../core/modes/index.js";
import { EXIT, type ExitCode, type ModePlan } from "../../core/types/index.js";
import type { CommandRunner } from "../exec/index.js";
import type { Reporter } from "../output/index.js";

/**
 * Executes a batch plan against paths.
 *
 * @param plan - resolved plan; an empty plan succeeds without running anything
 * @param paths - appended to every step's arguments
 * @param runner - runs one argv and reports its status
 * @param reporter - verbose tracing
 * @returns 0 when every step succeeds, otherwise the first failing status
 *
 * @pure false - runs external commands through `runner`
 * @effect Effect<ExitCode, SpawnError>
 */
export function executeBatch(
	plan: ModePlan,
	paths: readonly string[],
	runner: CommandRunner,
	reporter: Reporter,
): Effect.Effect<ExitCode, SpawnError> {
	return Effect.gen(function* () {
		const total = plan.steps.length;
		for (const [position, step] of plan.steps.entries()) {
			const argv = expandStep(plan.executable, step, paths);
			reporter.command(argv);
			const status = yield* runner(argv);
			if (!isSuccess(status)) {
				reporter.verbose(
					`${plan.mode}: stopped at command ${String(position + 1)} of ${String(total)} (${describeStep(step)}), exit status ${String(status)}`,
				);
				return status;
			}
		}
		return EXIT.success;
	});
}
