// CHANGE: Expand plan steps into Ruff argument vectors
// WHY: Standard and raw steps share one invocation shape: executable ++ step args ++ paths
// PURITY: CORE
// INVARIANT: ∀ step, paths: expandStep(exe, step, paths) ends with paths
// COMPLEXITY: O(|args| + |paths|)

import { match } from "ts-pattern";

import type { PlanStep } from "../models.js";

/**
 * Arguments a step contributes before the paths.
 *
 * @pure true
 */
export const stepArguments = (step: PlanStep): readonly string[] =>
	match(step)
		.with({ kind: "standard" }, (s) => s.args)
		.with({ kind: "raw" }, (s) => s.args)
		.exhaustive();

/**
 * Full argv for one step.
 *
 * @pure true
 * @example
 * ```ts
 * expandStep(["ruff"], { kind: "standard", mode: "hook", args: ["format"] }, ["a.py"]);
 * // ["ruff", "format", "a.py"]
 * ```
 */
export function expandStep(
	executable: readonly string[],
	step: PlanStep,
	paths: readonly string[],
): readonly string[] {
	return [...executable, ...stepArguments(step), ...paths];
}

/**
 * Human-readable label for verbose output.
 *
 * @pure true
 */
export const describeStep = (step: PlanStep): string =>
	match(step)
		.with({ kind: "standard" }, (s) => `${s.mode} (standard)`)
		.with({ kind: "raw" }, (s) => `CMD_${String(s.index)}`)
		.exhaustive();
