// CHANGE: Built-in batch mode definitions
// WHY: Common hook/CI/enrollment sequences are activated by a single STANDARD_DEFINITION sentinel
// PURITY: CORE
// INVARIANT: every definition is a non-empty ordered list of Ruff argument vectors
// COMPLEXITY: O(1)

import type { StandardModeName, StandardStep } from "../models.js";

/**
 * Built-in command sequences, in execution order.
 *
 * - hook: pre-commit hooks and run-on-save; reports lint problems without fixing.
 * - hook-fix: like hook, also applies lint autofixes. Not meant for run-on-save,
 *   since fixes such as removing an unused assignment can discard work in progress.
 * - verify: CI; fails if the formatter would change anything or the linter reports a problem.
 * - enroll: brings a whole codebase into compliance after adopting or upgrading Ruff.
 */
export const STANDARD_MODES: Readonly<
	Record<StandardModeName, readonly (readonly string[])[]>
> = {
	hook: [["format"], ["check", "--no-fix"]],
	"hook-fix": [["format"], ["check", "--fix"]],
	verify: [
		["format", "--check"],
		["check", "--no-fix"],
	],
	enroll: [["format"], ["check", "--fix"]],
};

/**
 * Type guard for the built-in mode names.
 *
 * @pure true
 */
export function isStandardModeName(mode: string): mode is StandardModeName {
	return Object.prototype.hasOwnProperty.call(STANDARD_MODES, mode);
}

/**
 * Steps of a built-in definition.
 *
 * @pure true
 * @postcondition result.length = STANDARD_MODES[mode].length
 */
export function standardSteps(mode: StandardModeName): readonly StandardStep[] {
	return STANDARD_MODES[mode].map((args): StandardStep => ({
		kind: "standard",
		mode,
		args,
	}));
}
