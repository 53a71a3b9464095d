// CHANGE: Pure mapping from typed errors and step statuses to process exit codes
// WHY: Centralize termination logic in Functional Core; SHELL never picks codes ad hoc
// FORMAT THEOREM: ∀e ∈ AppError: exitCodeOf(e) ≠ 0
// PURITY: CORE
// INVARIANT: No side effects, deterministic mapping
// COMPLEXITY: O(1) time / O(1) space

import { match } from "ts-pattern";

import type { AppError } from "./errors.js";
import { EXIT, type ExitCode } from "./models.js";

/**
 * Computes the exit code for an error that ended the invocation.
 *
 * @returns a non-zero code; a settings failure keeps Ruff's own status
 *
 * @pure true
 * @example
 * ```ts
 * exitCodeOf(new ModeUndefined({ mode: "custom" })); // 4
 * ```
 */
export const exitCodeOf = (error: AppError): ExitCode =>
	match(error)
		.with({ _tag: "UsageError" }, () => EXIT.usage)
		.with({ _tag: "UnexpectedArguments" }, () => EXIT.unexpectedArguments)
		.with({ _tag: "ModeUndefined" }, () => EXIT.modeUndefined)
		.with({ _tag: "SettingsReadError" }, (e) => e.status)
		.with({ _tag: "SpawnError" }, () => EXIT.spawnFailed)
		.exhaustive();

/**
 * Maps a child's termination to an exit code.
 *
 * @param code - exit code reported by the child, null when it was signalled
 * @param signalNumber - number of the terminating signal, if any
 * @returns `code` when present, `128 + signalNumber` for a signal, otherwise 1
 *
 * @pure true
 * @invariant result >= 0
 */
export const exitCodeOfTermination = (
	code: number | null,
	signalNumber: number | undefined,
): ExitCode => {
	if (code !== null) return code;
	if (signalNumber !== undefined) return 128 + signalNumber;
	return EXIT.fatal;
};

/**
 * Whether a step status lets the batch continue.
 *
 * @pure true
 */
export const isSuccess = (status: ExitCode): boolean =>
	status === EXIT.success;
