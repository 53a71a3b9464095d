// CHANGE: Read exit details out of a rejected execFile promise
// WHY: node:child_process rejects on non-zero exit but keeps status and captured output on the error object
// PURITY: CORE
// INVARIANT: spawn failures (string code such as ENOENT) never look like an exit status
// COMPLEXITY: O(1)

/**
 * What a finished child reported, recovered from an execFile rejection.
 */
export interface ExecFailure {
	readonly status: number | null;
	readonly signal: string | null;
	readonly stdout: string;
	readonly stderr: string;
}

const textField = (error: object, key: "stdout" | "stderr"): string => {
	const value: unknown = Reflect.get(error, key);
	return typeof value === "string" ? value : "";
};

/**
 * Extracts exit details from an execFile error.
 *
 * @param error - value caught from a rejected execFile promise
 * @returns details when the child ran and exited; null when it never started
 *
 * @pure true
 * @example
 * ```ts
 * extractExecFailure({ code: 2, stdout: "", stderr: "boom" });
 * // { status: 2, signal: null, stdout: "", stderr: "boom" }
 * extractExecFailure(Object.assign(new Error("spawn ruff ENOENT"), { code: "ENOENT" }));
 * // null
 * ```
 */
export function extractExecFailure(error: unknown): ExecFailure | null {
	if (typeof error !== "object" || error === null) return null;
	const code: unknown = Reflect.get(error, "code");
	const signal: unknown = Reflect.get(error, "signal");
	const hasSignal = typeof signal === "string";
	if (typeof code !== "number" && !hasSignal) return null;
	return {
		status: typeof code === "number" ? code : null,
		signal: hasSignal ? signal : null,
		stdout: textField(error, "stdout"),
		stderr: textField(error, "stderr"),
	};
}

/**
 * Message of an arbitrary thrown value.
 *
 * @pure true
 */
export const describeError = (error: unknown): string =>
	error instanceof Error ? error.message : String(error);
