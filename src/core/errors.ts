// CHANGE: Typed domain error ADT for the wrapper, built on Effect.Data
// WHY: Errors are values discriminated by `_tag`; APP maps them to exit codes
// SOURCE: https://effect.website/docs/data-types/data
// PURITY: CORE
// INVARIANT: Errors are values (no throw), discriminated by `_tag`
// COMPLEXITY: O(1)

import { Data } from "effect";

/**
 * The command line could not be parsed.
 *
 * @invariant detail.length > 0
 */
export class UsageError extends Data.TaggedError("UsageError")<{
	readonly detail: string;
}> {}

/**
 * Batch mode received tokens before the `--` path separator.
 *
 * @invariant tokens.length > 0
 */
export class UnexpectedArguments extends Data.TaggedError(
	"UnexpectedArguments",
)<{
	readonly mode: string;
	readonly tokens: readonly string[];
}> {}

/**
 * A mode was requested with `--mode-require` but configuration defines it
 * neither as a standard definition nor through CMD sentinels.
 */
export class ModeUndefined extends Data.TaggedError("ModeUndefined")<{
	readonly mode: string;
}> {}

/**
 * Ruff failed while printing its settings.
 *
 * @invariant status !== 0
 */
export class SettingsReadError extends Data.TaggedError("SettingsReadError")<{
	readonly command: readonly string[];
	readonly status: number;
	readonly stderr: string;
}> {}

/**
 * A child process could not be started at all.
 */
export class SpawnError extends Data.TaggedError("SpawnError")<{
	readonly command: readonly string[];
	readonly detail: string;
}> {}

/**
 * Union of all errors that can end an invocation early.
 */
export type AppError =
	| UsageError
	| UnexpectedArguments
	| ModeUndefined
	| SettingsReadError
	| SpawnError;
