// CHANGE: Domain models for sentinel resolution and batch execution
// WHY: Keep CORE data immutable and free of effects; SHELL only consumes these shapes
// PURITY: CORE
// INVARIANT: CORE defines no effects; data is immutable
// COMPLEXITY: O(1)

/**
 * Process exit status of one invocation.
 *
 * @remarks
 * Either one of the wrapper's own codes or a status propagated from Ruff.
 */
export type ExitCode = number;

/**
 * Exit codes owned by the wrapper itself.
 *
 * @invariant every code except `success` is non-zero
 */
export const EXIT = {
	success: 0,
	fatal: 1,
	usage: 2,
	unexpectedArguments: 3,
	modeUndefined: 4,
	spawnFailed: 200,
} as const;

/** Names of the built-in batch mode definitions. */
export type StandardModeName = "hook" | "hook-fix" | "verify" | "enroll";

/**
 * A marker token mined from Ruff configuration.
 *
 * @remarks
 * - `exec`: `__RUFFWRAP_EXEC__<value>`
 * - `mode-standard`: `__RUFFWRAP_MODE_<mode>_STANDARD_DEFINITION__`
 * - `mode-cmd`: `__RUFFWRAP_MODE_<mode>_CMD_<index>__<value>`
 */
export type Sentinel =
	| { readonly kind: "exec"; readonly value: string }
	| { readonly kind: "mode-standard"; readonly mode: string }
	| {
			readonly kind: "mode-cmd";
			readonly mode: string;
			readonly index: number;
			readonly value: string;
	  };

/**
 * Sentinels grouped for resolution.
 *
 * @invariant exec holds the last EXEC value seen (last one wins)
 * @invariant commands[mode] maps index → command text, last value per index wins
 */
export interface SentinelTable {
	readonly exec: string | undefined;
	readonly standard: ReadonlySet<string>;
	readonly commands: ReadonlyMap<string, ReadonlyMap<number, string>>;
}

/** One step of a built-in mode definition. */
export interface StandardStep {
	readonly kind: "standard";
	readonly mode: StandardModeName;
	readonly args: readonly string[];
}

/** One step taken from a `CMD_<n>` sentinel. */
export interface RawCommand {
	readonly kind: "raw";
	readonly index: number;
	readonly text: string;
	readonly args: readonly string[];
}

export type PlanStep = StandardStep | RawCommand;

/**
 * Resolved execution plan for a requested batch mode.
 *
 * @invariant steps are in execution order; raw steps ascend by index
 * @invariant executable is a non-empty argument vector
 */
export interface ModePlan {
	readonly mode: string;
	readonly executable: readonly string[];
	readonly source: "standard" | "user" | "undefined";
	readonly steps: readonly PlanStep[];
}

/**
 * Outcome of mode resolution: run once, or run a batch plan.
 */
export type Resolution =
	| { readonly kind: "single"; readonly executable: readonly string[] }
	| { readonly kind: "batch"; readonly plan: ModePlan };

/**
 * Wrapper options recognized on the command line.
 *
 * @invariant verbose >= 0
 * @invariant mode, when present, is non-empty
 */
export interface WrapperOptions {
	readonly mode?: string;
	readonly modeRequire: boolean;
	readonly verbose: number;
	readonly version: boolean;
	readonly help: boolean;
}

/**
 * Parsed command line: wrapper options plus the untouched remainder.
 */
export interface InvocationArgs {
	readonly options: WrapperOptions;
	readonly passthrough: readonly string[];
}

/**
 * Environment captured once at startup.
 *
 * @invariant defaultExecutable is non-empty
 */
export interface EnvironmentSnapshot {
	readonly defaultExecutable: string;
	readonly skip: boolean;
	readonly invokedAs: string;
}

/**
 * What a mode resolution needs from the command line.
 */
export interface ModeRequest {
	readonly mode?: string;
	readonly modeRequire: boolean;
}
