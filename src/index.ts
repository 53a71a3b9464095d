// CHANGE: Public API entry point for library consumers
// WHY: Export APP orchestration and pure CORE functions; SHELL internals stay behind services
// PURITY: Re-exports only (meta-module)

// ═══════════════════════════════════════════════════════════════════════════════
// MAIN ORCHESTRATOR (Programmatic Entry Point)
// ═══════════════════════════════════════════════════════════════════════════════

/**
 * Runs one invocation and returns the exit code as an Effect.
 *
 * @example
 * ```typescript
 * import { Effect } from "effect";
 * import { liveServices, readEnvironment, runRuffwrap } from "ruffwrap";
 *
 * const code = await Effect.runPromise(
 *   runRuffwrap(["--mode=verify", "--", "src/app.py"], readEnvironment(process.env, "ruffwrap"), liveServices),
 * );
 * ```
 */
export { runRuffwrap } from "./app/run.js";
export { liveServices, type RuffwrapServices } from "./app/services.js";

// ═══════════════════════════════════════════════════════════════════════════════
// CORE TYPES AND ERRORS
// ═══════════════════════════════════════════════════════════════════════════════

export type {
	EnvironmentSnapshot,
	ExitCode,
	InvocationArgs,
	ModePlan,
	ModeRequest,
	PlanStep,
	RawCommand,
	Resolution,
	Sentinel,
	SentinelTable,
	StandardModeName,
	StandardStep,
	WrapperOptions,
} from "./core/types/index.js";
export { EXIT } from "./core/types/index.js";
export {
	type AppError,
	ModeUndefined,
	SettingsReadError,
	SpawnError,
	UnexpectedArguments,
	UsageError,
} from "./core/errors.js";

// ═══════════════════════════════════════════════════════════════════════════════
// CORE PURE FUNCTIONS
// ═══════════════════════════════════════════════════════════════════════════════

export {
	optionPrefix,
	routeArguments,
	splitBatchPaths,
} from "./core/args/index.js";
export { exitCodeOf } from "./core/decision.js";
export {
	expandStep,
	resolveExecutable,
	resolveInvocation,
	STANDARD_MODES,
	splitCommand,
} from "./core/modes/index.js";
export {
	builtinsSection,
	extractSentinels,
	tabulateSentinels,
} from "./core/sentinels/index.js";

// ═══════════════════════════════════════════════════════════════════════════════
// SHELL (for embedding)
// ═══════════════════════════════════════════════════════════════════════════════

export { executeBatch } from "./shell/batch/index.js";
export { readEnvironment } from "./shell/config/index.js";
