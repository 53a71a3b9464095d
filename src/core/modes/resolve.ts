// CHANGE: Mode Resolver: sentinel table + request + environment → single run or batch plan
// WHY: Resolution is a pure function of (CLI request, environment snapshot, configuration), testable without Ruff
// PURITY: CORE
// FORMAT THEOREM: ∀ req, table, env: resolveInvocation(req, table, env) = resolveInvocation(req, table, env)
// INVARIANT: env.skip ⇒ result = single(env.defaultExecutable)
// INVARIANT: standard definition of a known mode takes precedence over CMD sentinels of that mode
// INVARIANT: an unknown standard name with no CMD sentinels resolves to an empty, defined plan
// COMPLEXITY: O(k log k) where k = number of CMD sentinels of the requested mode

import { Either } from "effect";

import { ModeUndefined } from "../errors.js";
import type {
	EnvironmentSnapshot,
	ModePlan,
	ModeRequest,
	RawCommand,
	Resolution,
	SentinelTable,
} from "../models.js";
import { splitCommand } from "./command.js";
import { isStandardModeName, standardSteps } from "./standard.js";

/**
 * Picks the executable argv for this invocation.
 *
 * @returns the environment default when sentinels are skipped or no EXEC
 *          sentinel is present, otherwise the (last) EXEC value, split into words
 *
 * @pure true
 * @invariant result.length > 0
 */
export function resolveExecutable(
	table: SentinelTable,
	env: EnvironmentSnapshot,
): readonly string[] {
	const fallback = defaultExecutableArgv(env);
	if (env.skip || table.exec === undefined) return fallback;
	const words = splitCommand(table.exec);
	return words.length > 0 ? words : fallback;
}

/**
 * The environment's default executable as argv; it also reads the configuration.
 *
 * @pure true
 * @example
 * ```ts
 * defaultExecutableArgv({ ...env, defaultExecutable: "uvx ruff@0.6.9" }); // ["uvx", "ruff@0.6.9"]
 * ```
 */
export function defaultExecutableArgv(
	env: EnvironmentSnapshot,
): readonly string[] {
	const words = splitCommand(env.defaultExecutable);
	return words.length > 0 ? words : [env.defaultExecutable];
}

/**
 * User-defined steps of a mode, ordered by ascending CMD index.
 *
 * @pure true
 * @postcondition ∀ i < j: result[i].index < result[j].index
 */
export function userSteps(
	commands: ReadonlyMap<number, string>,
): readonly RawCommand[] {
	return [...commands.entries()]
		.sort(([a], [b]) => a - b)
		.map(([index, text]): RawCommand => ({
			kind: "raw",
			index,
			text,
			args: splitCommand(text),
		}));
}

/**
 * Builds the plan for a named mode, or null when configuration does not define it.
 *
 * @pure true
 */
export function planForMode(
	mode: string,
	table: SentinelTable,
	executable: readonly string[],
): ModePlan | null {
	if (table.standard.has(mode) && isStandardModeName(mode)) {
		return {
			mode,
			executable,
			source: "standard",
			steps: standardSteps(mode),
		};
	}
	const commands = table.commands.get(mode);
	if (commands !== undefined && commands.size > 0) {
		return { mode, executable, source: "user", steps: userSteps(commands) };
	}
	// A standard marker for a name without built-in steps defines an empty mode
	if (table.standard.has(mode)) {
		return { mode, executable, source: "standard", steps: [] };
	}
	return null;
}

/**
 * Resolves the invocation.
 *
 * @param request - requested mode (absent ⇒ single mode) and mode-require flag
 * @param table - sentinels mined from configuration
 * @param env - environment snapshot
 * @returns Either.right(resolution) or Either.left(ModeUndefined) when a
 *          required mode is not defined
 *
 * @pure true
 * @example
 * ```ts
 * resolveInvocation({ mode: "custom", modeRequire: false }, EMPTY_SENTINEL_TABLE, env);
 * // Right({ kind: "batch", plan: { mode: "custom", source: "undefined", steps: [] } })
 * ```
 */
export function resolveInvocation(
	request: ModeRequest,
	table: SentinelTable,
	env: EnvironmentSnapshot,
): Either.Either<Resolution, ModeUndefined> {
	const executable = resolveExecutable(table, env);
	const mode = request.mode;
	if (env.skip || mode === undefined) {
		return Either.right<Resolution>({ kind: "single", executable });
	}

	const plan = planForMode(mode, table, executable);
	if (plan !== null) return Either.right<Resolution>({ kind: "batch", plan });

	if (request.modeRequire) return Either.left(new ModeUndefined({ mode }));
	const empty: ModePlan = { mode, executable, source: "undefined", steps: [] };
	return Either.right<Resolution>({ kind: "batch", plan: empty });
}
