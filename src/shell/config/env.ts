// CHANGE: Snapshot of the environment variables the wrapper reads
// WHY: Resolution takes the environment as an explicit value instead of reading process.env ad hoc
// PURITY: SHELL (reads process.env at the boundary)
// INVARIANT: defaultExecutable.length > 0
// COMPLEXITY: O(1)

import * as path from "node:path";

import type { EnvironmentSnapshot } from "../../core/types/index.js";

export const DEFAULT_EXECUTABLE = "/usr/bin/ruff";

const SCRIPT_EXTENSION = /\.(?:[cm]?js|[cm]?ts)$/;

/**
 * Name the program was invoked as, without directory or script extension.
 *
 * @pure true
 * @example
 * ```ts
 * entryName("/usr/local/lib/node_modules/ruffwrap/dist/bin/ruff.js"); // "ruff"
 * ```
 */
export const entryName = (entry: string): string =>
	path.basename(entry).replace(SCRIPT_EXTENSION, "");

/**
 * Reads the environment once.
 *
 * @param env - process environment
 * @param entry - name or path of the invoked entry script
 * @returns snapshot; `RUFFWRAP_SKIP` counts when present with any value,
 *          an empty `RUFFWRAP_EXEC` falls back to the default
 *
 * @pure true (given env)
 */
export function readEnvironment(
	env: NodeJS.ProcessEnv,
	entry: string,
): EnvironmentSnapshot {
	const exec = env["RUFFWRAP_EXEC"];
	const invokedAs = env["RUFFWRAP_INVOKED_AS"];
	return {
		defaultExecutable:
			exec === undefined || exec.length === 0 ? DEFAULT_EXECUTABLE : exec,
		skip: env["RUFFWRAP_SKIP"] !== undefined,
		invokedAs: entryName(
			invokedAs === undefined || invokedAs.length === 0 ? entry : invokedAs,
		),
	};
}
