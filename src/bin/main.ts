// CHANGE: Shared BIN body: single point of process.exit
// WHY: Enforce Functional Core, Imperative Shell. APP returns ExitCode; BIN exits the process.
// PURITY: SHELL (BIN layer)
// INVARIANT: Single point of termination; no process.exit in APP or CORE

import { Effect } from "effect";

import { runRuffwrap } from "../app/run.js";
import { liveServices } from "../app/services.js";
import { readEnvironment } from "../shell/config/index.js";

/**
 * Runs the wrapper for a named entry and terminates the process.
 *
 * @param entry - default entry name; `RUFFWRAP_INVOKED_AS` overrides it
 *
 * @pure false (process termination and console I/O)
 * @postcondition process terminates exactly once
 */
export function main(entry: string): void {
	void (async (): Promise<void> => {
		try {
			const env = readEnvironment(process.env, entry);
			const code = await Effect.runPromise(
				runRuffwrap(process.argv.slice(2), env, liveServices),
			);
			// Shell boundary: single process exit
			process.exit(code);
		} catch (error) {
			console.error("Fatal error:", error);
			process.exit(1);
		}
	})();
}
