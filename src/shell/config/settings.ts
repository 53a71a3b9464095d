// CHANGE: Configuration reader: asks Ruff to dump its resolved settings
// WHY: Ruff already discovers and merges pyproject.toml / ruff.toml; its dump is the configuration text sentinels are mined from
// PURITY: SHELL (runs Ruff)
// EFFECT: Effect<string, SettingsReadError | SpawnError>
// INVARIANT: "no files found" means no configuration to mine, not a failure
// COMPLEXITY: O(n) where n = settings dump size

import { Effect } from "effect";

import { SettingsReadError, type SpawnError } from "../../core/errors.js";
import { builtinsSection } from "../../core/sentinels/index.js";
import { type CommandCapturer, captureCommand } from "../exec/index.js";
import type { Reporter } from "../output/index.js";

/**
 * Arguments that make `ruff check` print settings for the current directory
 * only, without touching the cache.
 */
export const SHOW_SETTINGS_ARGS: readonly string[] = [
	"check",
	"--show-settings",
	"--config",
	"include = [ '*', '.*' ]",
	"--config",
	"exclude = [ '*/*' ]",
	"--config",
	"cache-dir = '/dev/null'",
	"--no-cache",
];

const NO_FILES_MARKER = "No files found under the given path";

/**
 * Reads configuration text for sentinel extraction.
 */
export type SettingsReader = (
	executable: readonly string[],
	reporter: Reporter,
) => Effect.Effect<string, SettingsReadError | SpawnError>;

/**
 * Builds a settings reader on top of a capturing runner.
 *
 * @param capture - runner used to call Ruff (injectable for tests)
 */
export const makeSettingsReader =
	(capture: CommandCapturer): SettingsReader =>
	(executable, reporter) =>
		Effect.gen(function* () {
			const argv = [...executable, ...SHOW_SETTINGS_ARGS];
			reporter.command(argv, 2);
			const result = yield* capture(argv);
			if (result.status === 0) return builtinsSection(result.stdout);
			if (result.stderr.includes(NO_FILES_MARKER)) return "";
			return yield* Effect.fail(
				new SettingsReadError({
					command: argv,
					status: result.status,
					stderr: result.stderr,
				}),
			);
		});

/**
 * Settings reader that runs Ruff for real.
 *
 * @pure false - spawns Ruff
 */
export const readRuffSettings: SettingsReader =
	makeSettingsReader(captureCommand);
