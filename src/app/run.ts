// CHANGE: Application orchestration: route, read configuration, resolve, execute
// WHY: Enforce FCIS; APP composes pure CORE decisions with SHELL effects and returns the exit code as a value
// PURITY: APP (no process.exit here)
// EFFECT: Effect<ExitCode, never>
// INVARIANT: usage and separator errors are reported before any Ruff process starts
// INVARIANT: env.skip ⇒ no settings read ∧ exactly one run of env.defaultExecutable
// COMPLEXITY: O(n + k) where n = |argv| + settings size, k = plan steps

import { Effect } from "effect";
import { match } from "ts-pattern";

import {
	optionPrefix,
	routeArguments,
	splitBatchPaths,
} from "../core/args/index.js";
import { exitCodeOf } from "../core/decision.js";
import type {
	AppError,
	SettingsReadError,
	SpawnError,
} from "../core/errors.js";
import { helpText, versionText } from "../core/help.js";
import {
	defaultExecutableArgv,
	formatCommand,
	resolveInvocation,
} from "../core/modes/index.js";
import {
	EMPTY_SENTINEL_TABLE,
	extractSentinels,
	tabulateSentinels,
} from "../core/sentinels/index.js";
import {
	EXIT,
	type EnvironmentSnapshot,
	type ExitCode,
	type ModePlan,
	type SentinelTable,
} from "../core/types/index.js";
import { executeBatch } from "../shell/batch/index.js";
import { makeReporter, type Reporter } from "../shell/output/index.js";
import type { RuffwrapServices } from "./services.js";

/**
 * Mines the sentinel table, unless the environment says to skip it.
 *
 * @effect Effect<SentinelTable, SettingsReadError | SpawnError>
 */
function loadSentinelTable(
	env: EnvironmentSnapshot,
	services: RuffwrapServices,
	reporter: Reporter,
): Effect.Effect<SentinelTable, SettingsReadError | SpawnError> {
	if (env.skip) return Effect.succeed(EMPTY_SENTINEL_TABLE);
	return services
		.readSettings(defaultExecutableArgv(env), reporter)
		.pipe(Effect.map((text) => tabulateSentinels(extractSentinels(text))));
}

function describePlan(plan: ModePlan): string {
	const steps = plan.steps.map((step) =>
		formatCommand([...plan.executable, ...step.args]),
	);
	return `${plan.mode}: ${plan.source} definition, ${String(steps.length)} command(s)${steps.map((s) => `\n  ${s}`).join("")}`;
}

function runBatch(
	plan: ModePlan,
	paths: readonly string[],
	services: RuffwrapServices,
	reporter: Reporter,
): Effect.Effect<ExitCode, SpawnError> {
	reporter.verbose(describePlan(plan), 2);
	if (plan.source === "undefined") {
		reporter.verbose(`mode "${plan.mode}" undefined; nothing to run`);
		return Effect.succeed<ExitCode>(EXIT.success);
	}
	if (paths.length === 0) {
		reporter.verbose(`${plan.mode}: no paths given; nothing to run`);
		return Effect.succeed<ExitCode>(EXIT.success);
	}
	return executeBatch(plan, paths, services.run, reporter);
}

/**
 * Prints the message for an error that ends the invocation.
 *
 * @pure false - console output
 */
function reportError(error: AppError, entry: string, reporter: Reporter): void {
	const code = exitCodeOf(error);
	match(error)
		.with({ _tag: "UsageError" }, (e) => {
			reporter.error(`${entry}: error: ${e.detail}`);
		})
		.with({ _tag: "UnexpectedArguments" }, (e) => {
			reporter.error(
				`unexpected argument before path separator in ${e.mode} mode, failing (exit code ${String(code)}): ${formatCommand(e.tokens)}`,
			);
		})
		.with({ _tag: "ModeUndefined" }, (e) => {
			reporter.error(
				`mode "${e.mode}" undefined; mode-require set, failing (exit code ${String(code)})`,
			);
		})
		.with({ _tag: "SettingsReadError" }, (e) => {
			if (e.stderr.length > 0) reporter.error(e.stderr.trimEnd());
			reporter.error(
				`reading Ruff settings failed with exit status ${String(e.status)}: ${formatCommand(e.command)}`,
			);
		})
		.with({ _tag: "SpawnError" }, (e) => {
			reporter.error(`Error executing ${formatCommand(e.command)}: ${e.detail}`);
		})
		.exhaustive();
}

/**
 * Orchestrates one invocation and returns its exit code (no process.exit).
 *
 * @param argv - arguments after the program name
 * @param env - environment snapshot
 * @param services - Ruff runner, settings reader and console
 * @returns Effect<ExitCode, never> - every typed error is reported and mapped
 *
 * @pure false (coordinates effects), but does not terminate the process
 * @example
 * ```ts
 * const code = await Effect.runPromise(
 *   runRuffwrap(["--mode=hook", "--", "a.py"], readEnvironment(process.env, "ruffwrap"), liveServices),
 * );
 * ```
 */
export function runRuffwrap(
	argv: readonly string[],
	env: EnvironmentSnapshot,
	services: RuffwrapServices,
): Effect.Effect<ExitCode, never> {
	const prefix = optionPrefix(env.invokedAs);
	// Replaced once the verbosity is known; usage errors print at level 0
	let reporter = makeReporter(services.console, 0);

	const program = Effect.gen(function* () {
		const args = yield* routeArguments(argv, prefix);
		const { options, passthrough } = args;
		reporter = makeReporter(services.console, options.verbose);

		if (options.help) {
			reporter.out(helpText(prefix, env.invokedAs));
			return EXIT.success;
		}
		if (options.version) {
			reporter.out(versionText());
			return EXIT.success;
		}

		// Skipping sentinels forces single mode, where no separator rule applies
		const batchMode = env.skip ? undefined : options.mode;
		const paths =
			batchMode === undefined
				? passthrough
				: yield* splitBatchPaths(batchMode, passthrough);

		const table = yield* loadSentinelTable(env, services, reporter);
		const request =
			options.mode === undefined
				? { modeRequire: options.modeRequire }
				: { mode: options.mode, modeRequire: options.modeRequire };
		const resolution = yield* resolveInvocation(request, table, env);

		if (resolution.kind === "batch") {
			return yield* runBatch(resolution.plan, paths, services, reporter);
		}
		const single = [...resolution.executable, ...passthrough];
		reporter.command(single);
		return yield* services.run(single);
	});

	return program.pipe(
		Effect.catchAll((error) =>
			Effect.sync(() => {
				reportError(error, env.invokedAs, reporter);
				return exitCodeOf(error);
			}),
		),
	);
}
