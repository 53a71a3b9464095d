// CHANGE: Child process execution wrapped in Effect
// WHY: Ruff runs either attached to the terminal (commands) or captured (settings dump); both report status as a value
// PURITY: SHELL (spawns external processes)
// EFFECT: Effect<ExitCode | CapturedOutput, SpawnError>
// INVARIANT: a child that started always yields a status; only a failure to start is an error
// COMPLEXITY: O(n) where n = captured output size

import { execFile, spawn } from "node:child_process";
import { constants } from "node:os";
import { promisify } from "node:util";
import { Effect } from "effect";

import { exitCodeOfTermination } from "../../core/decision.js";
import { SpawnError } from "../../core/errors.js";
import {
	describeError,
	EXIT,
	type ExitCode,
	extractExecFailure,
} from "../../core/types/index.js";

const execFileAsync = promisify(execFile);

/** Settings dumps of large configurations exceed execFile's 1 MiB default. */
const MAX_BUFFER = 64 * 1024 * 1024;

/**
 * Output of a captured run.
 *
 * @invariant status is the child's exit code (signals mapped to 128 + n)
 */
export interface CapturedOutput {
	readonly status: ExitCode;
	readonly stdout: string;
	readonly stderr: string;
}

/**
 * Runs one command to completion and reports its status.
 */
export type CommandRunner = (
	argv: readonly string[],
) => Effect.Effect<ExitCode, SpawnError>;

/**
 * Runs one command with captured output.
 */
export type CommandCapturer = (
	argv: readonly string[],
) => Effect.Effect<CapturedOutput, SpawnError>;

function signalNumber(signal: string | null): number | undefined {
	if (signal === null) return undefined;
	const value: unknown = Reflect.get(constants.signals, signal);
	return typeof value === "number" ? value : undefined;
}

function splitArgv(
	argv: readonly string[],
): Effect.Effect<readonly [string, readonly string[]], SpawnError> {
	const [file, ...args] = argv;
	if (file === undefined || file.length === 0) {
		return Effect.fail(
			new SpawnError({ command: argv, detail: "empty command" }),
		);
	}
	return Effect.succeed([file, args] as const);
}

/**
 * Spawns a command attached to this process's stdio and waits for it.
 *
 * @pure false - spawns a child process
 * @effect Effect<ExitCode, SpawnError>
 * @postcondition result = child exit code, or 128 + signal when signalled
 */
export const spawnCommand: CommandRunner = (argv) =>
	Effect.flatMap(splitArgv(argv), ([file, args]) =>
		Effect.async<ExitCode, SpawnError>((resume) => {
			// "close" can still follow a spawn "error"; the first event decides
			let settled = false;
			const settle = (effect: Effect.Effect<ExitCode, SpawnError>): void => {
				if (settled) return;
				settled = true;
				resume(effect);
			};
			const child = spawn(file, args, { stdio: "inherit" });
			child.once("error", (error) => {
				settle(
					Effect.fail(
						new SpawnError({ command: argv, detail: describeError(error) }),
					),
				);
			});
			child.once("close", (code, signal) => {
				settle(
					Effect.succeed(exitCodeOfTermination(code, signalNumber(signal))),
				);
			});
		}),
	);

/**
 * Runs a command with piped output and collects it.
 *
 * CHANGE: Reuse the execFile + Effect.tryPromise pattern and recover status from the rejection
 * WHY: execFile rejects on non-zero exit, yet the captured output is what callers need
 *
 * @pure false - spawns a child process
 * @effect Effect<CapturedOutput, SpawnError>
 */
export const captureCommand: CommandCapturer = (argv) =>
	Effect.flatMap(splitArgv(argv), ([file, args]) =>
		Effect.tryPromise({
			try: () =>
				execFileAsync(file, [...args], {
					encoding: "utf8",
					maxBuffer: MAX_BUFFER,
				}),
			catch: (error) => error,
		}).pipe(
			Effect.map(
				({ stdout, stderr }): CapturedOutput => ({
					status: EXIT.success,
					stdout,
					stderr,
				}),
			),
			Effect.catchAll((error) => {
				const failure = extractExecFailure(error);
				if (failure === null) {
					return Effect.fail(
						new SpawnError({ command: argv, detail: describeError(error) }),
					);
				}
				return Effect.succeed<CapturedOutput>({
					status: exitCodeOfTermination(
						failure.status,
						signalNumber(failure.signal),
					),
					stdout: failure.stdout,
					stderr: failure.stderr,
				});
			}),
		),
	);
