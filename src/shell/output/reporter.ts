// CHANGE: Console reporting with verbosity levels
// WHY: Every executed Ruff command can be echoed for reproducibility; diagnostics always go to stderr
// PURITY: SHELL (console I/O)
// INVARIANT: messages above the configured verbosity are dropped; errors never are
// COMPLEXITY: O(1) per message

import { formatCommand } from "../../core/modes/index.js";

/**
 * Where output lines go.
 */
export interface ConsoleSink {
	readonly out: (line: string) => void;
	readonly err: (line: string) => void;
}

export const liveConsole: ConsoleSink = {
	out: (line) => {
		console.log(line);
	},
	err: (line) => {
		console.error(line);
	},
};

export interface Reporter {
	readonly verbosity: number;
	/** Echo a command as `<<< argv >>>` on stderr. */
	readonly command: (argv: readonly string[], threshold?: number) => void;
	readonly verbose: (message: string, threshold?: number) => void;
	readonly error: (message: string) => void;
	readonly out: (message: string) => void;
}

/**
 * Builds a reporter for one invocation.
 *
 * @param sink - console destination
 * @param verbosity - number of --verbose flags
 *
 * @pure false - writes to the sink
 */
export function makeReporter(sink: ConsoleSink, verbosity: number): Reporter {
	const enabled = (threshold: number): boolean => verbosity >= threshold;
	return {
		verbosity,
		command: (argv, threshold = 1) => {
			if (enabled(threshold)) sink.err(`<<< ${formatCommand(argv)} >>>`);
		},
		verbose: (message, threshold = 1) => {
			if (enabled(threshold)) sink.err(message);
		},
		error: (message) => {
			sink.err(message);
		},
		out: (message) => {
			sink.out(message);
		},
	};
}
