import { describe, expect, it } from "vitest";

import { makeReporter } from "../../../src/shell/output/index.js";
import { recordingConsole } from "../../utils/stubs.js";

describe("makeReporter", () => {
	it("echoes commands on stderr from verbosity 1", () => {
		const quiet = recordingConsole();
		const loud = recordingConsole();

		makeReporter(quiet, 0).command(["ruff", "format", "a b.py"]);
		makeReporter(loud, 1).command(["ruff", "format", "a b.py"]);

		expect(quiet.stderr).toEqual([]);
		expect(loud.stderr).toEqual(["<<< ruff format 'a b.py' >>>"]);
		expect(loud.stdout).toEqual([]);
	});

	it("honours an explicit threshold", () => {
		const sink = recordingConsole();
		const reporter = makeReporter(sink, 1);

		reporter.command(["ruff", "check", "--show-settings"], 2);
		reporter.verbose("plan details", 2);
		reporter.verbose("stopped");

		expect(sink.stderr).toEqual(["stopped"]);
	});

	it("always prints errors and regular output", () => {
		const sink = recordingConsole();
		const reporter = makeReporter(sink, 0);

		reporter.error("ruffwrap: error: --mode: expected one argument");
		reporter.out("Unknown");

		expect(sink.stderr).toEqual(["ruffwrap: error: --mode: expected one argument"]);
		expect(sink.stdout).toEqual(["Unknown"]);
	});
});
