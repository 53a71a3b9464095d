import { describe, expect, it } from "vitest";

import {
	formatCommand,
	splitCommand,
} from "../../../src/core/modes/index.js";

describe("splitCommand", () => {
	it("splits on whitespace", () => {
		expect(splitCommand("check  --select E501")).toEqual([
			"check",
			"--select",
			"E501",
		]);
	});

	it("keeps quoted words together", () => {
		expect(
			splitCommand(`check --no-fix --config "cache-dir = '/dev/null'"`),
		).toEqual(["check", "--no-fix", "--config", "cache-dir = '/dev/null'"]);
	});

	it("does not expand variables", () => {
		expect(splitCommand("check --select $RULES")).toEqual([
			"check",
			"--select",
			"$RULES",
		]);
	});

	it("returns glob patterns literally", () => {
		expect(splitCommand("check src/*.py")).toEqual(["check", "src/*.py"]);
	});

	it("drops a trailing comment", () => {
		expect(splitCommand("format # keep imports")).toEqual(["format"]);
	});

	it("returns no words for blank text", () => {
		expect(splitCommand("   ")).toEqual([]);
	});
});

describe("formatCommand", () => {
	it("quotes words containing spaces", () => {
		expect(formatCommand(["/usr/bin/ruff", "check", "my file.py"])).toBe(
			"/usr/bin/ruff check 'my file.py'",
		);
	});

	it("leaves plain words alone", () => {
		expect(formatCommand(["ruff", "check", "--no-fix", "a.py"])).toBe(
			"ruff check --no-fix a.py",
		);
	});
});
