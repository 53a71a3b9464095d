// CHANGE: Deterministic and property-based tests for mode resolution
// WHY: Ordering, precedence and the undefined-mode policy are the resolver's whole contract
// PURITY: CORE
// FORMAT THEOREM: ∀ permutation p of CMD indices: steps(resolve(p)).index = sort(p)
// INVARIANT: resolve(x) deep-equals resolve(x)

import { Either } from "effect";
import fc from "fast-check";
import { describe, expect, it } from "vitest";

import {
	defaultExecutableArgv,
	resolveExecutable,
	resolveInvocation,
} from "../../../src/core/modes/index.js";
import {
	EMPTY_SENTINEL_TABLE,
	tabulateSentinels,
} from "../../../src/core/sentinels/index.js";
import type {
	EnvironmentSnapshot,
	ModePlan,
	Sentinel,
} from "../../../src/core/types/index.js";

const env: EnvironmentSnapshot = {
	defaultExecutable: "/usr/bin/ruff",
	skip: false,
	invokedAs: "ruffwrap",
};

const skipEnv: EnvironmentSnapshot = { ...env, skip: true };

function planOf(result: ReturnType<typeof resolveInvocation>): ModePlan {
	const resolution = Either.getOrThrow(result);
	if (resolution.kind !== "batch") {
		throw new Error(`expected a batch resolution, got ${resolution.kind}`);
	}
	return resolution.plan;
}

describe("resolveExecutable", () => {
	it("uses the environment default without an EXEC sentinel", () => {
		expect(resolveExecutable(EMPTY_SENTINEL_TABLE, env)).toEqual([
			"/usr/bin/ruff",
		]);
	});

	it("splits the EXEC sentinel into words", () => {
		const table = tabulateSentinels([{ kind: "exec", value: "uvx ruff@0.6.9" }]);
		expect(resolveExecutable(table, env)).toEqual(["uvx", "ruff@0.6.9"]);
	});

	it("prefers the last EXEC sentinel", () => {
		const table = tabulateSentinels([
			{ kind: "exec", value: "/opt/a/ruff" },
			{ kind: "exec", value: "/opt/b/ruff" },
		]);
		expect(resolveExecutable(table, env)).toEqual(["/opt/b/ruff"]);
	});

	it("ignores the EXEC sentinel when sentinels are skipped", () => {
		const table = tabulateSentinels([{ kind: "exec", value: "/opt/a/ruff" }]);
		expect(resolveExecutable(table, skipEnv)).toEqual(["/usr/bin/ruff"]);
	});

	it("falls back to the default when the EXEC value has no words", () => {
		const table = tabulateSentinels([{ kind: "exec", value: "   " }]);
		expect(resolveExecutable(table, env)).toEqual(["/usr/bin/ruff"]);
	});

	it("splits a multi-word environment default", () => {
		expect(
			resolveExecutable(EMPTY_SENTINEL_TABLE, {
				...env,
				defaultExecutable: "uvx ruff",
			}),
		).toEqual(["uvx", "ruff"]);
	});
});

describe("defaultExecutableArgv", () => {
	it("keeps a default without words as a single argument", () => {
		expect(defaultExecutableArgv({ ...env, defaultExecutable: " " })).toEqual([
			" ",
		]);
	});
});

describe("resolveInvocation: single mode", () => {
	it("resolves to a single run when no mode is requested", () => {
		const table = tabulateSentinels([{ kind: "exec", value: "/opt/ruff" }]);
		const result = resolveInvocation({ modeRequire: false }, table, env);
		expect(Either.getOrThrow(result)).toEqual({
			kind: "single",
			executable: ["/opt/ruff"],
		});
	});

	it("forces single mode with the default executable when skipping", () => {
		const table = tabulateSentinels([
			{ kind: "exec", value: "/opt/ruff" },
			{ kind: "mode-standard", mode: "hook" },
		]);
		const result = resolveInvocation(
			{ mode: "hook", modeRequire: true },
			table,
			skipEnv,
		);
		expect(Either.getOrThrow(result)).toEqual({
			kind: "single",
			executable: ["/usr/bin/ruff"],
		});
	});
});

describe("resolveInvocation: standard definitions", () => {
	it("expands hook to format then check --no-fix", () => {
		const table = tabulateSentinels([{ kind: "mode-standard", mode: "hook" }]);
		expect(
			planOf(resolveInvocation({ mode: "hook", modeRequire: false }, table, env)),
		).toEqual({
			mode: "hook",
			executable: ["/usr/bin/ruff"],
			source: "standard",
			steps: [
				{ kind: "standard", mode: "hook", args: ["format"] },
				{ kind: "standard", mode: "hook", args: ["check", "--no-fix"] },
			],
		});
	});

	it("takes precedence over CMD sentinels of the same mode", () => {
		const table = tabulateSentinels([
			{ kind: "mode-cmd", mode: "verify", index: 0, value: "check --exit-zero" },
			{ kind: "mode-standard", mode: "verify" },
		]);
		const plan = planOf(
			resolveInvocation({ mode: "verify", modeRequire: false }, table, env),
		);
		expect(plan.source).toBe("standard");
		expect(plan.steps.map((s) => s.args)).toEqual([
			["format", "--check"],
			["check", "--no-fix"],
		]);
	});

	it("defines an empty mode when the standard name is unknown", () => {
		const table = tabulateSentinels([{ kind: "mode-standard", mode: "custom" }]);
		const plan = planOf(
			resolveInvocation({ mode: "custom", modeRequire: true }, table, env),
		);
		expect(plan.source).toBe("standard");
		expect(plan.steps).toEqual([]);
	});

	it("falls back to CMD sentinels when the standard name is unknown", () => {
		const table = tabulateSentinels([
			{ kind: "mode-standard", mode: "custom" },
			{ kind: "mode-cmd", mode: "custom", index: 1, value: "format" },
		]);
		const plan = planOf(
			resolveInvocation({ mode: "custom", modeRequire: true }, table, env),
		);
		expect(plan.source).toBe("user");
	});

	it("uses the EXEC override for the plan executable", () => {
		const table = tabulateSentinels([
			{ kind: "mode-standard", mode: "enroll" },
			{ kind: "exec", value: "/opt/ruff-0.6/bin/ruff" },
		]);
		const plan = planOf(
			resolveInvocation({ mode: "enroll", modeRequire: false }, table, env),
		);
		expect(plan.executable).toEqual(["/opt/ruff-0.6/bin/ruff"]);
		expect(plan.steps.map((s) => s.args)).toEqual([
			["format"],
			["check", "--fix"],
		]);
	});
});

describe("resolveInvocation: user-defined sequences", () => {
	it("orders commands by ascending index, not source order", () => {
		const table = tabulateSentinels([
			{ kind: "mode-cmd", mode: "ci", index: 10, value: "format --check" },
			{ kind: "mode-cmd", mode: "ci", index: 2, value: "check --select E" },
			{ kind: "mode-cmd", mode: "ci", index: 7, value: "check --select F" },
		]);
		const plan = planOf(
			resolveInvocation({ mode: "ci", modeRequire: false }, table, env),
		);
		expect(plan.steps).toEqual([
			{
				kind: "raw",
				index: 2,
				text: "check --select E",
				args: ["check", "--select", "E"],
			},
			{
				kind: "raw",
				index: 7,
				text: "check --select F",
				args: ["check", "--select", "F"],
			},
			{
				kind: "raw",
				index: 10,
				text: "format --check",
				args: ["format", "--check"],
			},
		]);
	});

	it("ignores commands defined for other modes", () => {
		const table = tabulateSentinels([
			{ kind: "mode-cmd", mode: "a", index: 0, value: "format" },
			{ kind: "mode-cmd", mode: "b", index: 0, value: "check" },
		]);
		const plan = planOf(
			resolveInvocation({ mode: "b", modeRequire: false }, table, env),
		);
		expect(plan.steps.map((s) => s.args)).toEqual([["check"]]);
	});

	it("orders any permutation of indices ascending", () => {
		fc.assert(
			fc.property(
				fc.uniqueArray(fc.nat({ max: 10_000 }), { minLength: 1, maxLength: 20 }),
				(indices) => {
					const sentinels: Sentinel[] = indices.map((index) => ({
						kind: "mode-cmd",
						mode: "m",
						index,
						value: `check --select R${String(index)}`,
					}));
					const plan = planOf(
						resolveInvocation(
							{ mode: "m", modeRequire: true },
							tabulateSentinels(sentinels),
							env,
						),
					);
					const order = plan.steps.map((s) => (s.kind === "raw" ? s.index : -1));
					expect(order).toEqual([...indices].sort((a, b) => a - b));
				},
			),
		);
	});

	it("yields identical plans when resolving the same table twice", () => {
		fc.assert(
			fc.property(
				fc.array(
					fc.record({
						index: fc.nat({ max: 50 }),
						value: fc.constantFrom("format", "check --fix", "check --no-fix"),
					}),
					{ minLength: 1, maxLength: 10 },
				),
				(commands) => {
					const table = tabulateSentinels(
						commands.map(
							(c): Sentinel => ({ kind: "mode-cmd", mode: "m", ...c }),
						),
					);
					const request = { mode: "m", modeRequire: false };
					expect(planOf(resolveInvocation(request, table, env))).toEqual(
						planOf(resolveInvocation(request, table, env)),
					);
				},
			),
		);
	});
});

describe("resolveInvocation: undefined modes", () => {
	it("resolves any mode to an empty plan when configuration has no sentinels", () => {
		fc.assert(
			fc.property(
				fc.stringMatching(/^[A-Za-z0-9_-]{1,12}$/),
				(mode) => {
					const plan = planOf(
						resolveInvocation(
							{ mode, modeRequire: false },
							tabulateSentinels([]),
							env,
						),
					);
					expect(plan).toEqual({
						mode,
						executable: ["/usr/bin/ruff"],
						source: "undefined",
						steps: [],
					});
				},
			),
		);
	});

	it("fails with ModeUndefined when the mode is required", () => {
		const result = resolveInvocation(
			{ mode: "custom", modeRequire: true },
			EMPTY_SENTINEL_TABLE,
			env,
		);
		if (Either.isRight(result)) throw new Error("expected ModeUndefined");
		expect(result.left._tag).toBe("ModeUndefined");
		expect(result.left.mode).toBe("custom");
	});
});
