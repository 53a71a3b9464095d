// CHANGE: Group extracted sentinels into a lookup table for the resolver
// WHY: Resolution needs "last EXEC", "is mode standard" and "commands by index" without rescanning
// PURITY: CORE
// INVARIANT: exec = value of the last EXEC sentinel in input order
// INVARIANT: ∀ mode, index: commands[mode][index] = value of the last matching CMD sentinel
// COMPLEXITY: O(n) where n = |sentinels|

import type { Sentinel, SentinelTable } from "../models.js";

export const EMPTY_SENTINEL_TABLE: SentinelTable = {
	exec: undefined,
	standard: new Set<string>(),
	commands: new Map<string, ReadonlyMap<number, string>>(),
};

/**
 * Groups sentinels for resolution.
 *
 * @param sentinels - sentinels in source order
 * @returns immutable table; later sentinels override earlier ones
 *
 * @pure true
 * @example
 * ```ts
 * tabulateSentinels([
 *   { kind: "exec", value: "/a" },
 *   { kind: "exec", value: "/b" },
 * ]).exec; // "/b"
 * ```
 */
export function tabulateSentinels(
	sentinels: readonly Sentinel[],
): SentinelTable {
	let exec: string | undefined;
	const standard = new Set<string>();
	const commands = new Map<string, Map<number, string>>();

	for (const sentinel of sentinels) {
		switch (sentinel.kind) {
			case "exec":
				exec = sentinel.value;
				break;
			case "mode-standard":
				standard.add(sentinel.mode);
				break;
			case "mode-cmd": {
				const byIndex =
					commands.get(sentinel.mode) ?? new Map<number, string>();
				byIndex.set(sentinel.index, sentinel.value);
				commands.set(sentinel.mode, byIndex);
				break;
			}
		}
	}

	return { exec, standard, commands };
}
