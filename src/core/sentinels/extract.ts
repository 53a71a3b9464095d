// CHANGE: Sentinel extraction from Ruff configuration text
// WHY: Sentinels travel through Ruff's own configuration as builtin names; mining them is a pure text scan
// PURITY: CORE
// INVARIANT: ∀ text: extractSentinels(text) never throws; malformed tokens are dropped
// COMPLEXITY: O(n) where n = |text|

import type { Sentinel } from "../models.js";

/**
 * Matches the three token templates.
 *
 * Groups: 1 = EXEC, 2 = mode name, 3 = STANDARD|DEFAULT, 4 = CMD index.
 * The legacy `DEFAULT_DEFINITION` spelling is accepted next to `STANDARD_DEFINITION`.
 */
const TOKEN_PATTERN =
	/__RUFFWRAP_(?:(EXEC)|MODE_([A-Za-z0-9_-]*?)_(?:(STANDARD|DEFAULT)_DEFINITION|CMD_([A-Za-z0-9+-]*)))__/g;

const INDEX_PATTERN = /^\d+$/;

const BUILTINS_HEADER = "linter.builtins = [";

interface AttachedValue {
	readonly value: string;
	readonly end: number;
}

/**
 * Reads up to the closing quote; double-quoted strings resolve backslash escapes.
 *
 * @returns null when the string is not closed on this line
 */
function readQuoted(
	line: string,
	start: number,
	quote: string,
): AttachedValue | null {
	let value = "";
	for (let i = start; i < line.length; i++) {
		const ch = line.charAt(i);
		if (ch === quote) return { value, end: i + 1 };
		if (quote === '"' && ch === "\\" && i + 1 < line.length) {
			i++;
			value += line.charAt(i);
			continue;
		}
		value += ch;
	}
	return null;
}

/**
 * Reads the value attached to a token that ends at `start`.
 *
 * @remarks
 * Inside a quoted string the value stops at the closing quote; otherwise it
 * runs to the end of the line with a trailing list comma removed.
 *
 * @pure true
 */
function readAttachedValue(
	line: string,
	start: number,
	quote: string | undefined,
): AttachedValue {
	if (quote !== undefined) {
		const quoted = readQuoted(line, start, quote);
		if (quoted !== null) return quoted;
	}
	const rest = line.slice(start).trimEnd();
	const value = rest.endsWith(",") ? rest.slice(0, -1).trimEnd() : rest;
	return { value, end: line.length };
}

function quoteBefore(line: string, index: number): string | undefined {
	const previous = line.charAt(index - 1);
	return previous === '"' || previous === "'" ? previous : undefined;
}

/**
 * Builds a sentinel from one regex match, or null when the token is malformed.
 *
 * @pure true
 */
function toSentinel(
	groups: RegExpMatchArray,
	attached: AttachedValue,
): Sentinel | null {
	const [, exec, mode, standard, index] = groups;
	if (exec !== undefined) {
		return attached.value.length > 0
			? { kind: "exec", value: attached.value }
			: null;
	}
	if (mode === undefined || mode.length === 0) return null;
	if (standard !== undefined) return { kind: "mode-standard", mode };
	if (index === undefined || !INDEX_PATTERN.test(index)) return null;
	if (attached.value.trim().length === 0) return null;
	return {
		kind: "mode-cmd",
		mode,
		index: Number.parseInt(index, 10),
		value: attached.value,
	};
}

function extractFromLine(line: string): Sentinel[] {
	const found: Sentinel[] = [];
	let consumedUntil = 0;
	for (const groups of line.matchAll(TOKEN_PATTERN)) {
		const start = groups.index ?? 0;
		// Tokens inside an earlier unquoted value belong to that value
		if (start < consumedUntil) continue;
		const tokenEnd = start + groups[0].length;
		const quote = quoteBefore(line, start);
		const attached = readAttachedValue(line, tokenEnd, quote);
		const isStandard = groups[3] !== undefined;
		consumedUntil = isStandard ? tokenEnd : attached.end;
		const sentinel = toSentinel(groups, attached);
		if (sentinel !== null) found.push(sentinel);
	}
	return found;
}

/**
 * Finds every sentinel in configuration text, in source order.
 *
 * @param text - Ruff configuration text or `--show-settings` output
 * @returns sentinels in the order they appear
 *
 * @pure true
 * @invariant text without `__RUFFWRAP_` yields []
 * @complexity O(n) where n = |text|
 *
 * @example
 * ```ts
 * extractSentinels('builtins = ["__RUFFWRAP_EXEC__/opt/ruff-0.6/bin/ruff"]');
 * // [{ kind: "exec", value: "/opt/ruff-0.6/bin/ruff" }]
 * ```
 */
export function extractSentinels(text: string): readonly Sentinel[] {
	return text.split(/\r?\n/).flatMap(extractFromLine);
}

/**
 * Narrows `ruff check --show-settings` output to the builtins block.
 *
 * @remarks
 * Sentinels are declared as `builtins` entries, so only that block of the
 * settings dump carries them. Text without the block header is returned as is.
 *
 * @pure true
 * @complexity O(n)
 */
export function builtinsSection(text: string): string {
	const lines = text.split(/\r?\n/);
	const header = lines.findIndex((line) =>
		line.trimStart().startsWith(BUILTINS_HEADER),
	);
	if (header === -1) return text;
	const headerLine = lines[header] ?? "";
	if (headerLine.trimEnd().endsWith("]")) return "";

	const body: string[] = [];
	for (const line of lines.slice(header + 1)) {
		if (line.trimEnd().endsWith("]")) break;
		body.push(line);
	}
	return body.join("\n");
}
