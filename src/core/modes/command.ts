// CHANGE: Shell-word splitting and quoting for command text carried by sentinels
// WHY: EXEC and CMD values are shell-like strings ("uvx ruff", "check --select E501"); Ruff needs argv vectors
// PURITY: CORE
// INVARIANT: splitCommand never expands variables or globs; operators come back as literal words
// COMPLEXITY: O(n) where n = |text|

import { type ParseEntry, parse, quote } from "shell-quote";

const keepVariable = (key: string): string => `$${key}`;

function entryToWord(entry: ParseEntry): string | null {
	if (typeof entry === "string") return entry;
	if ("comment" in entry) return null;
	if ("pattern" in entry) return entry.pattern;
	return entry.op;
}

/**
 * Splits command text into words with POSIX shell quoting rules.
 *
 * @pure true
 * @example
 * ```ts
 * splitCommand(`check --config "cache-dir = '/dev/null'"`);
 * // ["check", "--config", "cache-dir = '/dev/null'"]
 * ```
 */
export function splitCommand(text: string): readonly string[] {
	const words: string[] = [];
	for (const entry of parse(text, keepVariable)) {
		const word = entryToWord(entry);
		// A comment swallows the rest of the line
		if (word === null) break;
		words.push(word);
	}
	return words;
}

/**
 * Renders an argument vector as a copy-pasteable shell line.
 *
 * @pure true
 */
export function formatCommand(argv: readonly string[]): string {
	return quote(argv);
}
