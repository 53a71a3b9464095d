// CHANGE: Path separator rule for batch mode
// WHY: A leading `--` protects paths that look like options; anything before it is a mistyped option
// PURITY: CORE
// INVARIANT: `--` ∈ args ⇒ (prefix before it ≠ [] ⇒ error) ∧ paths = tokens after the first `--`
// INVARIANT: `--` ∉ args ⇒ paths = args
// COMPLEXITY: O(n)

import { Either } from "effect";

import { UnexpectedArguments } from "../errors.js";
import { SEPARATOR } from "./route.js";

/**
 * Interprets batch-mode passthrough tokens as paths.
 *
 * @param mode - requested mode, for the error message
 * @param passthrough - tokens left after wrapper options were routed
 *
 * @pure true
 * @example
 * ```ts
 * splitBatchPaths("hook", ["--", "--weird-name.py"]); // Right(["--weird-name.py"])
 * splitBatchPaths("hook", ["--fix", "--", "a.py"]);   // Left(UnexpectedArguments)
 * ```
 */
export function splitBatchPaths(
	mode: string,
	passthrough: readonly string[],
): Either.Either<readonly string[], UnexpectedArguments> {
	const separator = passthrough.indexOf(SEPARATOR);
	if (separator === -1) return Either.right(passthrough);
	if (separator > 0) {
		return Either.left(
			new UnexpectedArguments({
				mode,
				tokens: passthrough.slice(0, separator),
			}),
		);
	}
	return Either.right(passthrough.slice(separator + 1));
}
