// CHANGE: Argument Router: split argv into wrapper options and passthrough tokens
// WHY: Wrapper options must be recognized anywhere before `--` while every other token is left for Ruff untouched
// PURITY: CORE
// INVARIANT: passthrough preserves the relative order of unrecognized tokens
// INVARIANT: `--` and every token after it are passed through verbatim
// COMPLEXITY: O(n) where n = |argv|

import { Either } from "effect";

import { UsageError } from "../errors.js";
import type { InvocationArgs, WrapperOptions } from "../models.js";

export const SEPARATOR = "--";

const ENTRY_NAME = "ruffwrap";
const ALTERNATE_PREFIX = "ruffwrap-";

/**
 * Option prefix for an entry name: none as `ruffwrap`, `ruffwrap-` otherwise.
 *
 * @pure true
 * @example
 * ```ts
 * optionPrefix("ruff"); // "ruffwrap-"  → --ruffwrap-mode=hook
 * ```
 */
export const optionPrefix = (invokedAs: string): string =>
	invokedAs === ENTRY_NAME ? "" : ALTERNATE_PREFIX;

interface RouteState {
	readonly options: WrapperOptions;
	readonly passthrough: readonly string[];
}

/** Consumed tokens after the current one (0 or 1). */
interface Step {
	readonly state: RouteState;
	readonly skip: number;
}

type OptionHandler = (
	state: RouteState,
	inlineValue: string | undefined,
	next: string | undefined,
	flag: string,
) => Either.Either<Step, UsageError>;

const flagOnly =
	(update: (options: WrapperOptions) => WrapperOptions): OptionHandler =>
	(state, inlineValue, _next, flag) =>
		inlineValue === undefined
			? Either.right({
					state: { ...state, options: update(state.options) },
					skip: 0,
				})
			: Either.left(
					new UsageError({
						detail: `${flag}: ignored explicit argument '${inlineValue}'`,
					}),
				);

const modeHandler: OptionHandler = (state, inlineValue, next, flag) => {
	const fromNext = inlineValue === undefined;
	const value = fromNext ? next : inlineValue;
	if (value === undefined || (fromNext && value.startsWith("-"))) {
		return Either.left(
			new UsageError({ detail: `${flag}: expected one argument` }),
		);
	}
	if (value.length === 0) {
		return Either.left(
			new UsageError({ detail: `${flag}: mode name must not be empty` }),
		);
	}
	return Either.right({
		state: { ...state, options: { ...state.options, mode: value } },
		skip: fromNext ? 1 : 0,
	});
};

// Only these names are options; "--constructor" or "--toString" is passthrough
const HANDLERS: ReadonlyMap<string, OptionHandler> = new Map([
	["mode", modeHandler],
	["mode-require", flagOnly((o) => ({ ...o, modeRequire: true }))],
	["verbose", flagOnly((o) => ({ ...o, verbose: o.verbose + 1 }))],
	["version", flagOnly((o) => ({ ...o, version: true }))],
	["help", flagOnly((o) => ({ ...o, help: true }))],
]);

interface OptionToken {
	readonly flag: string;
	readonly handler: OptionHandler;
	readonly inlineValue: string | undefined;
}

/**
 * Recognizes `--<prefix><name>` and `--<prefix><name>=<value>`.
 *
 * @pure true
 */
function lookupOption(token: string, prefix: string): OptionToken | null {
	const lead = `--${prefix}`;
	if (!token.startsWith(lead)) return null;
	const body = token.slice(lead.length);
	const eq = body.indexOf("=");
	const name = eq === -1 ? body : body.slice(0, eq);
	const handler = HANDLERS.get(name);
	if (handler === undefined) return null;
	return {
		flag: `${lead}${name}`,
		handler,
		inlineValue: eq === -1 ? undefined : body.slice(eq + 1),
	};
}

export const DEFAULT_OPTIONS: WrapperOptions = {
	modeRequire: false,
	verbose: 0,
	version: false,
	help: false,
};

/**
 * Partitions raw arguments into wrapper options and passthrough tokens.
 *
 * @param argv - arguments after the program name
 * @param prefix - option prefix from {@link optionPrefix}
 * @returns Either.right(InvocationArgs) or Either.left(UsageError)
 *
 * @pure true
 * @example
 * ```ts
 * routeArguments(["--mode=hook", "--", "a.py"], "");
 * // Right({ options: { mode: "hook", ... }, passthrough: ["--", "a.py"] })
 * ```
 */
export function routeArguments(
	argv: readonly string[],
	prefix: string,
): Either.Either<InvocationArgs, UsageError> {
	let state: RouteState = { options: DEFAULT_OPTIONS, passthrough: [] };

	for (let i = 0; i < argv.length; i++) {
		const token = argv[i] ?? "";
		if (token === SEPARATOR) {
			state = {
				...state,
				passthrough: [...state.passthrough, ...argv.slice(i)],
			};
			break;
		}
		const option = lookupOption(token, prefix);
		if (option === null) {
			state = { ...state, passthrough: [...state.passthrough, token] };
			continue;
		}
		const step = option.handler(
			state,
			option.inlineValue,
			argv[i + 1],
			option.flag,
		);
		if (Either.isLeft(step)) return Either.left(step.left);
		state = step.right.state;
		i += step.right.skip;
	}

	return Either.right(state);
}
