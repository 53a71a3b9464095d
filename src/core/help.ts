// CHANGE: Usage and version text
// WHY: --help and --version answer without touching Ruff or its configuration
// PURITY: CORE
// INVARIANT: option names in the text carry the same prefix the router accepts
// COMPLEXITY: O(1)

/** Set by the release pipeline; unknown in development builds. */
export const VERSION: string | undefined = undefined;

/**
 * Text printed for `--version`.
 *
 * @pure true
 */
export const versionText = (version: string | undefined = VERSION): string =>
	version ?? "Unknown";

/**
 * Text printed for `--help`.
 *
 * @param prefix - option prefix for the entry name (see optionPrefix)
 * @param entry - name the program was invoked as
 *
 * @pure true
 */
export function helpText(prefix: string, entry: string): string {
	const opt = (name: string): string => `--${prefix}${name}`;
	return [
		`usage: ${entry} [${opt("mode")}=<mode>] [${opt("mode-require")}] [${opt("verbose")}] [${opt("version")}] [${opt("help")}] [passthrough_args]`,
		"",
		"Runs Ruff at the version pinned by a __RUFFWRAP_EXEC__ sentinel in Ruff",
		"configuration, or runs a named batch of Ruff commands against a list of paths.",
		"",
		"Single mode (no mode option): runs Ruff once with all passthrough arguments.",
		"",
		"Batch mode (mode option given): runs the commands of the mode in order against",
		"the given paths and stops at the first failing command. A mode is defined by",
		"__RUFFWRAP_MODE_<mode>_STANDARD_DEFINITION__ for one of the standard modes, or by",
		"__RUFFWRAP_MODE_<mode>_CMD_<n>__<ruff arguments> sentinels run in ascending <n>.",
		"An undefined mode exits 0 without running anything unless mode-require is set.",
		"",
		"Standard modes:",
		"  hook      format; check --no-fix",
		"  hook-fix  format; check --fix",
		"  verify    format --check; check --no-fix",
		"  enroll    format; check --fix",
		"",
		"Options:",
		`  ${opt("mode")}=<mode>   mode to run, e.g. hook, hook-fix, verify, enroll`,
		`  ${opt("mode-require")}  fail if the mode is not defined`,
		`  ${opt("verbose")}       echo each Ruff command; repeat for more detail`,
		`  ${opt("version")}       print the version and exit`,
		`  ${opt("help")}          print this help and exit`,
		"",
		"Passthrough arguments:",
		"  In single mode they go to Ruff unchanged. In batch mode they are paths; begin",
		'  the list with "--" so paths that look like options are not mistaken for them.',
		'  With "--" present, any passthrough argument before it is an error.',
		"",
		"Environment variables:",
		"  RUFFWRAP_EXEC  default Ruff executable, also used to read configuration",
		"                 (default /usr/bin/ruff)",
		"  RUFFWRAP_SKIP  when set, ignore sentinels and run RUFFWRAP_EXEC in single mode",
		"",
		"Exit status: 0 on success, the status of the first failing Ruff command,",
		"2 for a usage error, 3 for arguments before the path separator, 4 for a",
		"required mode that is not defined, 200 when Ruff cannot be started.",
	].join("\n");
}
