// CHANGE: Effectful collaborators of one invocation, injected into the APP layer
// WHY: Ruff, the settings dump and the console are black boxes; tests substitute in-process stand-ins
// PURITY: APP (wiring only)

import { spawnCommand, type CommandRunner } from "../shell/exec/index.js";
import { readRuffSettings, type SettingsReader } from "../shell/config/index.js";
import { type ConsoleSink, liveConsole } from "../shell/output/index.js";

export interface RuffwrapServices {
	readonly readSettings: SettingsReader;
	readonly run: CommandRunner;
	readonly console: ConsoleSink;
}

/** Services that talk to the real Ruff and the real console. */
export const liveServices: RuffwrapServices = {
	readSettings: readRuffSettings,
	run: spawnCommand,
	console: liveConsole,
};
