export {
	DEFAULT_EXECUTABLE,
	entryName,
	readEnvironment,
} from "./env.js";
export {
	makeSettingsReader,
	readRuffSettings,
	type SettingsReader,
	SHOW_SETTINGS_ARGS,
} from "./settings.js";
