export {
	type ConsoleSink,
	liveConsole,
	makeReporter,
	type Reporter,
} from "./reporter.js";
