export {
	type CapturedOutput,
	type CommandCapturer,
	type CommandRunner,
	captureCommand,
	spawnCommand,
} from "./process.js";
