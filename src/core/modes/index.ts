export { formatCommand, splitCommand } from "./command.js";
export { describeStep, expandStep, stepArguments } from "./plan.js";
export {
	defaultExecutableArgv,
	planForMode,
	resolveExecutable,
	resolveInvocation,
	userSteps,
} from "./resolve.js";
export {
	isStandardModeName,
	STANDARD_MODES,
	standardSteps,
} from "./standard.js";
