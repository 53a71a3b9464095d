// CHANGE: Single import point for domain types
// WHY: SHELL and APP import models through one module

export type {
	EnvironmentSnapshot,
	ExitCode,
	InvocationArgs,
	ModePlan,
	ModeRequest,
	PlanStep,
	RawCommand,
	Resolution,
	Sentinel,
	SentinelTable,
	StandardModeName,
	StandardStep,
	WrapperOptions,
} from "../models.js";
export { EXIT } from "../models.js";
export {
	describeError,
	type ExecFailure,
	extractExecFailure,
} from "./exec-helpers.js";
