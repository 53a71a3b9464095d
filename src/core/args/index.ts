export { splitBatchPaths } from "./paths.js";
export {
	DEFAULT_OPTIONS,
	optionPrefix,
	routeArguments,
	SEPARATOR,
} from "./route.js";
