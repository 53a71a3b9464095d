export { builtinsSection, extractSentinels } from "./extract.js";
export { EMPTY_SENTINEL_TABLE, tabulateSentinels } from "./table.js";
