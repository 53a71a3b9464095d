export { executeBatch } from "./execute.js";
