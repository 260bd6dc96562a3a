export { ClaudeCaseAnalyst } from "./analyst.js";
export { extractJson } from "./schema.js";
