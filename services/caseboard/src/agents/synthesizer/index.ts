export {
  CaseSynthesizerAgent,
  buildCaseContext,
  formatCaseContext,
  MAX_CONTEXT_NODES,
  MAX_ATTRIBUTES_LENGTH,
} from "./agent.js";
