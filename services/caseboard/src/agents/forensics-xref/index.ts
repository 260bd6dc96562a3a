export { ForensicsXrefAgent, MAX_CLAIMS, MAX_HITS_PER_CLAIM, MAX_QUERY_LENGTH } from "./agent.js";
