export { ReclusterDebunkAgent } from "./agent.js";
