export { ClassifierAgent, classifyReport } from "./agent.js";
