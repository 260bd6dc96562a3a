export { Intake, type IntakeDependencies, type SubmittedReport } from "./intake.js";
export {
  ReportInputSchema,
  EvidenceInputSchema,
  EdgeInputSchema,
  relationToEdgeKind,
  parseInput,
  type ReportInput,
  type EvidenceInput,
  type EdgeInput,
} from "./schema.js";
