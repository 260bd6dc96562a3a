export {
  Alerts,
  ALERT_CONTEXT_NODES,
  ALERT_CONTEXT_LENGTH,
  CASE_NOT_FOUND_DRAFT,
  DRAFT_UNAVAILABLE,
  type Alert,
  type AlertDraft,
  type AlertMessage,
  type AlertSubscriber,
  type AlertsDependencies,
} from "./alerts.js";
export {
  AlertStatusSchema,
  AlertDraftInputSchema,
  AlertApproveInputSchema,
  type AlertStatus,
  type AlertDraftInput,
  type AlertApproveInput,
} from "./schema.js";
