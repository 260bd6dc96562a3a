export {
  NetworkAgent,
  MAX_REVIEWS_PER_CLAIM,
  MAX_CLAIM_TEXT_LENGTH,
  EXTERNAL_SOURCE_CONFIDENCE,
} from "./agent.js";
