export {
  ForensicsAgent,
  isVideoUrl,
  VIDEO_EXTENSIONS,
  REPOST_MAX_DISTANCE,
  MUTATION_MAX_DISTANCE,
  IMAGE_FALLBACK,
  VIDEO_FALLBACK,
  type ForensicsOptions,
} from "./agent.js";
