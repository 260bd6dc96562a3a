export { ClusteringAgent, type ClusterMatch } from "./agent.js";
export {
  SIMILARITY_THRESHOLD,
  WEIGHTS,
  EARTH_RADIUS_M,
  temporalScore,
  geoScore,
  semanticScore,
  haversineMeters,
  scoreReports,
  type SimilarityScores,
} from "./scoring.js";
