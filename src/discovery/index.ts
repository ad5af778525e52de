// Public API for the discovery module
export { fetchRecencyScores, rankFor, type RecencyScores } from "./recency";
export {
  classifyRelease,
  detectReleases,
  rankCandidates,
  relevanceScore,
} from "./releases";
export {
  formatReleasesAsJson,
  formatReleasesAsText,
  readReleaseSnapshot,
  writeReleaseSnapshot,
  type OutputFormat,
} from "./formatting";
export type { DetectionOptions, ReleaseCandidate, ReleaseType } from "./types";
