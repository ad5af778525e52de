export { formatRunSummary, runPipeline } from "./runner";
export type { PipelineDeps, RunSummary } from "./runner";
