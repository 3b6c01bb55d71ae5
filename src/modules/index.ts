/**
 * Pipeline modules export
 */

export { parseBatchJobs, readBatchJobFile } from "./job-parser";
export type { TransformParser } from "./job-parser";
export { selectStrategy } from "./strategy";
export type { ConversionStrategy, StrategyInput } from "./strategy";
export { convertJob, withDocument } from "./dispatcher";
export {
  batchConvert,
  runBatch,
  processJobs,
  formatJobFailure,
  summarizeFailures,
} from "./batch-runner";
export { stats } from "./stats";
