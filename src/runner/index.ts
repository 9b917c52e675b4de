export {
  durationSeconds,
  type EvaluationResult,
  type EvaluationResultJson,
  type PredictionRecordJson,
  toPredictionJson,
  toResultRecord,
} from './result.js';
export {
  buildPredictionRecords,
  EvaluationRunner,
  type EvaluationRunnerOptions,
  type ResolvedComponents,
} from './runner.js';
export {
  formatTimestamp,
  JsonFileResultWriter,
  type ResultWriter,
  resultFileName,
  type WriteOptions,
} from './storage.js';
