import type { MetricResult, PredictionRecord } from '../types.js';

/**
 * The outcome of one evaluation run.
 */
export interface EvaluationResult {
  name: string;
  task: string;
  /** In configured order. */
  metrics: MetricResult[];
  /** In dataset order. */
  predictions: PredictionRecord[];
  startedAt: Date;
  completedAt: Date;
  /** Where the result was persisted, if anywhere. */
  outputPath: string | null;
}

export interface PredictionRecordJson {
  uid: string;
  inputs: Readonly<Record<string, unknown>>;
  expected_output: unknown;
  predicted_output: unknown;
  metadata: Readonly<Record<string, unknown>>;
}

export interface EvaluationResultJson {
  name: string;
  task: string;
  started_at: string;
  completed_at: string;
  duration_seconds: number;
  metrics: MetricResult[];
  output_path: string | null;
  predictions?: PredictionRecordJson[];
}

export function durationSeconds(result: Pick<EvaluationResult, 'startedAt' | 'completedAt'>): number {
  return (result.completedAt.getTime() - result.startedAt.getTime()) / 1000;
}

export function toPredictionJson(record: PredictionRecord): PredictionRecordJson {
  return {
    uid: record.uid,
    inputs: record.inputs,
    expected_output: record.expectedOutput,
    predicted_output: record.predictedOutput,
    metadata: record.metadata,
  };
}

/**
 * The JSON record written to disk and printed by the CLI.
 */
export function toResultRecord(
  result: EvaluationResult,
  opts?: { includePredictions?: boolean },
): EvaluationResultJson {
  const record: EvaluationResultJson = {
    name: result.name,
    task: result.task,
    started_at: result.startedAt.toISOString(),
    completed_at: result.completedAt.toISOString(),
    duration_seconds: durationSeconds(result),
    metrics: result.metrics.map((metric) => ({
      name: metric.name,
      value: metric.value,
      details: metric.details,
    })),
    output_path: result.outputPath,
  };
  if (opts?.includePredictions ?? true) {
    record.predictions = result.predictions.map(toPredictionJson);
  }
  return record;
}
