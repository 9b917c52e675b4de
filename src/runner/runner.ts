/**
 * EvaluationRunner: resolves the configured components, runs the task and
 * scores the responses.
 */

import type { ComponentRegistries } from '../components.js';
import type { EvaluationConfig } from '../config/schema.js';
import type { Dataset } from '../datasets/base.js';
import { createLogger, type Logger } from '../logger.js';
import { assertAligned, type Metric } from '../metrics/base.js';
import type { ModelAdapter } from '../models/base.js';
import type { Task } from '../tasks/base.js';
import type { Example, MetricResult, ModelResponse, PredictionRecord } from '../types.js';
import { durationSeconds, type EvaluationResult } from './result.js';
import { JsonFileResultWriter, type ResultWriter } from './storage.js';

export interface EvaluationRunnerOptions {
  registries: ComponentRegistries;
  /** Defaults to a JsonFileResultWriter on `config.output.directory`. */
  writer?: ResultWriter;
  logger?: Logger;
  clock?: () => Date;
}

export interface ResolvedComponents {
  dataset: Dataset;
  model: ModelAdapter;
  task: Task;
  metrics: Metric[];
}

export class EvaluationRunner {
  readonly config: EvaluationConfig;
  private readonly registries: ComponentRegistries;
  private readonly writer: ResultWriter | null;
  private readonly logger: Logger;
  private readonly clock: () => Date;

  constructor(config: EvaluationConfig, opts: EvaluationRunnerOptions) {
    this.config = config;
    this.registries = opts.registries;
    this.logger = opts.logger ?? createLogger({ scope: 'runner' });
    this.clock = opts.clock ?? (() => new Date());
    const directory = config.output.directory;
    this.writer = opts.writer ?? (directory === null ? null : new JsonFileResultWriter(directory));
  }

  /**
   * Build the dataset, model, task and metrics named by the config.
   * Freezes the registries first.
   */
  resolve(): ResolvedComponents {
    const { datasets, models, metrics, tasks } = this.registries;
    datasets.freeze();
    models.freeze();
    metrics.freeze();
    tasks.freeze();

    const context = { logger: this.logger };
    const dataset = datasets.create(this.config.dataset.type, this.config.dataset.parameters, context);
    const model = models.create(this.config.model.type, this.config.model.parameters, context);
    const task = tasks.create(this.config.task, dataset, model);
    const resolvedMetrics = this.config.metrics.map((metric) =>
      metrics.create(
        metric.type,
        metric.name === null ? metric.parameters : { ...metric.parameters, name: metric.name },
      ),
    );
    return { dataset, model, task, metrics: resolvedMetrics };
  }

  async run(): Promise<EvaluationResult> {
    const { dataset, task, metrics } = this.resolve();
    this.logger.info(`Running '${this.config.name}' (${this.config.task}) on ${dataset.source}`);

    const startedAt = this.clock();
    const responses = await task.run();
    const completedAt = this.clock();

    const examples = dataset.examples();
    const metricResults: MetricResult[] = metrics.map((metric) => {
      const result = metric.compute(examples, responses);
      this.logger.debug(`${result.name} = ${result.value}`);
      return result;
    });

    const result: EvaluationResult = {
      name: this.config.name,
      task: this.config.task,
      metrics: metricResults,
      predictions: buildPredictionRecords(examples, responses),
      startedAt,
      completedAt,
      outputPath: null,
    };
    this.logger.info(
      `Completed ${result.predictions.length} predictions in ${durationSeconds(result).toFixed(2)}s`,
    );

    if (this.config.output.directory !== null && this.writer !== null) {
      result.outputPath = await this.writer.write(result, {
        savePredictions: this.config.output.savePredictions,
      });
      if (result.outputPath !== null) {
        this.logger.info(`Wrote results to ${result.outputPath}`);
      }
    }
    return result;
  }
}

/**
 * Join each example with its response. Both lists must be aligned by position.
 */
export function buildPredictionRecords(
  examples: readonly Example[],
  responses: readonly ModelResponse[],
): PredictionRecord[] {
  assertAligned(examples, responses);
  return examples.map((example, i) => ({
    uid: example.uid,
    inputs: example.inputs,
    expectedOutput: example.expectedOutput,
    predictedOutput: responses[i].output,
    metadata: responses[i].metadata,
  }));
}
