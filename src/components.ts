/**
 * The four component registries and the built-in components.
 */

import type { Dataset } from './datasets/base.js';
import { JsonlRagDataset } from './datasets/jsonl-rag.js';
import { JsonlClassificationDataset } from './datasets/jsonl.js';
import type { Logger } from './logger.js';
import type { Metric } from './metrics/base.js';
import {
  AccuracyMetric,
  ConfusionMatrixMetric,
  F1Metric,
  LabelDistributionMetric,
  PrecisionMetric,
  RecallMetric,
} from './metrics/classification.js';
import { BleuMetric, ContextPrecisionMetric, RougeLMetric } from './metrics/generation.js';
import type { ModelAdapter } from './models/base.js';
import { KeywordMatchingModel } from './models/keyword.js';
import { McpModelAdapter } from './models/mcp.js';
import { Registry } from './registry.js';
import type { Task } from './tasks/base.js';
import { TextClassificationTask } from './tasks/classification.js';
import { RetrievalQuestionAnsweringTask } from './tasks/retrieval.js';

/** Shared services handed to dataset and model factories. */
export interface ComponentContext {
  logger: Logger;
}

type Params = Record<string, unknown>;

export type DatasetRegistry = Registry<Dataset, [params: Params, context: ComponentContext]>;
export type ModelRegistry = Registry<ModelAdapter, [params: Params, context: ComponentContext]>;
export type MetricRegistry = Registry<Metric, [params: Params]>;
export type TaskRegistry = Registry<Task, [dataset: Dataset, model: ModelAdapter]>;

export interface ComponentRegistries {
  datasets: DatasetRegistry;
  models: ModelRegistry;
  metrics: MetricRegistry;
  tasks: TaskRegistry;
}

export function createRegistries(): ComponentRegistries {
  return {
    datasets: new Registry<Dataset, [Params, ComponentContext]>('dataset'),
    models: new Registry<ModelAdapter, [Params, ComponentContext]>('model'),
    metrics: new Registry<Metric, [Params]>('metric'),
    tasks: new Registry<Task, [Dataset, ModelAdapter]>('task'),
  };
}

export function registerBuiltins(registries: ComponentRegistries): ComponentRegistries {
  registries.datasets
    .register('jsonl-classification', (params, { logger }) =>
      JsonlClassificationDataset.fromParams(params, logger),
    )
    .register('jsonl-rag', (params, { logger }) => JsonlRagDataset.fromParams(params, logger));

  registries.models
    .register('keyword-matching', (params) => KeywordMatchingModel.fromParams(params))
    .register('mcp', (params, { logger }) => McpModelAdapter.fromParams(params, { logger }));

  registries.metrics
    .register('accuracy', (params) => AccuracyMetric.fromParams(params))
    .register('precision', (params) => PrecisionMetric.fromParams(params))
    .register('recall', (params) => RecallMetric.fromParams(params))
    .register('f1', (params) => F1Metric.fromParams(params))
    .register('confusion-matrix', (params) => ConfusionMatrixMetric.fromParams(params))
    .register('label-distribution', (params) => LabelDistributionMetric.fromParams(params))
    .register('rouge-l', (params) => RougeLMetric.fromParams(params))
    .register('bleu', (params) => BleuMetric.fromParams(params))
    .register('context-precision', (params) => ContextPrecisionMetric.fromParams(params));

  registries.tasks
    .register('text-classification', (dataset, model) => new TextClassificationTask(dataset, model))
    .register('retrieval-qa', (dataset, model) => new RetrievalQuestionAnsweringTask(dataset, model));

  return registries;
}

/**
 * Fresh registries populated with every built-in component.
 */
export function createDefaultRegistries(): ComponentRegistries {
  return registerBuiltins(createRegistries());
}
