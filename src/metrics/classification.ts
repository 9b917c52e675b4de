/**
 * Classification metrics: accuracy, precision/recall/F1, confusion matrix and
 * label distribution.
 *
 * Labels are compared by their canonical string form (`labelOf`). The label
 * universe of a response set is the sorted union of expected and predicted labels.
 */

import { z } from 'zod';
import { parseParams } from '../config/params.js';
import { InvalidAverageError } from '../errors.js';
import type { Example, MetricResult, ModelResponse } from '../types.js';
import { assertAligned, mean, Metric } from './base.js';

export const AVERAGES = ['macro', 'weighted', 'micro'] as const;
export type Average = (typeof AVERAGES)[number];

export type ScoreKind = 'precision' | 'recall' | 'f1';

export interface LabelScores {
  precision: number;
  recall: number;
  f1: number;
  support: number;
}

/**
 * Per-label counts for an aligned response set.
 */
export interface LabelStats {
  labels: string[];
  truePositives: Map<string, number>;
  falsePositives: Map<string, number>;
  falseNegatives: Map<string, number>;
  /** Number of examples whose expected label is the key. */
  support: Map<string, number>;
  /** Rows are expected labels, columns predicted labels, both in `labels` order. */
  matrix: number[][];
  correct: number;
  total: number;
}

export const metricNameSchema = z.object({ name: z.string().nullish() });

export const labelScoreOptionsSchema = z.object({
  name: z.string().nullish(),
  average: z.string().optional(),
});

export type LabelScoreOptions = z.input<typeof labelScoreOptionsSchema>;

/**
 * Canonical string form of a label: strings as-is, other scalars via String,
 * null/undefined as 'null', objects as JSON with sorted keys.
 */
export function labelOf(value: unknown): string {
  if (typeof value === 'string') return value;
  if (value === null || value === undefined) return 'null';
  if (typeof value === 'object') return JSON.stringify(sortKeys(value));
  return String(value);
}

function sortKeys(value: unknown): unknown {
  if (Array.isArray(value)) return value.map(sortKeys);
  if (value !== null && typeof value === 'object') {
    return Object.fromEntries(
      Object.entries(value)
        .sort(([a], [b]) => (a < b ? -1 : a > b ? 1 : 0))
        .map(([k, v]) => [k, sortKeys(v)]),
    );
  }
  return value;
}

export function isAverage(value: string): value is Average {
  return AVERAGES.some((average) => average === value);
}

export function collectLabelStats(
  examples: readonly Example[],
  responses: readonly ModelResponse[],
): LabelStats {
  assertAligned(examples, responses);

  const pairs = examples.map((example, i) => ({
    expected: labelOf(example.expectedOutput),
    predicted: labelOf(responses[i].output),
  }));
  const labels = [...new Set(pairs.flatMap((p) => [p.expected, p.predicted]))].sort();
  const labelToIdx = new Map(labels.map((label, i) => [label, i]));
  const matrix = labels.map(() => labels.map(() => 0));

  const zeroes = () => new Map(labels.map((label) => [label, 0]));
  const truePositives = zeroes();
  const falsePositives = zeroes();
  const falseNegatives = zeroes();
  const support = zeroes();
  const bump = (counts: Map<string, number>, label: string) =>
    counts.set(label, (counts.get(label) ?? 0) + 1);

  let correct = 0;
  for (const { expected, predicted } of pairs) {
    bump(support, expected);
    if (expected === predicted) {
      bump(truePositives, expected);
      correct++;
    } else {
      bump(falsePositives, predicted);
      bump(falseNegatives, expected);
    }
    matrix[labelToIdx.get(expected) ?? 0][labelToIdx.get(predicted) ?? 0] += 1;
  }

  return {
    labels,
    truePositives,
    falsePositives,
    falseNegatives,
    support,
    matrix,
    correct,
    total: pairs.length,
  };
}

function ratio(numerator: number, denominator: number): number {
  return denominator > 0 ? numerator / denominator : 0;
}

function harmonicMean(precision: number, recall: number): number {
  return precision + recall > 0 ? (2 * precision * recall) / (precision + recall) : 0;
}

export function perLabelScores(stats: LabelStats): Map<string, LabelScores> {
  const scores = new Map<string, LabelScores>();
  for (const label of stats.labels) {
    const tp = stats.truePositives.get(label) ?? 0;
    const fp = stats.falsePositives.get(label) ?? 0;
    const fn = stats.falseNegatives.get(label) ?? 0;
    const precision = ratio(tp, tp + fp);
    const recall = ratio(tp, tp + fn);
    scores.set(label, {
      precision,
      recall,
      f1: harmonicMean(precision, recall),
      support: stats.support.get(label) ?? 0,
    });
  }
  return scores;
}

/**
 * Combine per-label scores into one number using the given averaging strategy.
 */
export function averageScore(stats: LabelStats, kind: ScoreKind, average: Average): number {
  if (average === 'micro') {
    let tp = 0;
    let fp = 0;
    let fn = 0;
    for (const label of stats.labels) {
      tp += stats.truePositives.get(label) ?? 0;
      fp += stats.falsePositives.get(label) ?? 0;
      fn += stats.falseNegatives.get(label) ?? 0;
    }
    const precision = ratio(tp, tp + fp);
    const recall = ratio(tp, tp + fn);
    if (kind === 'precision') return precision;
    if (kind === 'recall') return recall;
    return harmonicMean(precision, recall);
  }

  const scores = [...perLabelScores(stats).values()];
  if (average === 'macro') {
    return mean(scores.map((s) => s[kind]));
  }

  const totalSupport = scores.reduce((sum, s) => sum + s.support, 0);
  if (totalSupport === 0) return 0;
  return scores.reduce((sum, s) => sum + s[kind] * s.support, 0) / totalSupport;
}

export class AccuracyMetric extends Metric {
  constructor(opts: { name?: string | null } = {}) {
    super(opts.name ?? 'accuracy');
  }

  static fromParams(params: Record<string, unknown>): AccuracyMetric {
    return new AccuracyMetric(parseParams(metricNameSchema, params, 'accuracy'));
  }

  compute(examples: readonly Example[], responses: readonly ModelResponse[]): MetricResult {
    const { correct, total } = collectLabelStats(examples, responses);
    return {
      name: this.name,
      value: ratio(correct, total),
      details: { correct, total },
    };
  }
}

abstract class LabelScoreMetric extends Metric {
  readonly average: Average;
  protected readonly kind: ScoreKind;

  protected constructor(kind: ScoreKind, opts: LabelScoreOptions) {
    const average = opts.average ?? 'macro';
    if (!isAverage(average)) {
      throw new InvalidAverageError(average, AVERAGES);
    }
    super(opts.name ?? `${kind}_${average}`);
    this.kind = kind;
    this.average = average;
  }

  compute(examples: readonly Example[], responses: readonly ModelResponse[]): MetricResult {
    const stats = collectLabelStats(examples, responses);
    return {
      name: this.name,
      value: averageScore(stats, this.kind, this.average),
      details: {
        average: this.average,
        per_label: Object.fromEntries(perLabelScores(stats)),
        support: stats.total,
      },
    };
  }
}

export class PrecisionMetric extends LabelScoreMetric {
  constructor(opts: LabelScoreOptions = {}) {
    super('precision', opts);
  }

  static fromParams(params: Record<string, unknown>): PrecisionMetric {
    return new PrecisionMetric(parseParams(labelScoreOptionsSchema, params, 'precision'));
  }
}

export class RecallMetric extends LabelScoreMetric {
  constructor(opts: LabelScoreOptions = {}) {
    super('recall', opts);
  }

  static fromParams(params: Record<string, unknown>): RecallMetric {
    return new RecallMetric(parseParams(labelScoreOptionsSchema, params, 'recall'));
  }
}

export class F1Metric extends LabelScoreMetric {
  constructor(opts: LabelScoreOptions = {}) {
    super('f1', opts);
  }

  static fromParams(params: Record<string, unknown>): F1Metric {
    return new F1Metric(parseParams(labelScoreOptionsSchema, params, 'f1'));
  }
}

/**
 * Square matrix over the sorted label universe; the value is a constant 1.0.
 */
export class ConfusionMatrixMetric extends Metric {
  constructor(opts: { name?: string | null } = {}) {
    super(opts.name ?? 'confusion_matrix');
  }

  static fromParams(params: Record<string, unknown>): ConfusionMatrixMetric {
    return new ConfusionMatrixMetric(parseParams(metricNameSchema, params, 'confusion-matrix'));
  }

  compute(examples: readonly Example[], responses: readonly ModelResponse[]): MetricResult {
    const { labels, matrix } = collectLabelStats(examples, responses);
    return { name: this.name, value: 1.0, details: { labels, matrix } };
  }
}

/**
 * Counts of expected and predicted labels, keyed in sorted label order.
 */
export class LabelDistributionMetric extends Metric {
  constructor(opts: { name?: string | null } = {}) {
    super(opts.name ?? 'label_distribution');
  }

  static fromParams(params: Record<string, unknown>): LabelDistributionMetric {
    return new LabelDistributionMetric(
      parseParams(metricNameSchema, params, 'label-distribution'),
    );
  }

  compute(examples: readonly Example[], responses: readonly ModelResponse[]): MetricResult {
    assertAligned(examples, responses);
    const expected = countLabels(examples.map((e) => labelOf(e.expectedOutput)));
    const predicted = countLabels(responses.map((r) => labelOf(r.output)));
    return {
      name: this.name,
      value: 1.0,
      details: {
        // Object keys that look like integers enumerate first; `labels` keeps the sorted order.
        labels: [...new Set([...expected.keys(), ...predicted.keys()])].sort(),
        expected: Object.fromEntries(expected),
        predicted: Object.fromEntries(predicted),
      },
    };
  }
}

function countLabels(labels: readonly string[]): Map<string, number> {
  const counts = new Map<string, number>();
  for (const label of [...labels].sort()) {
    counts.set(label, (counts.get(label) ?? 0) + 1);
  }
  return counts;
}
