/**
 * Generation metrics for free-text outputs: ROUGE-L, BLEU and context precision.
 *
 * Text is tokenized by lowercasing and splitting on whitespace. Each metric
 * scores every example, reports the scores by uid in `details.per_example`,
 * and uses their arithmetic mean as the value.
 */

import { z } from 'zod';
import { parseParams } from '../config/params.js';
import { ConfigurationError } from '../errors.js';
import type { Example, MetricResult, ModelResponse } from '../types.js';
import { assertAligned, mean, Metric } from './base.js';
import { metricNameSchema } from './classification.js';

export function tokenize(text: string): string[] {
  return text
    .toLowerCase()
    .split(/\s+/)
    .filter((token) => token.length > 0);
}

function textOf(value: unknown): string {
  if (value === null || value === undefined) return '';
  return typeof value === 'string' ? value : String(value);
}

/**
 * Length of the longest common subsequence of two token sequences.
 */
export function lcsLength(reference: readonly string[], hypothesis: readonly string[]): number {
  if (reference.length === 0 || hypothesis.length === 0) return 0;

  let previous = new Array<number>(hypothesis.length + 1).fill(0);
  for (let i = 1; i <= reference.length; i++) {
    const current = new Array<number>(hypothesis.length + 1).fill(0);
    for (let j = 1; j <= hypothesis.length; j++) {
      current[j] =
        reference[i - 1] === hypothesis[j - 1]
          ? previous[j - 1] + 1
          : Math.max(previous[j], current[j - 1]);
    }
    previous = current;
  }
  return previous[hypothesis.length];
}

export function rougeL(reference: readonly string[], hypothesis: readonly string[]): number {
  if (reference.length === 0 && hypothesis.length === 0) return 1.0;

  const lcs = lcsLength(reference, hypothesis);
  const precision = hypothesis.length > 0 ? lcs / hypothesis.length : 0;
  const recall = reference.length > 0 ? lcs / reference.length : 0;
  if (precision + recall === 0) return 0;
  return (2 * precision * recall) / (precision + recall);
}

function summarize(
  name: string,
  perExample: Map<string, number>,
  extra: Record<string, unknown> = {},
): MetricResult {
  return {
    name,
    value: mean([...perExample.values()]),
    details: { per_example: Object.fromEntries(perExample), ...extra },
  };
}

export class RougeLMetric extends Metric {
  constructor(opts: { name?: string | null } = {}) {
    super(opts.name ?? 'rouge_l');
  }

  static fromParams(params: Record<string, unknown>): RougeLMetric {
    return new RougeLMetric(parseParams(metricNameSchema, params, 'rouge-l'));
  }

  compute(examples: readonly Example[], responses: readonly ModelResponse[]): MetricResult {
    assertAligned(examples, responses);
    const perExample = new Map<string, number>();
    examples.forEach((example, i) => {
      perExample.set(
        example.uid,
        rougeL(tokenize(textOf(example.expectedOutput)), tokenize(textOf(responses[i].output))),
      );
    });
    return summarize(this.name, perExample);
  }
}

function ngramCounts(tokens: readonly string[], n: number): Map<string, number> {
  const counts = new Map<string, number>();
  for (let i = 0; i + n <= tokens.length; i++) {
    // Tokens never contain whitespace, so a space-joined key is unambiguous.
    const key = tokens.slice(i, i + n).join(' ');
    counts.set(key, (counts.get(key) ?? 0) + 1);
  }
  return counts;
}

/**
 * Modified n-gram precision: candidate counts are clipped to the reference counts.
 */
export function modifiedPrecision(
  candidate: readonly string[],
  reference: readonly string[],
  n: number,
): number {
  if (candidate.length < n) return 0;

  const candidateCounts = ngramCounts(candidate, n);
  const referenceCounts = ngramCounts(reference, n);
  let clipped = 0;
  let total = 0;
  for (const [ngram, count] of candidateCounts) {
    clipped += Math.min(count, referenceCounts.get(ngram) ?? 0);
    total += count;
  }
  return total > 0 ? clipped / total : 0;
}

export function brevityPenalty(candidateLength: number, referenceLength: number): number {
  if (candidateLength === 0) return 0;
  if (referenceLength === 0 || candidateLength >= referenceLength) return 1;
  return Math.exp(1 - referenceLength / candidateLength);
}

/**
 * Sentence-level BLEU for one candidate against one reference.
 *
 * Orders run from 1 to `min(maxN, |reference|)` (at least 1): the reference
 * has no n-grams beyond its own length.
 */
export function sentenceBleu(
  candidate: readonly string[],
  reference: readonly string[],
  maxN: number,
  smoothing: number,
): number {
  if (candidate.length === 0) return 0;

  const orders = Math.max(1, Math.min(maxN, reference.length));
  let logSum = 0;
  for (let n = 1; n <= orders; n++) {
    const precision = modifiedPrecision(candidate, reference, n);
    logSum += Math.log(precision > 0 ? precision : smoothing);
  }
  return brevityPenalty(candidate.length, reference.length) * Math.exp(logSum / orders);
}

export const bleuOptionsSchema = z.object({
  name: z.string().nullish(),
  maxN: z.number().int().optional(),
  /** Stands in for a zero n-gram precision, so it must not exceed 1. */
  smoothing: z.number().positive().max(1).optional(),
});

export type BleuOptions = z.input<typeof bleuOptionsSchema>;

/**
 * BLEU averaged over examples. Each example is scored on its own and the
 * scores are averaged; n-gram counts are not pooled across the corpus.
 */
export class BleuMetric extends Metric {
  readonly maxN: number;
  readonly smoothing: number;

  constructor(opts: BleuOptions = {}) {
    super(opts.name ?? 'bleu');
    this.maxN = Math.max(1, opts.maxN ?? 4);
    this.smoothing = opts.smoothing ?? 1e-9;
    if (!(this.smoothing > 0 && this.smoothing <= 1)) {
      throw new ConfigurationError(`BLEU smoothing must be in (0, 1], got ${this.smoothing}`);
    }
  }

  static fromParams(params: Record<string, unknown>): BleuMetric {
    return new BleuMetric(parseParams(bleuOptionsSchema, params, 'bleu'));
  }

  compute(examples: readonly Example[], responses: readonly ModelResponse[]): MetricResult {
    assertAligned(examples, responses);
    const perExample = new Map<string, number>();
    examples.forEach((example, i) => {
      perExample.set(
        example.uid,
        sentenceBleu(
          tokenize(textOf(responses[i].output)),
          tokenize(textOf(example.expectedOutput)),
          this.maxN,
          this.smoothing,
        ),
      );
    });
    return summarize(this.name, perExample, { max_n: this.maxN, smoothing: this.smoothing });
  }
}

/**
 * Share of predicted tokens that appear in the available context.
 *
 * The context comes from the response's `retrieved_documents[].text`, or
 * failing that from the example's `reference_contexts`.
 */
export class ContextPrecisionMetric extends Metric {
  constructor(opts: { name?: string | null } = {}) {
    super(opts.name ?? 'context_precision');
  }

  static fromParams(params: Record<string, unknown>): ContextPrecisionMetric {
    return new ContextPrecisionMetric(parseParams(metricNameSchema, params, 'context-precision'));
  }

  compute(examples: readonly Example[], responses: readonly ModelResponse[]): MetricResult {
    assertAligned(examples, responses);
    const perExample = new Map<string, number>();
    examples.forEach((example, i) => {
      perExample.set(example.uid, contextPrecision(example, responses[i]));
    });
    return summarize(this.name, perExample);
  }
}

function contextPrecision(example: Example, response: ModelResponse): number {
  const predicted = tokenize(textOf(response.output));
  if (predicted.length === 0) return 0;

  let contextTexts = retrievedTexts(response.metadata.retrieved_documents);
  if (contextTexts.length === 0) {
    const references = example.metadata.reference_contexts;
    contextTexts = Array.isArray(references) ? references.map((item) => String(item)) : [];
  }

  const context = new Set(tokenize(contextTexts.join(' ')));
  if (context.size === 0) return 0;

  const hits = predicted.filter((token) => context.has(token)).length;
  return hits / predicted.length;
}

function retrievedTexts(documents: unknown): string[] {
  if (!Array.isArray(documents)) return [];
  const texts: string[] = [];
  for (const doc of documents) {
    if (typeof doc === 'object' && doc !== null && 'text' in doc && typeof doc.text === 'string') {
      texts.push(doc.text);
    }
  }
  return texts;
}
