import { describe, expect, it } from 'vitest';
import {
  ConfigurationError,
  InvalidAverageError,
  MisalignedBatchError,
} from '../src/errors.js';
import {
  AccuracyMetric,
  ConfusionMatrixMetric,
  F1Metric,
  LabelDistributionMetric,
  labelOf,
  PrecisionMetric,
  RecallMetric,
} from '../src/metrics/classification.js';
import { createExample, createModelResponse, type Example, type ModelResponse } from '../src/types.js';

function pairs(rows: Array<[expected: unknown, predicted: unknown]>): {
  examples: Example[];
  responses: ModelResponse[];
} {
  const examples = rows.map(([expected], i) =>
    createExample({ uid: `ex-${i}`, inputs: { text: `example ${i}` }, expectedOutput: expected }),
  );
  const responses = rows.map(([, predicted], i) =>
    createModelResponse({ uid: `ex-${i}`, output: predicted }),
  );
  return { examples, responses };
}

// expected: pos pos neg neg neu pos
// predicted: pos neg neg neu neu pos
const mixed = pairs([
  ['positive', 'positive'],
  ['positive', 'negative'],
  ['negative', 'negative'],
  ['negative', 'neutral'],
  ['neutral', 'neutral'],
  ['positive', 'positive'],
]);

describe('labelOf', () => {
  it('keeps strings as they are', () => {
    expect(labelOf('spam')).toBe('spam');
  });

  it('stringifies scalars', () => {
    expect(labelOf(1)).toBe('1');
    expect(labelOf(true)).toBe('true');
    expect(labelOf(null)).toBe('null');
    expect(labelOf(undefined)).toBe('null');
  });

  it('serializes objects with sorted keys', () => {
    expect(labelOf({ b: 1, a: [{ d: 2, c: 3 }] })).toBe('{"a":[{"c":3,"d":2}],"b":1}');
  });
});

describe('AccuracyMetric', () => {
  it('counts exact label matches', () => {
    const result = new AccuracyMetric().compute(mixed.examples, mixed.responses);
    expect(result.name).toBe('accuracy');
    expect(result.value).toBeCloseTo(4 / 6);
    expect(result.details).toEqual({ correct: 4, total: 6 });
  });

  it('treats a number and its string form as the same label', () => {
    const { examples, responses } = pairs([
      [1, '1'],
      [0, '1'],
    ]);
    expect(new AccuracyMetric().compute(examples, responses).value).toBe(0.5);
  });

  it('is 0 on an empty response set', () => {
    expect(new AccuracyMetric().compute([], []).value).toBe(0);
  });

  it('honours a configured name', () => {
    const metric = AccuracyMetric.fromParams({ name: 'exact_match' });
    expect(metric.compute(mixed.examples, mixed.responses).name).toBe('exact_match');
  });

  it('rejects misaligned responses', () => {
    const responses = [...mixed.responses].reverse();
    expect(() => new AccuracyMetric().compute(mixed.examples, responses)).toThrow(
      "Response at position 0 has uid 'ex-5', expected 'ex-0'",
    );
    expect(() => new AccuracyMetric().compute(mixed.examples, mixed.responses.slice(1))).toThrow(
      MisalignedBatchError,
    );
  });
});

describe('label score metrics', () => {
  it('computes macro averages', () => {
    expect(new PrecisionMetric().compute(mixed.examples, mixed.responses).value).toBeCloseTo(
      2 / 3,
    );
    expect(new RecallMetric().compute(mixed.examples, mixed.responses).value).toBeCloseTo(
      (0.5 + 1 + 2 / 3) / 3,
    );
    expect(new F1Metric().compute(mixed.examples, mixed.responses).value).toBeCloseTo(
      (0.5 + 2 / 3 + 0.8) / 3,
    );
  });

  it('computes support-weighted averages', () => {
    const precision = new PrecisionMetric({ average: 'weighted' });
    const recall = new RecallMetric({ average: 'weighted' });
    expect(precision.compute(mixed.examples, mixed.responses).value).toBeCloseTo(0.75);
    expect(recall.compute(mixed.examples, mixed.responses).value).toBeCloseTo(4 / 6);
  });

  it('computes micro averages from pooled counts', () => {
    for (const metric of [
      new PrecisionMetric({ average: 'micro' }),
      new RecallMetric({ average: 'micro' }),
      new F1Metric({ average: 'micro' }),
    ]) {
      expect(metric.compute(mixed.examples, mixed.responses).value).toBeCloseTo(4 / 6);
    }
  });

  it('names results after the score and the average', () => {
    expect(new PrecisionMetric().name).toBe('precision_macro');
    expect(new RecallMetric({ average: 'weighted' }).name).toBe('recall_weighted');
    expect(new F1Metric({ average: 'micro' }).name).toBe('f1_micro');
    expect(new F1Metric({ name: 'f1' }).name).toBe('f1');
  });

  it('reports per-label scores', () => {
    const result = new F1Metric().compute(mixed.examples, mixed.responses);
    expect(result.details.average).toBe('macro');
    expect(result.details.support).toBe(6);
    expect(result.details.per_label).toEqual({
      negative: { precision: 0.5, recall: 0.5, f1: 0.5, support: 2 },
      neutral: { precision: 0.5, recall: 1, f1: expect.closeTo(2 / 3), support: 1 },
      positive: { precision: 1, recall: expect.closeTo(2 / 3), f1: expect.closeTo(0.8), support: 3 },
    });
  });

  it('scores labels that collide with inherited property names', () => {
    const { examples, responses } = pairs([
      ['__proto__', '__proto__'],
      ['a', 'b'],
      ['b', 'a'],
    ]);
    const result = new F1Metric().compute(examples, responses);
    expect(result.value).toBeCloseTo(1 / 3);
    expect(new F1Metric({ average: 'weighted' }).compute(examples, responses).value).toBeCloseTo(1 / 3);
    expect(JSON.stringify(result.details.per_label)).toBe(
      '{"__proto__":{"precision":1,"recall":1,"f1":1,"support":1},' +
        '"a":{"precision":0,"recall":0,"f1":0,"support":1},' +
        '"b":{"precision":0,"recall":0,"f1":0,"support":1}}',
    );
  });

  it('gives macro equal to micro when only one label occurs', () => {
    const { examples, responses } = pairs([
      ['spam', 'spam'],
      ['spam', 'spam'],
      ['spam', 'spam'],
    ]);
    for (const ScoreMetric of [PrecisionMetric, RecallMetric, F1Metric]) {
      const macro = new ScoreMetric({ average: 'macro' }).compute(examples, responses).value;
      const micro = new ScoreMetric({ average: 'micro' }).compute(examples, responses).value;
      expect(macro).toBe(micro);
    }
  });

  it('rejects unsupported averages', () => {
    expect(() => new PrecisionMetric({ average: 'samples' })).toThrow(InvalidAverageError);
    expect(() => F1Metric.fromParams({ average: 'binary' })).toThrow(
      "Unsupported average 'binary'. Expected one of: macro, weighted, micro",
    );
  });

  it('rejects parameters of the wrong type', () => {
    expect(() => RecallMetric.fromParams({ average: 3 })).toThrow(ConfigurationError);
    expect(() => RecallMetric.fromParams({ average: 3 })).toThrow(
      /^Invalid parameters for 'recall': average: /,
    );
  });
});

describe('ConfusionMatrixMetric', () => {
  it('builds rows by expected label and columns by predicted label', () => {
    const result = new ConfusionMatrixMetric().compute(mixed.examples, mixed.responses);
    expect(result.name).toBe('confusion_matrix');
    expect(result.value).toBe(1.0);
    expect(result.details).toEqual({
      labels: ['negative', 'neutral', 'positive'],
      matrix: [
        [1, 1, 0],
        [0, 1, 0],
        [1, 0, 2],
      ],
    });
  });

  it('has a diagonal equal to the number of correct predictions', () => {
    const matrixResult = new ConfusionMatrixMetric().compute(mixed.examples, mixed.responses);
    const accuracy = new AccuracyMetric().compute(mixed.examples, mixed.responses);
    const matrix = matrixResult.details.matrix;
    if (!Array.isArray(matrix)) throw new Error('expected a matrix');
    const diagonal = matrix.reduce((sum: number, row: number[], i: number) => sum + row[i], 0);
    expect(diagonal).toBe(accuracy.details.correct);
  });

  it('includes labels that only appear in predictions', () => {
    const { examples, responses } = pairs([['a', 'b']]);
    const result = new ConfusionMatrixMetric().compute(examples, responses);
    expect(result.details).toEqual({
      labels: ['a', 'b'],
      matrix: [
        [0, 1],
        [0, 0],
      ],
    });
  });
});

describe('LabelDistributionMetric', () => {
  it('counts expected and predicted labels', () => {
    const result = new LabelDistributionMetric().compute(mixed.examples, mixed.responses);
    expect(result.name).toBe('label_distribution');
    expect(result.value).toBe(1.0);
    expect(result.details).toEqual({
      labels: ['negative', 'neutral', 'positive'],
      expected: { negative: 2, neutral: 1, positive: 3 },
      predicted: { negative: 2, neutral: 2, positive: 2 },
    });
  });

  it('lists labels in the same order as the confusion matrix', () => {
    const { examples, responses } = pairs([
      [10, 9],
      [9, 9],
      [2, 10],
    ]);
    const distribution = new LabelDistributionMetric().compute(examples, responses);
    const confusion = new ConfusionMatrixMetric().compute(examples, responses);
    expect(distribution.details.labels).toEqual(['10', '2', '9']);
    expect(distribution.details.labels).toEqual(confusion.details.labels);
    expect(distribution.details.expected).toEqual({ '10': 1, '2': 1, '9': 1 });
    expect(distribution.details.predicted).toEqual({ '10': 1, '9': 2 });
  });
});
