import chalk from 'chalk';
import { beforeAll, describe, expect, it } from 'vitest';
import { renderDuration, renderNumber } from '../src/reporting/render-numbers.js';
import { asConfusionMatrix, renderConfusionMatrix, renderResult } from '../src/reporting/renderer.js';
import type { EvaluationResult } from '../src/runner/result.js';

beforeAll(() => {
  chalk.level = 0;
});

describe('renderNumber', () => {
  it('formats integers with thousands separators', () => {
    expect(renderNumber(0)).toBe('0');
    expect(renderNumber(12345)).toBe('12,345');
    expect(renderNumber(-1000000)).toBe('-1,000,000');
  });

  it('keeps three significant figures for floats', () => {
    expect(renderNumber(2 / 3)).toBe('0.667');
    expect(renderNumber(0.5)).toBe('0.500');
    expect(renderNumber(-0.25)).toBe('-0.250');
    expect(renderNumber(0.001234)).toBe('0.00123');
    expect(renderNumber(1.5)).toBe('1.50');
    expect(renderNumber(1234.5678)).toBe('1,234.6');
  });

  it('passes non-finite values through', () => {
    expect(renderNumber(Number.NaN)).toBe('NaN');
    expect(renderNumber(Number.POSITIVE_INFINITY)).toBe('Infinity');
  });
});

describe('renderDuration', () => {
  it('picks a unit by magnitude', () => {
    expect(renderDuration(0)).toBe('0s');
    expect(renderDuration(0.0005)).toBe('500µs');
    expect(renderDuration(0.25)).toBe('250.0ms');
    expect(renderDuration(2.5)).toBe('2.5s');
    expect(renderDuration(3661)).toBe('3,661.0s');
  });
});

describe('asConfusionMatrix', () => {
  it('accepts square count matrices', () => {
    expect(asConfusionMatrix({ labels: ['a', 'b'], matrix: [[1, 0], [2, 3]] })).toEqual({
      labels: ['a', 'b'],
      matrix: [
        [1, 0],
        [2, 3],
      ],
    });
  });

  it('rejects anything else', () => {
    expect(asConfusionMatrix({ correct: 1, total: 2 })).toBeNull();
    expect(asConfusionMatrix({ labels: ['a', 'b'], matrix: [[1, 0]] })).toBeNull();
    expect(asConfusionMatrix({ labels: [1], matrix: [[1]] })).toBeNull();
    expect(asConfusionMatrix({ labels: ['a'], matrix: [['1']] })).toBeNull();
  });
});

describe('renderResult', () => {
  const result: EvaluationResult = {
    name: 'sentiment',
    task: 'text-classification',
    metrics: [
      { name: 'accuracy', value: 2 / 3, details: { correct: 2, total: 3 } },
      { name: 'support', value: 3, details: {} },
      {
        name: 'confusion_matrix',
        value: 1,
        details: {
          labels: ['neg', 'pos'],
          matrix: [
            [1, 0],
            [1, 1],
          ],
        },
      },
    ],
    predictions: [
      { uid: 'a', inputs: {}, expectedOutput: 'neg', predictedOutput: 'neg', metadata: {} },
      { uid: 'b', inputs: {}, expectedOutput: 'pos', predictedOutput: 'neg', metadata: {} },
      { uid: 'c', inputs: {}, expectedOutput: 'pos', predictedOutput: 'pos', metadata: {} },
    ],
    startedAt: new Date('2026-02-03T10:00:00.000Z'),
    completedAt: new Date('2026-02-03T10:00:01.500Z'),
    outputPath: '/results/sentiment.json',
  };

  it('renders a metric table with a summary footer', () => {
    const lines = renderResult(result).split('\n');
    expect(lines[0]).toBe('Evaluation Summary: sentiment (text-classification)');
    expect(lines.some((line) => /│ accuracy\s+│ 0\.667\s+│/.test(line))).toBe(true);
    expect(lines.some((line) => /│ support\s+│ 3\s+│/.test(line))).toBe(true);
    expect(lines[lines.length - 1]).toBe('3 predictions | 1.5s | saved to /results/sentiment.json');
  });

  it('renders confusion matrices as their own table', () => {
    const lines = renderResult(result).split('\n');
    expect(lines).toContain('confusion_matrix (rows: expected, columns: predicted)');
    expect(lines.some((line) => /│ pos\s+│ 1\s+│ 1\s+│/.test(line))).toBe(true);
  });

  it('can leave confusion matrices out', () => {
    const text = renderResult(result, { includeConfusionMatrices: false });
    expect(text).not.toContain('rows: expected');
  });

  it('renders a matrix with labelled rows and columns', () => {
    const lines = renderConfusionMatrix({ labels: ['x', 'y'], matrix: [[4, 0], [1, 2]] }).split('\n');
    expect(lines.some((line) => /│\s+│ x\s+│ y\s+│/.test(line))).toBe(true);
    expect(lines.some((line) => /│ x\s+│ 4\s+│ 0\s+│/.test(line))).toBe(true);
  });
});
