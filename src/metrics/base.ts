/**
 * Metric: base class for scores computed over a whole response set.
 *
 * `compute` receives examples and responses aligned by position
 * (`responses[i]` answers `examples[i]`). Metrics are pure: configuration is
 * fixed at construction and nothing is carried between calls.
 */

import { MisalignedBatchError } from '../errors.js';
import type { Example, MetricResult, ModelResponse } from '../types.js';

export abstract class Metric {
  readonly name: string;

  constructor(name: string) {
    this.name = name;
  }

  abstract compute(
    examples: readonly Example[],
    responses: readonly ModelResponse[],
  ): MetricResult;
}

/**
 * Check that `responses[i]` belongs to `examples[i]` for every position.
 */
export function assertAligned(
  examples: readonly Example[],
  responses: readonly ModelResponse[],
): void {
  if (examples.length !== responses.length) {
    throw new MisalignedBatchError(
      `Got ${examples.length} examples but ${responses.length} responses`,
    );
  }
  for (let i = 0; i < examples.length; i++) {
    if (examples[i].uid !== responses[i].uid) {
      throw new MisalignedBatchError(
        `Response at position ${i} has uid '${responses[i].uid}', expected '${examples[i].uid}'`,
      );
    }
  }
}

export function mean(values: readonly number[]): number {
  if (values.length === 0) return 0;
  return values.reduce((sum, v) => sum + v, 0) / values.length;
}
