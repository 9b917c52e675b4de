/**
 * Task: drives a Dataset through a ModelAdapter to produce responses.
 */

import type { Dataset } from '../datasets/base.js';
import { MisalignedBatchError } from '../errors.js';
import type { ModelAdapter } from '../models/base.js';
import type { Example, ModelResponse } from '../types.js';

export abstract class Task {
  readonly dataset: Dataset;
  readonly model: ModelAdapter;

  constructor(dataset: Dataset, model: ModelAdapter) {
    this.dataset = dataset;
    this.model = model;
  }

  /**
   * Produce one response per example, in dataset order.
   */
  abstract run(): Promise<ModelResponse[]>;

  async warmup(): Promise<void> {
    await this.model.warmup(this.dataset.examples());
  }

  protected async predictSequential(examples: readonly Example[]): Promise<ModelResponse[]> {
    const responses: ModelResponse[] = [];
    for (const example of examples) {
      responses.push(await this.model.predict(example));
    }
    return responses;
  }

  /**
   * Split examples into batches of `batchSize` (the last one may be shorter)
   * and flatten the batch responses in submission order.
   */
  protected async predictBatched(
    examples: readonly Example[],
    batchSize: number,
  ): Promise<ModelResponse[]> {
    const responses: ModelResponse[] = [];
    for (let start = 0; start < examples.length; start += batchSize) {
      const batch = examples.slice(start, start + batchSize);
      const batchResponses = await this.model.predictBatch(batch);
      if (batchResponses.length !== batch.length) {
        throw new MisalignedBatchError(
          `Model '${this.model.name}' returned ${batchResponses.length} responses for a batch of ${batch.length}`,
        );
      }
      responses.push(...batchResponses);
    }
    return responses;
  }
}

/**
 * The batch size to use for a model, or null when it should predict one at a time.
 */
export function effectiveBatchSize(model: ModelAdapter): number | null {
  const size = model.batchSize;
  if (typeof size !== 'number' || !Number.isInteger(size) || size <= 1) {
    return null;
  }
  return size;
}
