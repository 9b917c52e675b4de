import type { ModelResponse } from '../types.js';
import { effectiveBatchSize, Task } from './base.js';

/**
 * Retrieval-augmented question answering. Uses `predictBatch` when the model
 * declares a batch size above 1, sequential prediction otherwise.
 */
export class RetrievalQuestionAnsweringTask extends Task {
  async run(): Promise<ModelResponse[]> {
    await this.warmup();
    const examples = this.dataset.examples();
    const batchSize = effectiveBatchSize(this.model);
    if (batchSize === null) {
      return this.predictSequential(examples);
    }
    return this.predictBatched(examples, batchSize);
  }
}
