import type { ModelResponse } from '../types.js';
import { Task } from './base.js';

/**
 * Predicts every example one at a time, in dataset order.
 */
export class TextClassificationTask extends Task {
  async run(): Promise<ModelResponse[]> {
    await this.warmup();
    return this.predictSequential(this.dataset.examples());
  }
}
