/**
 * ModelAdapter: base class for everything that turns an Example into a ModelResponse.
 *
 * Subclasses must implement `predict(example)`, which can return a response
 * directly or a Promise. Adapters that need preparation (opening a session,
 * building an index) override `prepare()`; `warmup()` runs it at most once.
 */

import type { Example, ModelResponse } from '../types.js';

export abstract class ModelAdapter {
  readonly name: string;
  /** When an integer > 1, batching tasks group examples into batches of this size. */
  readonly batchSize?: number;

  private warmedUp = false;

  constructor(opts?: { name?: string | null; batchSize?: number }) {
    this.name = opts?.name ?? this.constructor.name;
    this.batchSize = opts?.batchSize;
  }

  abstract predict(example: Example): ModelResponse | Promise<ModelResponse>;

  /**
   * Predict a batch of examples. Defaults to sequential `predict` calls;
   * adapters with real batch support override it. Responses keep input order.
   */
  async predictBatch(examples: readonly Example[]): Promise<ModelResponse[]> {
    const responses: ModelResponse[] = [];
    for (const example of examples) {
      responses.push(await this.predict(example));
    }
    return responses;
  }

  async warmup(examples?: readonly Example[]): Promise<void> {
    if (this.warmedUp) return;
    await this.prepare(examples);
    this.warmedUp = true;
  }

  /** Whether `warmup()` has completed successfully. */
  get ready(): boolean {
    return this.warmedUp;
  }

  protected async prepare(_examples?: readonly Example[]): Promise<void> {}
}
