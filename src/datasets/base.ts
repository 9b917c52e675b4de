/**
 * Dataset: a lazily loaded, memoized sequence of Examples.
 *
 * Subclasses implement `load()`. The first call to `examples()` runs it,
 * validates uid uniqueness and caches the frozen result; later calls return
 * the same array.
 */

import { DatasetLoadError, EvalError, MalformedExampleError } from '../errors.js';
import type { Example } from '../types.js';

type LoadState = { loaded: false } | { loaded: true; examples: readonly Example[] };

export abstract class Dataset {
  private state: LoadState = { loaded: false };

  /** Human-readable origin used in error messages, e.g. a file path. */
  abstract get source(): string;

  /**
   * Produce the examples. Called at most once per successful load.
   */
  protected abstract load(): Iterable<Example>;

  examples(): readonly Example[] {
    if (this.state.loaded) {
      return this.state.examples;
    }

    let loaded: Example[];
    try {
      loaded = [...this.load()];
    } catch (e) {
      if (e instanceof EvalError) {
        throw e;
      }
      const error = e instanceof Error ? e : new Error(String(e));
      throw new DatasetLoadError(`Failed to load dataset from ${this.source}: ${error.message}`, {
        source: this.source,
        cause: error,
      });
    }

    const seen = new Set<string>();
    for (const example of loaded) {
      if (seen.has(example.uid)) {
        throw new MalformedExampleError(example.uid, 'uid', `duplicate uid in ${this.source}`);
      }
      seen.add(example.uid);
    }

    const examples = Object.freeze(loaded);
    this.state = { loaded: true, examples };
    return examples;
  }

  get size(): number {
    return this.examples().length;
  }

  get loaded(): boolean {
    return this.state.loaded;
  }

  [Symbol.iterator](): Iterator<Example> {
    return this.examples()[Symbol.iterator]();
  }
}
