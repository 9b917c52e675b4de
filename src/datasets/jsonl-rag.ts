/**
 * Question/answer dataset for retrieval-augmented generation.
 *
 * Records look like `{ id?, question, answer, context_ids?, ...metadata }`.
 * When a context store is configured, the referenced passages are attached
 * to each example as `metadata.reference_contexts`.
 */

import { z } from 'zod';
import { parseParams } from '../config/params.js';
import { MalformedExampleError } from '../errors.js';
import { type Logger, silentLogger } from '../logger.js';
import { createExample, type Example } from '../types.js';
import { Dataset } from './base.js';
import { loadContextStore } from './contexts.js';
import { firstValue, omitKeys, readJsonLines, recordUid } from './jsonl.js';

export const jsonlRagOptionsSchema = z.object({
  path: z.string().min(1),
  contextsPath: z.string().min(1).optional(),
});

export type JsonlRagOptions = z.input<typeof jsonlRagOptionsSchema>;

const RAG_KEYS: ReadonlySet<string> = new Set([
  'id',
  'question',
  'input',
  'text',
  'answer',
  'expected_answer',
]);

export class JsonlRagDataset extends Dataset {
  readonly path: string;
  readonly contextsPath: string | null;
  private readonly logger: Logger;
  private contextStore: Map<string, string> | null = null;

  constructor(options: JsonlRagOptions, logger: Logger = silentLogger) {
    super();
    this.path = options.path;
    this.contextsPath = options.contextsPath ?? null;
    this.logger = logger;
  }

  static fromParams(params: Record<string, unknown>, logger?: Logger): JsonlRagDataset {
    const options = parseParams(jsonlRagOptionsSchema, params, 'jsonl-rag');
    return new JsonlRagDataset(options, logger);
  }

  get source(): string {
    return this.path;
  }

  /** Passages by id; loaded on first access. */
  contexts(): ReadonlyMap<string, string> {
    if (this.contextStore === null) {
      this.contextStore =
        this.contextsPath === null ? new Map() : loadContextStore(this.contextsPath);
    }
    return this.contextStore;
  }

  protected *load(): Generator<Example> {
    let count = 0;
    for (const { index, value } of readJsonLines(this.path)) {
      const uid = recordUid(value, index);

      const question = firstValue(value, ['question', 'input', 'text']);
      if (question === undefined) {
        throw new MalformedExampleError(uid, 'question', `missing 'question' in ${this.path}`);
      }

      const expected = firstValue(value, ['answer', 'expected_answer']);
      if (expected === undefined) {
        throw new MalformedExampleError(uid, 'answer', `missing 'answer' in ${this.path}`);
      }

      const contextIds = toContextIds(firstValue(value, ['context_ids', 'contexts']));
      const metadata = omitKeys(value, RAG_KEYS);
      if (contextIds.length > 0) {
        metadata.context_ids = contextIds;
        metadata.reference_contexts = this.resolveReferenceContexts(contextIds);
      }

      count++;
      yield createExample({
        uid,
        inputs: { question: String(question), text: String(question) },
        expectedOutput: expected,
        metadata,
      });
    }
    this.logger.info(`Loaded ${count} examples from ${this.path}`);
  }

  private resolveReferenceContexts(ids: readonly string[]): string[] {
    const store = this.contexts();
    const resolved: string[] = [];
    for (const id of ids) {
      const text = store.get(id);
      if (text !== undefined) resolved.push(text);
    }
    return resolved;
  }
}

function toContextIds(value: unknown): string[] {
  if (value === undefined) return [];
  if (Array.isArray(value)) return value.map((item) => String(item));
  return [String(value)];
}

