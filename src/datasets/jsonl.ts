/**
 * JSON Lines datasets.
 */

import { readFileSync } from 'node:fs';
import { z } from 'zod';
import { parseParams } from '../config/params.js';
import { DatasetLoadError, MalformedExampleError } from '../errors.js';
import { type Logger, silentLogger } from '../logger.js';
import { createExample, type Example } from '../types.js';
import { Dataset } from './base.js';

export const jsonObjectSchema = z.record(z.string(), z.unknown());

export interface JsonLine {
  /** Zero-based physical line index. */
  index: number;
  value: Record<string, unknown>;
}

/**
 * Read a JSONL file, skipping blank lines. Each line must hold a JSON object.
 */
export function* readJsonLines(path: string): Generator<JsonLine> {
  const content = readFileSync(path, 'utf-8');
  const lines = content.split('\n');

  for (let i = 0; i < lines.length; i++) {
    const line = lines[i].trim();
    if (!line) continue;

    let parsed: unknown;
    try {
      parsed = JSON.parse(line);
    } catch (e) {
      throw new DatasetLoadError(`Invalid JSON in ${path} at line ${i + 1}`, {
        source: path,
        cause: e,
      });
    }

    const result = jsonObjectSchema.safeParse(parsed);
    if (!result.success) {
      throw new DatasetLoadError(`Expected a JSON object in ${path} at line ${i + 1}`, {
        source: path,
      });
    }
    yield { index: i, value: result.data };
  }
}

/**
 * Return the first of `keys` holding a value other than null, undefined or ''.
 */
export function firstValue(record: Record<string, unknown>, keys: readonly string[]): unknown {
  for (const key of keys) {
    const value = record[key];
    if (value !== undefined && value !== null && value !== '') {
      return value;
    }
  }
  return undefined;
}

export function recordUid(record: Record<string, unknown>, index: number): string {
  const id = record.id;
  return id === undefined || id === null ? String(index) : String(id);
}

export function omitKeys(
  record: Record<string, unknown>,
  keys: ReadonlySet<string>,
): Record<string, unknown> {
  return Object.fromEntries(Object.entries(record).filter(([key]) => !keys.has(key)));
}

export const jsonlClassificationOptionsSchema = z.object({
  path: z.string().min(1),
});

export type JsonlClassificationOptions = z.input<typeof jsonlClassificationOptionsSchema>;

const CLASSIFICATION_KEYS: ReadonlySet<string> = new Set(['id', 'text', 'input', 'label']);

/**
 * Text classification examples: `{ id?, text | input, label, ...metadata }`.
 */
export class JsonlClassificationDataset extends Dataset {
  readonly path: string;
  private readonly logger: Logger;

  constructor(options: JsonlClassificationOptions, logger: Logger = silentLogger) {
    super();
    this.path = options.path;
    this.logger = logger;
  }

  static fromParams(params: Record<string, unknown>, logger?: Logger): JsonlClassificationDataset {
    const options = parseParams(jsonlClassificationOptionsSchema, params, 'jsonl-classification');
    return new JsonlClassificationDataset(options, logger);
  }

  get source(): string {
    return this.path;
  }

  protected *load(): Generator<Example> {
    let count = 0;
    for (const { index, value } of readJsonLines(this.path)) {
      const uid = recordUid(value, index);

      const text = firstValue(value, ['text', 'input']);
      if (text === undefined) {
        throw new MalformedExampleError(uid, 'text', `missing 'text' or 'input' in ${this.path}`);
      }
      if (typeof text !== 'string') {
        throw new MalformedExampleError(uid, 'text', `expected a string in ${this.path}`);
      }

      const label = value.label;
      if (label === undefined || label === null) {
        throw new MalformedExampleError(uid, 'label', `missing 'label' in ${this.path}`);
      }

      count++;
      yield createExample({
        uid,
        inputs: { text },
        expectedOutput: label,
        metadata: omitKeys(value, CLASSIFICATION_KEYS),
      });
    }
    this.logger.info(`Loaded ${count} examples from ${this.path}`);
  }
}
