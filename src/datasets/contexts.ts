/**
 * Context stores: id → passage text, referenced by retrieval datasets.
 *
 * Accepted formats:
 * - `.jsonl`: one `{ id?, text | content }` object per line
 * - `.json` list of `{ id?, text | content }` objects
 * - `.json` mapping of id → text
 */

import { existsSync, readFileSync } from 'node:fs';
import { extname } from 'node:path';
import { z } from 'zod';
import { DatasetLoadError } from '../errors.js';
import { firstValue, jsonObjectSchema, readJsonLines } from './jsonl.js';

const contextFileSchema = z.union([
  z.array(z.unknown()),
  z.record(z.string(), z.unknown()),
]);

export function loadContextStore(path: string): Map<string, string> {
  if (!existsSync(path)) {
    throw new DatasetLoadError(`Context file not found at ${path}`, { source: path });
  }

  const store = new Map<string, string>();

  if (extname(path).toLowerCase() === '.jsonl') {
    for (const { index, value } of readJsonLines(path)) {
      const [id, text] = normalizeEntry(value, index, path);
      store.set(id, text);
    }
    return store;
  }

  let raw: unknown;
  try {
    raw = JSON.parse(readFileSync(path, 'utf-8'));
  } catch (e) {
    throw new DatasetLoadError(`Invalid JSON in context file ${path}`, { source: path, cause: e });
  }

  const parsed = contextFileSchema.safeParse(raw);
  if (!parsed.success) {
    throw new DatasetLoadError(
      `Unsupported context format in ${path}. Use JSONL, a list of objects, or a mapping`,
      { source: path },
    );
  }

  if (Array.isArray(parsed.data)) {
    parsed.data.forEach((entry, index) => {
      const obj = jsonObjectSchema.safeParse(entry);
      if (!obj.success) {
        throw new DatasetLoadError(
          `Context entry ${index} in ${path} must be an object with 'id' and 'text'`,
          { source: path },
        );
      }
      const [id, text] = normalizeEntry(obj.data, index, path);
      store.set(id, text);
    });
    return store;
  }

  for (const [key, value] of Object.entries(parsed.data)) {
    if (typeof value !== 'string') {
      throw new DatasetLoadError(`Context '${key}' in ${path} must map to a string`, {
        source: path,
      });
    }
    store.set(key, value);
  }
  return store;
}

function normalizeEntry(
  entry: Record<string, unknown>,
  fallbackId: number,
  path: string,
): [string, string] {
  const id = entry.id === undefined || entry.id === null ? String(fallbackId) : String(entry.id);
  const text = firstValue(entry, ['text', 'content']);
  if (text === undefined) {
    throw new DatasetLoadError(`Context entry '${id}' in ${path} is missing a 'text' field`, {
      source: path,
    });
  }
  return [id, String(text)];
}
