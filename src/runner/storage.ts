import { mkdir, writeFile } from 'node:fs/promises';
import { join } from 'node:path';
import type { EvaluationResult } from './result.js';
import { toResultRecord } from './result.js';

export interface WriteOptions {
  savePredictions: boolean;
}

/**
 * Persists a finished run. Returns the location written to, or null when
 * nothing was written.
 */
export interface ResultWriter {
  write(result: EvaluationResult, opts: WriteOptions): Promise<string | null>;
}

/**
 * `YYYYMMDDTHHMMSS` in UTC.
 */
export function formatTimestamp(date: Date): string {
  const pad = (n: number) => String(n).padStart(2, '0');
  return (
    `${date.getUTCFullYear()}${pad(date.getUTCMonth() + 1)}${pad(date.getUTCDate())}` +
    `T${pad(date.getUTCHours())}${pad(date.getUTCMinutes())}${pad(date.getUTCSeconds())}`
  );
}

export function resultFileName(result: Pick<EvaluationResult, 'name' | 'completedAt'>): string {
  return `${result.name}_${formatTimestamp(result.completedAt)}.json`;
}

/**
 * Writes each run as a pretty-printed JSON file inside `directory`.
 */
export class JsonFileResultWriter implements ResultWriter {
  readonly directory: string;

  constructor(directory: string) {
    this.directory = directory;
  }

  async write(result: EvaluationResult, opts: WriteOptions): Promise<string> {
    await mkdir(this.directory, { recursive: true });
    const path = join(this.directory, resultFileName(result));
    const record = toResultRecord(
      { ...result, outputPath: path },
      { includePredictions: opts.savePredictions },
    );
    await writeFile(path, `${JSON.stringify(record, null, 2)}\n`, 'utf-8');
    return path;
  }
}
