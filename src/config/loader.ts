/**
 * YAML/JSON loading for evaluation configs, with path resolution.
 */

import { readFileSync } from 'node:fs';
import { basename, dirname, extname, isAbsolute, resolve } from 'node:path';
import YAML from 'yaml';
import { ConfigurationError } from '../errors.js';
import { formatIssues } from './params.js';
import { type EvaluationConfig, evaluationConfigSchema } from './schema.js';

/** Output directory used when a config file does not name one. */
export const DEFAULT_OUTPUT_DIRECTORY = 'runs';

export interface ConfigLoadOptions {
  /** Relative paths in parameters and output are resolved against this directory. */
  baseDir?: string;
  /** Output directory used when the config omits `output.directory`. */
  defaultOutputDirectory?: string | null;
}

/**
 * Load a config file. Relative paths resolve against the file's directory,
 * and the output directory defaults to `runs` beside the file.
 */
export function loadConfigFromFile(path: string, opts?: { fmt?: 'yaml' | 'json' }): EvaluationConfig {
  const fmt = opts?.fmt ?? inferFormat(path);
  let content: string;
  try {
    content = readFileSync(path, 'utf-8');
  } catch (e) {
    throw new ConfigurationError(`Cannot read config file ${path}`, { cause: e });
  }
  return loadConfigFromText(content, {
    fmt,
    baseDir: dirname(resolve(path)),
    defaultOutputDirectory: DEFAULT_OUTPUT_DIRECTORY,
  });
}

export function loadConfigFromText(
  content: string,
  opts?: ConfigLoadOptions & { fmt?: 'yaml' | 'json' },
): EvaluationConfig {
  const fmt = opts?.fmt ?? 'yaml';
  let raw: unknown;
  try {
    raw = fmt === 'yaml' ? YAML.parse(content) : JSON.parse(content);
  } catch (e) {
    const error = e instanceof Error ? e : new Error(String(e));
    throw new ConfigurationError(`Invalid ${fmt.toUpperCase()} config: ${error.message}`, {
      cause: error,
    });
  }
  return loadConfigFromObject(raw, opts);
}

/**
 * Validate an already-parsed config object.
 */
export function loadConfigFromObject(data: unknown, opts?: ConfigLoadOptions): EvaluationConfig {
  const result = evaluationConfigSchema.safeParse(data);
  if (!result.success) {
    throw new ConfigurationError(`Invalid evaluation config: ${formatIssues(result.error)}`, {
      cause: result.error,
    });
  }
  const parsed = result.data;
  const baseDir = opts?.baseDir;

  const directory =
    parsed.output.directory === undefined
      ? (opts?.defaultOutputDirectory ?? null)
      : parsed.output.directory;

  return {
    name: parsed.name,
    task: parsed.task,
    dataset: {
      type: parsed.dataset.type,
      parameters: resolveParameterPaths(parsed.dataset.parameters, baseDir),
    },
    model: {
      type: parsed.model.type,
      parameters: resolveParameterPaths(parsed.model.parameters, baseDir),
    },
    metrics: parsed.metrics.map((metric) => ({
      type: metric.type,
      name: metric.name ?? null,
      parameters: metric.parameters,
    })),
    output: {
      directory: directory === null ? null : resolvePath(directory, baseDir),
      savePredictions: parsed.output.save_predictions,
    },
  };
}

/**
 * Whether a parameter key names a filesystem location.
 */
export function isPathKey(key: string): boolean {
  return (
    key === 'path' ||
    key === 'directory' ||
    key.endsWith('_path') ||
    key.endsWith('_dir') ||
    key.endsWith('Path') ||
    key.endsWith('Dir')
  );
}

export function resolveParameterPaths(
  parameters: Record<string, unknown>,
  baseDir: string | undefined,
): Record<string, unknown> {
  const resolved: Record<string, unknown> = {};
  for (const [key, value] of Object.entries(parameters)) {
    resolved[key] = typeof value === 'string' && isPathKey(key) ? resolvePath(value, baseDir) : value;
  }
  return resolved;
}

function resolvePath(value: string, baseDir: string | undefined): string {
  if (baseDir === undefined || isAbsolute(value)) return value;
  return resolve(baseDir, value);
}

function inferFormat(path: string): 'yaml' | 'json' {
  const ext = extname(path).toLowerCase();
  if (ext === '.yaml' || ext === '.yml') return 'yaml';
  if (ext === '.json') return 'json';
  throw new ConfigurationError(
    `Could not infer format for config file '${basename(path)}'. Use the fmt option to specify the format.`,
  );
}
