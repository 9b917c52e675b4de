/**
 * Core data structures shared by datasets, models, metrics and the runner.
 */

import { MalformedExampleError } from './errors.js';

/**
 * A single evaluation unit: named inputs plus the expected output.
 */
export interface Example {
  /** Unique within a dataset. */
  readonly uid: string;
  readonly inputs: Readonly<Record<string, unknown>>;
  readonly expectedOutput: unknown;
  /** Auxiliary data, e.g. `reference_contexts` for retrieval datasets. */
  readonly metadata: Readonly<Record<string, unknown>>;
}

/**
 * The output of a model for one Example.
 */
export interface ModelResponse {
  readonly uid: string;
  readonly output: unknown;
  /** Model-specific side information such as `retrieved_documents`. */
  readonly metadata: Readonly<Record<string, unknown>>;
}

/**
 * The outcome of one metric over a whole response set.
 */
export interface MetricResult {
  name: string;
  /** Scalar summary; metrics whose content lives in `details` report 1.0. */
  value: number;
  details: Record<string, unknown>;
}

/**
 * An Example joined with the model's response, for reporting and persistence.
 */
export interface PredictionRecord {
  uid: string;
  inputs: Readonly<Record<string, unknown>>;
  expectedOutput: unknown;
  predictedOutput: unknown;
  metadata: Readonly<Record<string, unknown>>;
}

export function createExample(opts: {
  uid: string;
  inputs: Record<string, unknown>;
  expectedOutput: unknown;
  metadata?: Record<string, unknown>;
}): Example {
  return Object.freeze({
    uid: opts.uid,
    inputs: Object.freeze({ ...opts.inputs }),
    expectedOutput: opts.expectedOutput,
    metadata: Object.freeze({ ...(opts.metadata ?? {}) }),
  });
}

export function createModelResponse(opts: {
  uid: string;
  output: unknown;
  metadata?: Record<string, unknown>;
}): ModelResponse {
  return Object.freeze({
    uid: opts.uid,
    output: opts.output,
    metadata: Object.freeze({ ...(opts.metadata ?? {}) }),
  });
}

/**
 * Return the primary `text` input of an example.
 */
export function exampleText(example: Example): string {
  const value = example.inputs.text;
  if (typeof value !== 'string') {
    throw new MalformedExampleError(example.uid, 'text', 'expected a string input');
  }
  return value;
}
