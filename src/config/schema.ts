/**
 * Zod schemas for evaluation config files.
 *
 * On disk the config uses snake_case keys; component `parameters` are passed
 * to the component factories untouched.
 */

import { z } from 'zod';

export const componentConfigSchema = z
  .object({
    type: z.string().min(1),
    parameters: z.record(z.string(), z.unknown()).optional().default({}),
  })
  .strict();

export const metricConfigSchema = z
  .object({
    type: z.string().min(1),
    name: z.string().min(1).optional().nullable(),
    parameters: z.record(z.string(), z.unknown()).optional().default({}),
  })
  .strict();

export const outputConfigSchema = z
  .object({
    directory: z.string().min(1).optional().nullable(),
    save_predictions: z.boolean().optional().default(true),
  })
  .strict();

export const evaluationConfigSchema = z
  .object({
    $schema: z.string().optional(),
    name: z.string().min(1),
    task: z.string().min(1),
    dataset: componentConfigSchema,
    model: componentConfigSchema,
    metrics: z.array(metricConfigSchema).optional().default([]),
    output: outputConfigSchema.optional().default({}),
  })
  .strict();

export type EvaluationConfigRaw = z.input<typeof evaluationConfigSchema>;

export interface ComponentConfig {
  type: string;
  parameters: Record<string, unknown>;
}

export interface MetricConfig extends ComponentConfig {
  /** Overrides the metric's default result name. */
  name: string | null;
}

export interface OutputConfig {
  /** Where results are written; null disables persistence. */
  directory: string | null;
  savePredictions: boolean;
}

export interface EvaluationConfig {
  name: string;
  task: string;
  dataset: ComponentConfig;
  model: ComponentConfig;
  metrics: MetricConfig[];
  output: OutputConfig;
}
