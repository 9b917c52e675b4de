/**
 * Terminal table rendering with chalk + cli-table3.
 */

import chalk from 'chalk';
import Table from 'cli-table3';
import type { EvaluationResult } from '../runner/result.js';
import { durationSeconds } from '../runner/result.js';
import { renderDuration, renderNumber } from './render-numbers.js';

export interface RendererOptions {
  /** Render confusion matrices found in metric details as their own tables. */
  includeConfusionMatrices?: boolean;
}

export interface ConfusionMatrixDetails {
  labels: string[];
  matrix: number[][];
}

/**
 * Render an EvaluationResult as a metric table plus a one-line footer.
 */
export function renderResult(result: EvaluationResult, opts?: RendererOptions): string {
  const includeConfusionMatrices = opts?.includeConfusionMatrices ?? true;

  const table = new Table({
    head: [chalk.bold('Metric'), chalk.bold('Value')],
    style: { head: [], border: [] },
  });

  for (const metric of result.metrics) {
    table.push([metric.name, renderNumber(metric.value)]);
  }

  const sections = [`Evaluation Summary: ${result.name} (${result.task})`, table.toString()];

  if (includeConfusionMatrices) {
    for (const metric of result.metrics) {
      const details = asConfusionMatrix(metric.details);
      if (details !== null) {
        sections.push(`${chalk.bold(metric.name)} (rows: expected, columns: predicted)`);
        sections.push(renderConfusionMatrix(details));
      }
    }
  }

  const footer = [
    `${result.predictions.length} predictions`,
    renderDuration(durationSeconds(result)),
  ];
  if (result.outputPath !== null) footer.push(`saved to ${result.outputPath}`);
  sections.push(chalk.dim(footer.join(' | ')));

  return sections.join('\n');
}

export function renderConfusionMatrix(details: ConfusionMatrixDetails): string {
  const table = new Table({
    head: ['', ...details.labels],
    style: { head: [], border: [] },
  });
  details.labels.forEach((label, i) => {
    table.push([label, ...details.matrix[i].map((count) => String(count))]);
  });
  return table.toString();
}

/**
 * Narrow metric details to a confusion matrix, or null when they are not one.
 */
export function asConfusionMatrix(details: Record<string, unknown>): ConfusionMatrixDetails | null {
  const { labels, matrix } = details;
  if (!Array.isArray(labels) || !Array.isArray(matrix)) return null;
  if (!labels.every((label): label is string => typeof label === 'string')) return null;
  const rows: number[][] = [];
  for (const row of matrix) {
    if (!Array.isArray(row) || !row.every((cell): cell is number => typeof cell === 'number')) {
      return null;
    }
    rows.push(row);
  }
  if (rows.length !== labels.length) return null;
  return { labels, matrix: rows };
}
