export {
  type ConfigLoadOptions,
  DEFAULT_OUTPUT_DIRECTORY,
  isPathKey,
  loadConfigFromFile,
  loadConfigFromObject,
  loadConfigFromText,
  resolveParameterPaths,
} from './loader.js';
export { formatIssues, parseParams } from './params.js';
export {
  type ComponentConfig,
  componentConfigSchema,
  type EvaluationConfig,
  type EvaluationConfigRaw,
  evaluationConfigSchema,
  type MetricConfig,
  metricConfigSchema,
  type OutputConfig,
  outputConfigSchema,
} from './schema.js';
