// Core types
export type { Example, MetricResult, ModelResponse, PredictionRecord } from './types.js';
export { createExample, createModelResponse, exampleText } from './types.js';

// Errors
export {
  ConfigurationError,
  DatasetLoadError,
  DuplicateKeyError,
  EvalError,
  InvalidAverageError,
  MalformedExampleError,
  MisalignedBatchError,
  ModelInvocationError,
  NotReadyError,
  RegistryFrozenError,
  UnknownKeyError,
} from './errors.js';

// Registry
export { type ComponentFactory, Registry } from './registry.js';
export {
  type ComponentContext,
  type ComponentRegistries,
  createDefaultRegistries,
  createRegistries,
  type DatasetRegistry,
  type MetricRegistry,
  type ModelRegistry,
  registerBuiltins,
  type TaskRegistry,
} from './components.js';

// Logging
export {
  createLogger,
  isLogLevel,
  LOG_LEVELS,
  type Logger,
  type LogLevel,
  type LogSink,
  silentLogger,
} from './logger.js';

// Components
export * from './datasets/index.js';
export * from './models/index.js';
export * from './metrics/index.js';
export * from './tasks/index.js';

// Config, runner and reporting
export * from './config/index.js';
export * from './runner/index.js';
export * from './reporting/index.js';
