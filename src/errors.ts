/**
 * Error hierarchy for evaluation runs.
 *
 * Every error raised by the harness extends `EvalError`, so callers at the
 * boundary (CLI, service) can map the whole family to exit codes or statuses.
 */

export class EvalError extends Error {
  constructor(message: string, options?: { cause?: unknown }) {
    super(message, options);
    this.name = 'EvalError';
  }
}

/**
 * Invalid configuration: bad component parameters, unknown or duplicate keys.
 */
export class ConfigurationError extends EvalError {
  constructor(message: string, options?: { cause?: unknown }) {
    super(message, options);
    this.name = 'ConfigurationError';
  }
}

export class DuplicateKeyError extends ConfigurationError {
  readonly registry: string;
  readonly key: string;

  constructor(registry: string, key: string) {
    super(`Registry '${registry}' already contains an entry for '${key}'`);
    this.name = 'DuplicateKeyError';
    this.registry = registry;
    this.key = key;
  }
}

export class UnknownKeyError extends ConfigurationError {
  readonly registry: string;
  readonly key: string;
  /** Registered keys at the time of the lookup, sorted. */
  readonly knownKeys: string[];

  constructor(registry: string, key: string, knownKeys: string[]) {
    const available = knownKeys.length > 0 ? knownKeys.join(', ') : '<empty>';
    super(`Unknown entry '${key}' for registry '${registry}'. Available: ${available}`);
    this.name = 'UnknownKeyError';
    this.registry = registry;
    this.key = key;
    this.knownKeys = knownKeys;
  }
}

export class RegistryFrozenError extends ConfigurationError {
  readonly registry: string;
  readonly key: string;

  constructor(registry: string, key: string) {
    super(`Cannot register '${key}': registry '${registry}' is frozen`);
    this.name = 'RegistryFrozenError';
    this.registry = registry;
    this.key = key;
  }
}

export class InvalidAverageError extends ConfigurationError {
  readonly average: string;

  constructor(average: string, supported: readonly string[]) {
    super(`Unsupported average '${average}'. Expected one of: ${supported.join(', ')}`);
    this.name = 'InvalidAverageError';
    this.average = average;
  }
}

/**
 * A dataset (or one of its side files) could not be read or parsed.
 */
export class DatasetLoadError extends EvalError {
  readonly source: string | null;

  constructor(message: string, options?: { source?: string | null; cause?: unknown }) {
    super(message, { cause: options?.cause });
    this.name = 'DatasetLoadError';
    this.source = options?.source ?? null;
  }
}

/**
 * A dataset record is missing a required field or carries an invalid value.
 */
export class MalformedExampleError extends EvalError {
  readonly uid: string;
  readonly field: string;

  constructor(uid: string, field: string, reason: string) {
    super(`Example '${uid}' has an invalid '${field}' field: ${reason}`);
    this.name = 'MalformedExampleError';
    this.uid = uid;
    this.field = field;
  }
}

export class NotReadyError extends EvalError {
  readonly model: string;

  constructor(model: string) {
    super(`Model '${model}' must be warmed up before predicting`);
    this.name = 'NotReadyError';
    this.model = model;
  }
}

/**
 * A model call failed: transport error, remote error payload or timeout.
 */
export class ModelInvocationError extends EvalError {
  readonly uid: string | null;

  constructor(message: string, options?: { uid?: string | null; cause?: unknown }) {
    super(message, { cause: options?.cause });
    this.name = 'ModelInvocationError';
    this.uid = options?.uid ?? null;
  }
}

/**
 * Examples and responses do not line up position by position.
 */
export class MisalignedBatchError extends EvalError {
  constructor(message: string) {
    super(message);
    this.name = 'MisalignedBatchError';
  }
}
