import type { MLTask, ResolvedBackend } from '@transformer-serve/shared';

/**
 * Base class for errors raised while resolving the startup configuration.
 * These are terminal: the process logs them and exits before serving.
 */
export class ConfigurationError extends Error {
  constructor(message: string) {
    super(message);
    this.name = 'ConfigurationError';
  }
}

export class MissingModelReferenceError extends ConfigurationError {
  constructor() {
    super('You must provide a model_id or model_dir');
    this.name = 'MissingModelReferenceError';
  }
}

export class InvalidOptionsError extends ConfigurationError {
  constructor(public readonly issues: string[]) {
    super(`Invalid options: ${issues.join(', ')}`);
    this.name = 'InvalidOptionsError';
  }
}

export class UnsupportedStorageUriError extends ConfigurationError {
  constructor(public readonly uri: string) {
    super(`Unsupported storage URI: ${uri}. Only local paths and file:// URIs can be served directly`);
    this.name = 'UnsupportedStorageUriError';
  }
}

export class UnsupportedTaskError extends ConfigurationError {
  constructor(
    public readonly task: string,
    public readonly supportedTasks: readonly MLTask[]
  ) {
    super(`Unsupported task: ${task}. Currently supported tasks are: ${supportedTasks.join(', ')}`);
    this.name = 'UnsupportedTaskError';
  }
}

export class TaskInferenceError extends ConfigurationError {
  constructor(
    public readonly architectures: readonly string[],
    /** Engine-listed architecture without a known head, if any */
    public readonly engineArchitecture?: string
  ) {
    const described = architectures.length > 0 ? architectures.join(', ') : 'no declared architecture';
    const hint = engineArchitecture
      ? ` (${engineArchitecture} is a generation engine architecture; use --task text_generation)`
      : '';
    super(`Task couldn't be inferred from ${described}. Please manually set the task option${hint}`);
    this.name = 'TaskInferenceError';
  }
}

export class BackendUnavailableError extends ConfigurationError {
  constructor(
    public readonly backend: ResolvedBackend,
    reason?: string
  ) {
    super(`Backend is set to '${backend}' but it is not available${reason ? `: ${reason}` : ''}`);
    this.name = 'BackendUnavailableError';
  }
}

export class IncompatibleTaskBackendError extends ConfigurationError {
  constructor(
    public readonly task: MLTask,
    public readonly backend: ResolvedBackend
  ) {
    super(`Task '${task}' cannot be served by the '${backend}' backend, which only serves generative tasks`);
    this.name = 'IncompatibleTaskBackendError';
  }
}

export class InvalidEngineArgsError extends ConfigurationError {
  constructor(public readonly field: string) {
    super(`Cannot build engine arguments: '${field}' is missing`);
    this.name = 'InvalidEngineArgsError';
  }
}

export class MissingPredictorConfigError extends ConfigurationError {
  constructor(public readonly task: MLTask) {
    super(`Task '${task}' delegates inference to a predictor, but predictor_host is not set`);
    this.name = 'MissingPredictorConfigError';
  }
}

/**
 * A model file could not be read from local storage or the Hub
 */
export class ModelFileError extends Error {
  constructor(
    message: string,
    public readonly statusCode?: number
  ) {
    super(message);
    this.name = 'ModelFileError';
  }
}

/**
 * The predictor returned a non-success response
 */
export class PredictorError extends Error {
  constructor(
    public readonly statusCode: number,
    message: string
  ) {
    super(message);
    this.name = 'PredictorError';
  }
}

export class RuntimeNotReadyError extends Error {
  constructor(public readonly modelName: string) {
    super(`Model '${modelName}' is not loaded`);
    this.name = 'RuntimeNotReadyError';
  }
}
