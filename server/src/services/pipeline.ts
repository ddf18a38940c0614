import type { PredictorConfig, ResolvedConfiguration, ResolvedLocation } from '@transformer-serve/shared';
import type { ServerOptions } from '../lib/validation';
import { MissingModelReferenceError } from '../lib/errors';
import { componentLogger } from '../lib/logger';
import type { RuntimeModel } from '../models';
import type { ArchitectureInspector } from './architecture';
import type { ModelLocator } from './storage';
import { resolveTask } from './taskResolver';
import { selectBackend } from './backendSelector';
import { createModel, type ModelFactoryDeps } from './modelFactory';

const log = componentLogger('pipeline');

export interface PipelineDeps {
  locator: ModelLocator;
  inspector: ArchitectureInspector;
  /** Probed only when the backend request is not `standard` */
  isEngineAvailable: () => Promise<boolean>;
  factory: ModelFactoryDeps;
}

function predictorConfig(options: ServerOptions): PredictorConfig | undefined {
  const { host, protocol, useSsl, requestTimeoutSeconds } = options.predictor;
  return host ? { host, protocol, useSsl, requestTimeoutSeconds } : undefined;
}

/**
 * Where the model comes from. `model_dir` takes precedence over `model_id`.
 */
export async function locateModel(options: ServerOptions, locator: ModelLocator): Promise<ResolvedLocation> {
  if (options.modelDir) {
    return locator.locate(options.modelDir);
  }
  if (options.modelId) {
    return { type: 'hub', modelId: options.modelId };
  }
  throw new MissingModelReferenceError();
}

/**
 * Resolve options, location and architecture into the configuration the
 * factory consumes. The task and backend are decided here.
 */
export async function buildResolvedConfiguration(
  options: ServerOptions,
  deps: Omit<PipelineDeps, 'factory'>
): Promise<ResolvedConfiguration> {
  if (!options.modelDir && !options.modelId) {
    throw new MissingModelReferenceError();
  }

  const location = await locateModel(options, deps.locator);
  const architecture = await deps.inspector.inspect(location, options.modelRevision);

  const task = resolveTask(options.task, architecture);
  log.info({ task, explicit: options.task !== undefined, architectures: architecture.architectures }, 'Resolved task');

  const engineAvailable = options.backend === 'standard' ? false : await deps.isEngineAvailable();
  const backend = selectBackend(options.backend, architecture, engineAvailable, { task });
  log.info({ requested: options.backend, backend, engineAvailable }, 'Selected backend');

  return Object.freeze({
    modelName: options.modelName,
    location: Object.freeze(location),
    revision: options.modelRevision,
    tokenizerRevision: options.tokenizerRevision,
    task,
    backend,
    maxLength: options.maxLength,
    doLowerCase: options.doLowerCase,
    addSpecialTokens: options.addSpecialTokens,
    trustRemoteCode: options.trustRemoteCode,
    tensorInputNames: options.tensorInputNames ? Object.freeze([...options.tensorInputNames]) : undefined,
    returnTokenTypeIds: options.returnTokenTypeIds,
    predictor: predictorConfig(options),
    engineOptions: Object.freeze({ ...options.engineOptions }),
    architecture,
  });
}

/**
 * Full startup resolution: configuration, then the not-yet-loaded model
 */
export async function resolveModel(options: ServerOptions, deps: PipelineDeps): Promise<RuntimeModel> {
  const config = await buildResolvedConfiguration(options, deps);
  return createModel(config.task, config.backend, config, deps.factory);
}
