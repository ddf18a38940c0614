import {
  SUPPORTED_TASKS,
  TASK_INFO,
  isEncoderTask,
  isGenerativeTask,
  type MLTask,
  type PredictorConfig,
  type ResolvedBackend,
  type ResolvedConfiguration,
} from '@transformer-serve/shared';
import { IncompatibleTaskBackendError, MissingPredictorConfigError, UnsupportedTaskError } from '../lib/errors';
import { componentLogger } from '../lib/logger';
import { EncoderModel, GenerativeModel, type RuntimeModel } from '../models';
import type { ProviderRegistry } from '../providers';
import type { PredictorClient } from './predictorClient';
import type { GenerationRuntime, LaunchCommand } from './serverProcess';
import type { ModelFileReader } from './storage';
import { buildEngineArgs } from './engineArgs';

const log = componentLogger('model-factory');

export interface ModelFactoryDeps {
  reader: ModelFileReader;
  providers: Pick<ProviderRegistry, 'getProvider'>;
  createRuntime?: (command: LaunchCommand) => GenerationRuntime;
  createPredictorClient?: (config: PredictorConfig) => PredictorClient;
}

/**
 * Build the runtime model for a resolved (task, backend) pair.
 * Nothing is loaded here; the caller runs `load()`.
 */
export function createModel(
  task: MLTask,
  backend: ResolvedBackend,
  config: ResolvedConfiguration,
  deps: ModelFactoryDeps
): RuntimeModel {
  if (!TASK_INFO[task].supported) {
    throw new UnsupportedTaskError(task, SUPPORTED_TASKS);
  }

  if (backend === 'generation-engine') {
    if (!isGenerativeTask(task)) {
      throw new IncompatibleTaskBackendError(task, backend);
    }
    const engineArgs = buildEngineArgs(config);
    log.info({ model: config.modelName, task, backend }, 'Creating generative model on the generation engine');
    return new GenerativeModel(
      {
        name: config.modelName,
        location: config.location,
        task,
        backend,
        revision: config.revision,
        tokenizerRevision: config.tokenizerRevision,
        doLowerCase: config.doLowerCase,
        maxLength: config.maxLength,
        trustRemoteCode: config.trustRemoteCode,
        engineArgs,
      },
      { provider: deps.providers.getProvider(backend), reader: deps.reader, createRuntime: deps.createRuntime }
    );
  }

  if (isGenerativeTask(task)) {
    log.info({ model: config.modelName, task, backend }, 'Creating generative model on the standard backend');
    return new GenerativeModel(
      {
        name: config.modelName,
        location: config.location,
        task,
        backend,
        revision: config.revision,
        tokenizerRevision: config.tokenizerRevision,
        doLowerCase: config.doLowerCase,
        maxLength: config.maxLength,
        trustRemoteCode: config.trustRemoteCode,
      },
      { provider: deps.providers.getProvider(backend), reader: deps.reader, createRuntime: deps.createRuntime }
    );
  }

  if (!isEncoderTask(task)) {
    throw new UnsupportedTaskError(task, SUPPORTED_TASKS);
  }
  if (!config.predictor) {
    throw new MissingPredictorConfigError(task);
  }

  log.info({ model: config.modelName, task, predictor: config.predictor.host }, 'Creating encoder model');
  return new EncoderModel(
    {
      name: config.modelName,
      location: config.location,
      task,
      revision: config.revision,
      tokenizerRevision: config.tokenizerRevision,
      maxLength: config.maxLength,
      doLowerCase: config.doLowerCase,
      addSpecialTokens: config.addSpecialTokens,
      trustRemoteCode: config.trustRemoteCode,
      tensorInputNames: config.tensorInputNames,
      returnTokenTypeIds: config.returnTokenTypeIds,
      predictor: config.predictor,
      labels: config.architecture.labels,
      maxPositionEmbeddings: config.architecture.maxPositionEmbeddings,
    },
    { reader: deps.reader, createPredictorClient: deps.createPredictorClient }
  );
}
