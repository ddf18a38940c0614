import type {
  CompletionRequest,
  CompletionResponse,
  EngineArgs,
  GenerativeTask,
  ResolvedBackend,
  ResolvedLocation,
} from '@transformer-serve/shared';
import { describeLocation } from '@transformer-serve/shared';
import type { Provider } from '../providers/types';
import type { GenerationRuntime, LaunchCommand } from '../services/serverProcess';
import { ServerProcessRuntime } from '../services/serverProcess';
import type { ModelFileReader } from '../services/storage';
import { RuntimeNotReadyError } from '../lib/errors';
import { componentLogger } from '../lib/logger';
import { parseTokenizerConfig } from './tokenizer';
import { BaseModel } from './base';

const log = componentLogger('generative-model');

export interface GenerativeModelParams {
  name: string;
  location: ResolvedLocation;
  task: GenerativeTask;
  backend: ResolvedBackend;
  revision?: string;
  tokenizerRevision?: string;
  doLowerCase: boolean;
  maxLength?: number;
  trustRemoteCode: boolean;
  /** Set when the backend is the generation engine */
  engineArgs?: EngineArgs;
}

export interface GenerativeModelDeps {
  provider: Provider;
  reader: ModelFileReader;
  createRuntime?: (command: LaunchCommand) => GenerationRuntime;
}

/**
 * Text generation served by a child OpenAI-compatible server
 */
export class GenerativeModel extends BaseModel {
  readonly kind = 'generative' as const;
  private runtime: GenerationRuntime | null = null;
  private lowerCasePrompts = false;
  private readonly createRuntime: (command: LaunchCommand) => GenerationRuntime;

  constructor(
    readonly params: GenerativeModelParams,
    private readonly deps: GenerativeModelDeps
  ) {
    super(params.name, params.task, params.backend);
    this.createRuntime = deps.createRuntime ?? ((command) => new ServerProcessRuntime(command));
  }

  async load(): Promise<boolean> {
    const { params, deps } = this;

    // The engine applies its own tokenizer settings
    if (params.backend === 'standard' && params.doLowerCase) {
      const text = await deps.reader.readOptionalText(
        params.location,
        'tokenizer_config.json',
        params.tokenizerRevision ?? params.revision
      );
      this.lowerCasePrompts = parseTokenizerConfig(text).do_lower_case === true;
    }

    const command = deps.provider.buildLaunchCommand({
      modelName: params.name,
      model: describeLocation(params.location),
      revision: params.revision,
      tokenizerRevision: params.tokenizerRevision,
      maxLength: params.maxLength,
      trustRemoteCode: params.trustRemoteCode,
      engineArgs: params.engineArgs,
    });

    const runtime = this.createRuntime(command);
    this.runtime = runtime;
    await runtime.start();

    this.ready = true;
    log.info(
      { model: params.name, task: params.task, backend: params.backend, provider: deps.provider.name },
      'Generative model loaded'
    );
    return this.ready;
  }

  async generate(request: CompletionRequest): Promise<CompletionResponse> {
    this.assertReady();
    const runtime = this.runtime;
    if (!runtime) {
      throw new RuntimeNotReadyError(this.name);
    }

    const prompt = this.lowerCasePrompts
      ? Array.isArray(request.prompt)
        ? request.prompt.map((p) => p.toLowerCase())
        : request.prompt.toLowerCase()
      : request.prompt;

    return runtime.complete({ ...request, prompt, model: this.name });
  }

  async stop(): Promise<void> {
    await super.stop();
    if (this.runtime) {
      await this.runtime.stop();
      this.runtime = null;
    }
  }
}
