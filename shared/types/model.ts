import type { MLTask } from './task';
import type { ResolvedBackend } from './backend';

/**
 * Where the model artifacts live once the locator has run
 */
export type ResolvedLocation =
  | { type: 'local'; path: string }     // Directory on the local filesystem
  | { type: 'hub'; modelId: string };   // HuggingFace Hub repository ID

export interface ArchitectureMetadata {
  architectures: readonly string[];     // e.g. ["LlamaForCausalLM"]
  revision?: string;                    // Revision the config was read at
  modelType?: string;                   // config.json `model_type`
  labels?: Readonly<Record<number, string>>; // config.json `id2label`
  maxPositionEmbeddings?: number;
}

export type PredictorProtocol = 'v1' | 'v2';

export interface PredictorConfig {
  host: string;                  // host[:port] of the predictor service
  protocol: PredictorProtocol;
  useSsl: boolean;
  requestTimeoutSeconds: number;
}

export type EngineFlagValue = string | number | boolean;

export interface ResolvedConfiguration {
  modelName: string;
  location: ResolvedLocation;
  revision?: string;
  tokenizerRevision?: string;
  task: MLTask;
  backend: ResolvedBackend;
  maxLength?: number;
  doLowerCase: boolean;
  addSpecialTokens: boolean;
  trustRemoteCode: boolean;
  tensorInputNames?: readonly string[];
  returnTokenTypeIds: boolean;
  predictor?: PredictorConfig;
  engineOptions: Readonly<Record<string, EngineFlagValue>>;
  architecture: ArchitectureMetadata;
}

/**
 * Construction parameters for the generation engine
 */
export interface EngineArgs {
  model: string;                 // Local path or Hub ID
  servedModelName: string;
  revision?: string;
  tokenizerRevision?: string;
  trustRemoteCode: boolean;
  maxModelLen?: number;
  extra: Readonly<Record<string, EngineFlagValue>>; // Passed through unchanged
}

export function describeLocation(location: ResolvedLocation): string {
  return location.type === 'local' ? location.path : location.modelId;
}
