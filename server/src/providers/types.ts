import type { EngineArgs, ResolvedBackend } from '@transformer-serve/shared';
import type { LaunchCommand } from '../services/serverProcess';

/**
 * Installation status for a provider's executable
 */
export interface InstallationStatus {
  installed: boolean;
  version?: string;
  message?: string;
}

/**
 * Everything a provider needs to start a generation server for one model
 */
export interface GenerationLaunchRequest {
  modelName: string;
  model: string;                 // Local path or Hub ID
  revision?: string;
  tokenizerRevision?: string;
  maxLength?: number;
  trustRemoteCode: boolean;
  engineArgs?: EngineArgs;       // Set on the generation-engine path only
}

/**
 * Provider interface - every generation backend implements this
 */
export interface Provider {
  /** Backend this provider serves */
  id: ResolvedBackend;

  /** Display name (e.g., 'vLLM') */
  name: string;

  /** Description of the provider */
  description: string;

  /** Executable the provider launches */
  command: string;

  /**
   * Build the command that starts the generation server
   */
  buildLaunchCommand(launch: GenerationLaunchRequest): LaunchCommand;

  /**
   * Check if the provider's executable can be run on this machine
   */
  checkInstallation(): Promise<InstallationStatus>;
}
