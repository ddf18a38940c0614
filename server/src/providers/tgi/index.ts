import type { Provider, GenerationLaunchRequest, InstallationStatus } from '../types';
import type { LaunchCommand } from '../../services/serverProcess';
import { runCommand } from '../../services/serverProcess';
import { parsePort } from '../vllm';

const DEFAULT_STANDARD_PORT = 8081;

export interface TgiProviderOptions {
  command?: string;
  port?: number;
}

/**
 * Text Generation Inference Provider
 * The standard (non-engine) generative backend, run as `text-generation-launcher`
 */
export class TgiProvider implements Provider {
  id = 'standard' as const;
  name = 'Text Generation Inference';
  description = 'HuggingFace text-generation-inference launcher serving transformers models per request.';
  command: string;
  private readonly port: number;

  constructor(options: TgiProviderOptions = {}) {
    this.command = options.command || process.env.TGI_LAUNCHER_PATH || 'text-generation-launcher';
    this.port = options.port ?? parsePort(process.env.ENGINE_PORT) ?? DEFAULT_STANDARD_PORT;
  }

  buildLaunchCommand(launch: GenerationLaunchRequest): LaunchCommand {
    const args = ['--model-id', launch.model, '--port', String(this.port)];

    if (launch.revision) {
      args.push('--revision', launch.revision);
    }
    if (launch.maxLength !== undefined) {
      args.push('--max-input-tokens', String(launch.maxLength));
    }
    if (launch.trustRemoteCode) {
      args.push('--trust-remote-code');
    }

    return {
      command: this.command,
      args,
      port: this.port,
    };
  }

  async checkInstallation(): Promise<InstallationStatus> {
    const result = await runCommand(this.command, ['--version']);
    return result.success
      ? { installed: true, version: result.stdout.trim() }
      : { installed: false, message: result.stderr || `${this.command} not found` };
  }
}

export const tgiProvider = new TgiProvider();
