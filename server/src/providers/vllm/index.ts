import type { Provider, GenerationLaunchRequest, InstallationStatus } from '../types';
import type { LaunchCommand } from '../../services/serverProcess';
import { runCommand } from '../../services/serverProcess';
import { toEngineCommandArgs } from '../../services/engineArgs';
import { InvalidEngineArgsError } from '../../lib/errors';
import logger from '../../lib/logger';

const DEFAULT_ENGINE_PORT = 8081;

export interface VllmProviderOptions {
  command?: string;
  port?: number;
}

/**
 * vLLM Provider
 * The high-throughput generation engine, run as `vllm serve`
 */
export class VllmProvider implements Provider {
  id = 'generation-engine' as const;
  name = 'vLLM';
  description = 'vLLM is a high-throughput generation engine with continuous batching and an OpenAI-compatible server.';
  command: string;
  private readonly port: number;

  constructor(options: VllmProviderOptions = {}) {
    this.command = options.command || process.env.VLLM_PATH || 'vllm';
    this.port = options.port ?? parsePort(process.env.ENGINE_PORT) ?? DEFAULT_ENGINE_PORT;
  }

  buildLaunchCommand(launch: GenerationLaunchRequest): LaunchCommand {
    if (!launch.engineArgs) {
      throw new InvalidEngineArgsError('engine_args');
    }

    return {
      command: this.command,
      args: toEngineCommandArgs(launch.engineArgs, this.port),
      port: this.port,
    };
  }

  async checkInstallation(): Promise<InstallationStatus> {
    const result = await runCommand(this.command, ['--version']);

    if (result.success) {
      return {
        installed: true,
        version: result.stdout.trim(),
      };
    }

    logger.debug({ command: this.command, stderr: result.stderr }, 'vLLM probe failed');
    return {
      installed: false,
      message: result.stderr || `${this.command} not found`,
    };
  }
}

export function parsePort(value: string | undefined): number | undefined {
  if (!value) {
    return undefined;
  }
  const port = parseInt(value, 10);
  return Number.isInteger(port) && port > 0 && port <= 65535 ? port : undefined;
}

export const vllmProvider = new VllmProvider();
