import { spawn, type ChildProcess } from 'child_process';
import { z } from 'zod';
import type { CompletionRequest, CompletionResponse } from '@transformer-serve/shared';
import { PredictorError } from '../lib/errors';
import { withRetry } from '../lib/retry';
import { componentLogger } from '../lib/logger';

const log = componentLogger('server-process');

/**
 * Command that starts an OpenAI-compatible generation server
 */
export interface LaunchCommand {
  command: string;
  args: string[];
  port: number;
  env?: Record<string, string>;
}

/**
 * A running generation backend
 */
export interface GenerationRuntime {
  start(): Promise<void>;
  complete(request: CompletionRequest): Promise<CompletionResponse>;
  stop(): Promise<void>;
}

/**
 * Result of a short-lived command execution
 */
export interface CommandResult {
  success: boolean;
  stdout: string;
  stderr: string;
  exitCode: number | null;
}

/**
 * Run a command to completion, e.g. `vllm --version`
 */
export function runCommand(command: string, args: string[], timeoutMs: number = 30000): Promise<CommandResult> {
  return new Promise((resolve) => {
    let stdout = '';
    let stderr = '';
    let timedOut = false;

    const proc = spawn(command, args, {
      env: { ...process.env },
      shell: false,
    });

    const timeout = setTimeout(() => {
      timedOut = true;
      proc.kill('SIGTERM');
    }, timeoutMs);

    proc.stdout.on('data', (data: Buffer) => {
      stdout += data.toString();
    });

    proc.stderr.on('data', (data: Buffer) => {
      stderr += data.toString();
    });

    proc.on('close', (code) => {
      clearTimeout(timeout);
      resolve({
        success: !timedOut && code === 0,
        stdout,
        stderr: timedOut ? `${stderr}\nCommand timed out` : stderr,
        exitCode: timedOut ? null : code,
      });
    });

    proc.on('error', (err) => {
      clearTimeout(timeout);
      resolve({
        success: false,
        stdout,
        stderr: `Failed to execute ${command}: ${err.message}`,
        exitCode: null,
      });
    });
  });
}

const completionResponseSchema = z.object({
  id: z.string(),
  object: z.literal('text_completion'),
  created: z.number(),
  model: z.string(),
  choices: z.array(
    z.object({
      index: z.number().int(),
      text: z.string(),
      finish_reason: z.string().nullable(),
    })
  ),
  usage: z
    .object({
      prompt_tokens: z.number(),
      completion_tokens: z.number(),
      total_tokens: z.number(),
    })
    .optional(),
});

export interface ServerProcessOptions {
  /** Time allowed for the server to report healthy (default: 10 minutes) */
  startupTimeoutMs?: number;
  /** Wait between health checks, also the limit on each check (default: 2s) */
  healthPollIntervalMs?: number;
  fetchImpl?: typeof fetch;
}

class ServerExitedError extends Error {
  constructor(command: string, code: number | null) {
    super(`${command} exited with code ${code} before becoming healthy`);
    this.name = 'ServerExitedError';
  }
}

/**
 * Generation runtime backed by a child server process that speaks the
 * OpenAI completions API on localhost
 */
export class ServerProcessRuntime implements GenerationRuntime {
  private proc: ChildProcess | null = null;
  private exitCode: number | null | undefined;
  private readonly fetchImpl: typeof fetch;
  private readonly startupTimeoutMs: number;
  private readonly healthPollIntervalMs: number;

  constructor(
    private readonly launch: LaunchCommand,
    options: ServerProcessOptions = {}
  ) {
    this.fetchImpl = options.fetchImpl ?? fetch;
    this.startupTimeoutMs = options.startupTimeoutMs ?? 600000;
    this.healthPollIntervalMs = options.healthPollIntervalMs ?? 2000;
  }

  get baseUrl(): string {
    return `http://127.0.0.1:${this.launch.port}`;
  }

  async start(): Promise<void> {
    const { command, args } = this.launch;
    log.info({ command, args }, `Starting ${command}`);

    const proc = spawn(command, args, {
      env: { ...process.env, ...this.launch.env },
      shell: false,
      stdio: ['ignore', 'pipe', 'pipe'],
    });
    this.proc = proc;
    this.exitCode = undefined;

    proc.stdout?.on('data', (data: Buffer) => {
      log.debug({ command }, data.toString().trimEnd());
    });
    proc.stderr?.on('data', (data: Buffer) => {
      log.info({ command }, data.toString().trimEnd());
    });
    proc.on('exit', (code) => {
      this.exitCode = code;
      log.warn({ command, exitCode: code }, `${command} exited`);
    });
    proc.on('error', (err) => {
      this.exitCode = null;
      log.error({ command, error: err.message }, `Failed to execute ${command}`);
    });

    await this.waitUntilHealthy();
    log.info({ command, baseUrl: this.baseUrl }, `${command} is healthy`);
  }

  async complete(request: CompletionRequest): Promise<CompletionResponse> {
    const response = await this.fetchImpl(`${this.baseUrl}/v1/completions`, {
      method: 'POST',
      headers: { 'Content-Type': 'application/json' },
      body: JSON.stringify(request),
    });

    if (!response.ok) {
      const body = await response.text();
      throw new PredictorError(response.status, `Generation server returned ${response.status}: ${body}`);
    }

    const parsed = completionResponseSchema.safeParse(await response.json());
    if (!parsed.success) {
      throw new PredictorError(502, 'Generation server returned an invalid completion response');
    }
    return parsed.data;
  }

  async stop(): Promise<void> {
    const proc = this.proc;
    if (!proc || this.exitCode !== undefined) {
      return;
    }

    await new Promise<void>((resolve) => {
      proc.once('exit', () => resolve());
      proc.kill('SIGTERM');
    });
    this.proc = null;
  }

  /**
   * One health check; a server that accepts the connection but never
   * answers fails it after the poll interval
   */
  async checkHealth(): Promise<void> {
    const response = await this.fetchImpl(`${this.baseUrl}/health`, {
      signal: AbortSignal.timeout(this.healthPollIntervalMs),
    });
    if (!response.ok) {
      throw new Error(`Health check returned ${response.status}`);
    }
  }

  private async waitUntilHealthy(): Promise<void> {
    const pollIntervalMs = this.healthPollIntervalMs;
    const deadline = Date.now() + this.startupTimeoutMs;
    await withRetry(
      async () => {
        if (this.exitCode !== undefined) {
          throw new ServerExitedError(this.launch.command, this.exitCode);
        }
        await this.checkHealth();
      },
      {
        attempts: Math.ceil(this.startupTimeoutMs / pollIntervalMs) + 1,
        delayMs: pollIntervalMs,
        maxDelayMs: pollIntervalMs,
        multiplier: 1,
        shouldRetry: (error) => !(error instanceof ServerExitedError) && Date.now() < deadline,
        label: `${this.launch.command} health check`,
      }
    );
  }
}
