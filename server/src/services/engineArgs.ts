import { describeLocation, type EngineArgs, type EngineFlagValue, type ResolvedConfiguration } from '@transformer-serve/shared';
import { InvalidEngineArgsError } from '../lib/errors';

/**
 * Translate the resolved configuration into generation engine arguments.
 * Engine pass-through flags are copied unchanged.
 */
export function buildEngineArgs(config: ResolvedConfiguration): EngineArgs {
  const model = describeLocation(config.location).trim();
  if (!model) {
    throw new InvalidEngineArgsError('model');
  }
  if (!config.modelName) {
    throw new InvalidEngineArgsError('served_model_name');
  }

  return Object.freeze({
    model,
    servedModelName: config.modelName,
    revision: config.revision,
    tokenizerRevision: config.tokenizerRevision,
    trustRemoteCode: config.trustRemoteCode,
    maxModelLen: config.maxLength,
    extra: Object.freeze({ ...config.engineOptions }),
  });
}

function renderFlag(name: string, value: EngineFlagValue): string[] {
  if (value === true) {
    return [`--${name}`];
  }
  if (value === false) {
    return [];
  }
  return [`--${name}`, String(value)];
}

/**
 * Render engine arguments as `vllm serve` command-line arguments
 */
export function toEngineCommandArgs(args: EngineArgs, port: number): string[] {
  const argv = ['serve', args.model, '--served-model-name', args.servedModelName, '--port', String(port)];

  if (args.revision) {
    argv.push('--revision', args.revision);
  }
  if (args.tokenizerRevision) {
    argv.push('--tokenizer-revision', args.tokenizerRevision);
  }
  if (args.maxModelLen !== undefined) {
    argv.push('--max-model-len', String(args.maxModelLen));
  }
  if (args.trustRemoteCode) {
    argv.push('--trust-remote-code');
  }

  for (const [name, value] of Object.entries(args.extra)) {
    argv.push(...renderFlag(name, value));
  }

  return argv;
}
