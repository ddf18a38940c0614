import { describe, test, expect } from 'vitest';
import type { ResolvedConfiguration } from '@transformer-serve/shared';
import { InvalidEngineArgsError } from '../lib/errors';
import { buildEngineArgs, toEngineCommandArgs } from './engineArgs';

function config(overrides: Partial<ResolvedConfiguration> = {}): ResolvedConfiguration {
  return {
    modelName: 'llama',
    location: { type: 'hub', modelId: 'test-org/tiny-llama' },
    task: 'text_generation',
    backend: 'generation-engine',
    doLowerCase: true,
    addSpecialTokens: true,
    trustRemoteCode: false,
    returnTokenTypeIds: false,
    engineOptions: {},
    architecture: { architectures: ['LlamaForCausalLM'] },
    ...overrides,
  };
}

describe('buildEngineArgs', () => {
  test('maps the configuration onto engine arguments', () => {
    const args = buildEngineArgs(
      config({
        revision: 'v1',
        tokenizerRevision: 'v2',
        maxLength: 2048,
        trustRemoteCode: true,
        engineOptions: { 'gpu-memory-utilization': '0.8', 'enforce-eager': true },
      })
    );

    expect(args).toEqual({
      model: 'test-org/tiny-llama',
      servedModelName: 'llama',
      revision: 'v1',
      tokenizerRevision: 'v2',
      trustRemoteCode: true,
      maxModelLen: 2048,
      extra: { 'gpu-memory-utilization': '0.8', 'enforce-eager': true },
    });
    expect(Object.isFrozen(args)).toBe(true);
  });

  test('uses the local path for local models', () => {
    const args = buildEngineArgs(config({ location: { type: 'local', path: '/models/llama' } }));
    expect(args.model).toBe('/models/llama');
  });

  test('an empty location is rejected', () => {
    expect(() => buildEngineArgs(config({ location: { type: 'local', path: '  ' } }))).toThrow(InvalidEngineArgsError);
    expect(() => buildEngineArgs(config({ location: { type: 'hub', modelId: '' } }))).toThrow(
      "Cannot build engine arguments: 'model' is missing"
    );
  });

  test('an empty model name is rejected', () => {
    expect(() => buildEngineArgs(config({ modelName: '' }))).toThrow(
      "Cannot build engine arguments: 'served_model_name' is missing"
    );
  });
});

describe('toEngineCommandArgs', () => {
  test('renders the minimal command', () => {
    const args = buildEngineArgs(config());
    expect(toEngineCommandArgs(args, 8081)).toEqual([
      'serve',
      'test-org/tiny-llama',
      '--served-model-name',
      'llama',
      '--port',
      '8081',
    ]);
  });

  test('renders optional and pass-through flags', () => {
    const args = buildEngineArgs(
      config({
        revision: 'main',
        maxLength: 4096,
        trustRemoteCode: true,
        engineOptions: { 'tensor-parallel-size': 2, 'enforce-eager': true, 'disable-log-stats': false },
      })
    );
    expect(toEngineCommandArgs(args, 9000)).toEqual([
      'serve',
      'test-org/tiny-llama',
      '--served-model-name',
      'llama',
      '--port',
      '9000',
      '--revision',
      'main',
      '--max-model-len',
      '4096',
      '--trust-remote-code',
      '--tensor-parallel-size',
      '2',
      '--enforce-eager',
    ]);
  });
});
