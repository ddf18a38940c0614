import { describe, test, expect } from 'vitest';
import type { EngineArgs } from '@transformer-serve/shared';
import { InvalidEngineArgsError } from '../../lib/errors';
import { VllmProvider, parsePort } from './index';

const provider = new VllmProvider({ command: '/opt/vllm/bin/vllm', port: 8200 });

const engineArgs: EngineArgs = {
  model: '/models/llama',
  servedModelName: 'llama',
  revision: 'main',
  trustRemoteCode: true,
  maxModelLen: 2048,
  extra: { 'gpu-memory-utilization': '0.85' },
};

describe('VllmProvider', () => {
  describe('provider info', () => {
    test('serves the generation engine backend', () => {
      expect(provider.id).toBe('generation-engine');
      expect(provider.name).toBe('vLLM');
      expect(provider.command).toBe('/opt/vllm/bin/vllm');
    });
  });

  describe('buildLaunchCommand', () => {
    test('renders vllm serve with the engine arguments', () => {
      const command = provider.buildLaunchCommand({
        modelName: 'llama',
        model: '/models/llama',
        trustRemoteCode: true,
        engineArgs,
      });

      expect(command).toEqual({
        command: '/opt/vllm/bin/vllm',
        args: [
          'serve',
          '/models/llama',
          '--served-model-name',
          'llama',
          '--port',
          '8200',
          '--revision',
          'main',
          '--max-model-len',
          '2048',
          '--trust-remote-code',
          '--gpu-memory-utilization',
          '0.85',
        ],
        port: 8200,
      });
    });

    test('requires engine arguments', () => {
      expect(() => provider.buildLaunchCommand({ modelName: 'llama', model: '/models/llama', trustRemoteCode: false })).toThrow(
        InvalidEngineArgsError
      );
    });
  });
});

describe('parsePort', () => {
  test('accepts valid ports', () => {
    expect(parsePort('8081')).toBe(8081);
  });

  test('ignores missing or invalid ports', () => {
    expect(parsePort(undefined)).toBeUndefined();
    expect(parsePort('')).toBeUndefined();
    expect(parsePort('http')).toBeUndefined();
    expect(parsePort('70000')).toBeUndefined();
  });
});
