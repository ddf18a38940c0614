import { describe, test, expect } from 'vitest';
import { InvalidOptionsError } from '../lib/errors';
import { parseCommandLine, readRuntimeEnvironment, resolveServerOptions } from './config';

describe('parseCommandLine', () => {
  test('reads value flags in both spellings', () => {
    const parsed = parseCommandLine(['--model_id', 'test-org/bert', '--task=fill_mask']);
    expect(parsed.flags).toEqual({ model_id: 'test-org/bert', task: 'fill_mask' });
    expect(parsed.engineOptions).toEqual({});
    expect(parsed.help).toBe(false);
  });

  test('boolean flags take no value', () => {
    const parsed = parseCommandLine(['--trust_remote_code', '--predictor_use_ssl=false', '--model_id', 'm']);
    expect(parsed.flags).toEqual({ trust_remote_code: true, predictor_use_ssl: false, model_id: 'm' });
  });

  test('rejects a malformed boolean', () => {
    expect(() => parseCommandLine(['--trust_remote_code=yes'])).toThrow(
      "trust_remote_code: expected true or false, got 'yes'"
    );
  });

  test('collects unknown flags as engine options', () => {
    const parsed = parseCommandLine([
      '--model_id',
      'm',
      '--gpu-memory-utilization',
      '0.9',
      '--enforce-eager',
      '--dtype=half',
    ]);
    expect(parsed.engineOptions).toEqual({ 'gpu-memory-utilization': '0.9', 'enforce-eager': true, dtype: 'half' });
  });

  test('a value flag without a value is rejected', () => {
    expect(() => parseCommandLine(['--model_id'])).toThrow(InvalidOptionsError);
    expect(() => parseCommandLine(['--model_id', '--task', 'fill_mask'])).toThrow('model_id: expected a value');
  });

  test('positional arguments are rejected', () => {
    expect(() => parseCommandLine(['model'])).toThrow('Unexpected argument: model');
  });

  test('recognizes help', () => {
    expect(parseCommandLine(['-h']).help).toBe(true);
    expect(parseCommandLine(['--help']).help).toBe(true);
  });
});

describe('resolveServerOptions', () => {
  test('applies defaults', () => {
    const options = resolveServerOptions(parseCommandLine(['--model_id', 'test-org/bert']));
    expect(options).toEqual({
      modelName: 'model',
      modelDir: undefined,
      modelId: 'test-org/bert',
      modelRevision: undefined,
      tokenizerRevision: undefined,
      maxLength: undefined,
      doLowerCase: true,
      addSpecialTokens: true,
      trustRemoteCode: false,
      tensorInputNames: undefined,
      task: undefined,
      backend: 'auto',
      returnTokenTypeIds: false,
      predictor: { host: undefined, protocol: 'v1', useSsl: false, requestTimeoutSeconds: 600 },
      httpPort: 8080,
      engineOptions: {},
    });
  });

  test('converts and renames flags', () => {
    const options = resolveServerOptions(
      parseCommandLine([
        '--model_name=bert',
        '--model_dir',
        '/models/bert',
        '--max_length',
        '128',
        '--disable_lower_case',
        '--disable_special_tokens',
        '--tensor_input_names',
        'input_ids, attention_mask',
        '--backend',
        'huggingface',
        '--predictor_host',
        'bert-predictor:8080',
        '--predictor_protocol',
        'v2',
        '--predictor_request_timeout_seconds',
        '30',
        '--http_port',
        '9090',
        '--max-num-seqs',
        '64',
      ])
    );

    expect(options.modelName).toBe('bert');
    expect(options.modelDir).toBe('/models/bert');
    expect(options.maxLength).toBe(128);
    expect(options.doLowerCase).toBe(false);
    expect(options.addSpecialTokens).toBe(false);
    expect(options.tensorInputNames).toEqual(['input_ids', 'attention_mask']);
    expect(options.backend).toBe('standard');
    expect(options.predictor).toEqual({
      host: 'bert-predictor:8080',
      protocol: 'v2',
      useSsl: false,
      requestTimeoutSeconds: 30,
    });
    expect(options.httpPort).toBe(9090);
    expect(options.engineOptions).toEqual({ 'max-num-seqs': '64' });
  });

  test('the vllm alias selects the generation engine', () => {
    const options = resolveServerOptions(parseCommandLine(['--model_id', 'm', '--backend', 'vllm']));
    expect(options.backend).toBe('generation-engine');
  });

  test('reports every invalid flag', () => {
    try {
      resolveServerOptions(parseCommandLine(['--backend', 'tpu', '--max_length', '-1', '--predictor_protocol', 'grpc']));
      expect.unreachable('resolveServerOptions should throw');
    } catch (error) {
      expect(error).toBeInstanceOf(InvalidOptionsError);
      if (error instanceof InvalidOptionsError) {
        expect(error.issues).toHaveLength(3);
        expect(error.issues).toContain(
          "backend: Unknown backend 'tpu'. Can be one of 'auto', 'standard', 'generation-engine'"
        );
        expect(error.issues.some((issue) => issue.startsWith('max_length:'))).toBe(true);
        expect(error.issues.some((issue) => issue.startsWith('predictor_protocol:'))).toBe(true);
      }
    }
  });

  test('a missing model reference is not an option error', () => {
    const options = resolveServerOptions(parseCommandLine([]));
    expect(options.modelDir).toBeUndefined();
    expect(options.modelId).toBeUndefined();
  });
});

describe('readRuntimeEnvironment', () => {
  test('defaults to the public Hub', () => {
    expect(readRuntimeEnvironment({})).toEqual({ hfToken: undefined, hfEndpoint: 'https://huggingface.co' });
  });

  test('reads the token and a custom endpoint', () => {
    expect(readRuntimeEnvironment({ HF_TOKEN: 'test-secret', HF_ENDPOINT: 'https://hub.internal/' })).toEqual({
      hfToken: 'test-secret',
      hfEndpoint: 'https://hub.internal',
    });
  });
});
