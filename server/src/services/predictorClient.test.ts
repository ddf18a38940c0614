import { describe, test, expect, vi } from 'vitest';
import type { PredictorConfig } from '@transformer-serve/shared';
import { PredictorError } from '../lib/errors';
import { jsonResponse } from '../testing/fakes';
import { PredictorClient } from './predictorClient';

const config: PredictorConfig = {
  host: 'bert-predictor.default:8080',
  protocol: 'v2',
  useSsl: false,
  requestTimeoutSeconds: 5,
};

describe('PredictorClient', () => {
  describe('baseUrl', () => {
    test('uses http by default', () => {
      expect(new PredictorClient(config).baseUrl).toBe('http://bert-predictor.default:8080');
    });

    test('uses https when TLS is on', () => {
      expect(new PredictorClient({ ...config, useSsl: true }).baseUrl).toBe('https://bert-predictor.default:8080');
    });

    test('keeps an explicit scheme', () => {
      expect(new PredictorClient({ ...config, host: 'https://predictor.test/' }).baseUrl).toBe('https://predictor.test');
    });
  });

  test('posts v2 inference requests', async () => {
    const output = { name: 'logits', shape: [1, 2], datatype: 'FP32', data: [0.1, 0.9] };
    const fetchImpl = vi.fn<typeof fetch>(async () => jsonResponse({ model_name: 'bert', outputs: [output] }));
    const client = new PredictorClient(config, fetchImpl);
    const request = { inputs: [{ name: 'input_ids', shape: [1, 2], datatype: 'INT64' as const, data: [101, 102] }] };

    const response = await client.inferV2('bert', request);

    expect(response.outputs).toEqual([output]);
    const [url, init] = fetchImpl.mock.calls[0];
    expect(url).toBe('http://bert-predictor.default:8080/v2/models/bert/infer');
    expect(init?.method).toBe('POST');
    expect(init?.body).toBe(JSON.stringify(request));
    expect(init?.signal).toBeInstanceOf(AbortSignal);
  });

  test('posts v1 predict requests', async () => {
    const fetchImpl = vi.fn<typeof fetch>(async () => jsonResponse({ predictions: [[0.2, 0.8]] }));
    const client = new PredictorClient({ ...config, protocol: 'v1' }, fetchImpl);

    const response = await client.predictV1('bert', { instances: [{ input_ids: [101, 102] }] });

    expect(response.predictions).toEqual([[0.2, 0.8]]);
    expect(fetchImpl.mock.calls[0][0]).toBe('http://bert-predictor.default:8080/v1/models/bert:predict');
  });

  test('client errors are not retried', async () => {
    const fetchImpl = vi.fn<typeof fetch>(async () => new Response('bad shape', { status: 400 }));
    const client = new PredictorClient(config, fetchImpl);

    await expect(client.inferV2('bert', { inputs: [] })).rejects.toMatchObject({
      name: 'PredictorError',
      statusCode: 400,
      message: 'Predictor returned 400: bad shape',
    });
    expect(fetchImpl).toHaveBeenCalledTimes(1);
  });

  test('malformed responses are a bad gateway', async () => {
    const fetchImpl = vi.fn<typeof fetch>(async () => jsonResponse({ outputs: 'nope' }));
    const client = new PredictorClient(config, fetchImpl);

    const error = await client.inferV2('bert', { inputs: [] }).catch((e: unknown) => e);
    expect(error).toBeInstanceOf(PredictorError);
    expect(error).toMatchObject({ statusCode: 502 });
  });
});
