import { z } from 'zod';
import type {
  InferRequest,
  InferResponse,
  PredictorConfig,
  V1PredictRequest,
  V1PredictResponse,
} from '@transformer-serve/shared';
import { PredictorError } from '../lib/errors';
import { withRetry } from '../lib/retry';
import { componentLogger } from '../lib/logger';

const log = componentLogger('predictor');

const tensorSchema = z.object({
  name: z.string(),
  shape: z.array(z.number().int().nonnegative()),
  datatype: z.enum(['INT64', 'INT32', 'FP32', 'FP16', 'BYTES', 'BOOL']),
  data: z.array(z.union([z.number(), z.string(), z.boolean()])),
});

const inferResponseSchema = z.object({
  model_name: z.string(),
  model_version: z.string().optional(),
  id: z.string().optional(),
  outputs: z.array(tensorSchema),
});

const v1ResponseSchema = z.object({
  predictions: z.array(z.unknown()),
});

/**
 * Client for the predictor an encoder model delegates to.
 * Speaks the KServe v1 and v2 (Open Inference Protocol) REST APIs.
 */
export class PredictorClient {
  private readonly fetchImpl: typeof fetch;

  constructor(
    readonly config: PredictorConfig,
    fetchImpl?: typeof fetch
  ) {
    this.fetchImpl = fetchImpl ?? fetch;
  }

  get baseUrl(): string {
    const { host, useSsl } = this.config;
    if (/^https?:\/\//.test(host)) {
      return host.replace(/\/+$/, '');
    }
    return `${useSsl ? 'https' : 'http'}://${host}`;
  }

  async inferV2(modelName: string, request: InferRequest): Promise<InferResponse> {
    const url = `${this.baseUrl}/v2/models/${encodeURIComponent(modelName)}/infer`;
    const body = await this.post(url, request);
    const parsed = inferResponseSchema.safeParse(body);
    if (!parsed.success) {
      throw new PredictorError(502, 'Predictor returned an invalid v2 inference response');
    }
    return parsed.data;
  }

  async predictV1(modelName: string, request: V1PredictRequest): Promise<V1PredictResponse> {
    const url = `${this.baseUrl}/v1/models/${encodeURIComponent(modelName)}:predict`;
    const body = await this.post(url, request);
    const parsed = v1ResponseSchema.safeParse(body);
    if (!parsed.success) {
      throw new PredictorError(502, 'Predictor returned an invalid v1 prediction response');
    }
    return parsed.data;
  }

  private async post(url: string, payload: unknown): Promise<unknown> {
    const timeoutMs = this.config.requestTimeoutSeconds * 1000;

    return withRetry(
      async () => {
        log.debug({ url }, 'Sending request to predictor');
        const response = await this.fetchImpl(url, {
          method: 'POST',
          headers: { 'Content-Type': 'application/json' },
          body: JSON.stringify(payload),
          signal: AbortSignal.timeout(timeoutMs),
        });

        if (!response.ok) {
          const text = await response.text();
          throw new PredictorError(response.status, `Predictor returned ${response.status}: ${text}`);
        }
        return response.json();
      },
      { label: 'predictor request' }
    );
  }
}
