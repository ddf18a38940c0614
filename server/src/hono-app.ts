import { Hono, type Context, type Env } from 'hono';
import { HTTPException } from 'hono/http-exception';
import { zValidator } from '@hono/zod-validator';
import { z } from 'zod';

import type { EncoderPrediction, InferResponse, InferTensor } from '@transformer-serve/shared';
import type { EncoderModel, GenerativeModel, RuntimeModel } from './models';
import { PredictorError, RuntimeNotReadyError } from './lib/errors';
import { formatIssues } from './lib/validation';
import logger from './lib/logger';

// ============================================================================
// Zod Schemas
// ============================================================================

const v1PredictSchema = z.object({
  instances: z.array(z.string()).min(1),
});

const v2InferSchema = z.object({
  id: z.string().optional(),
  inputs: z
    .array(
      z.object({
        name: z.string().min(1),
        shape: z.array(z.number().int().nonnegative()),
        datatype: z.literal('BYTES'),
        data: z.array(z.string()),
      })
    )
    .length(1),
});

const modelParamsSchema = z.object({
  name: z.string().min(1),
});

// KServe v1 addresses the verb as a suffix: /v1/models/<name>:predict
const predictParamsSchema = z.object({
  target: z.string().min(1),
});

const completionSchema = z.object({
  model: z.string().optional(),
  prompt: z.union([z.string(), z.array(z.string()).min(1)]),
  max_tokens: z.number().int().positive().optional(),
  temperature: z.number().min(0).optional(),
  top_p: z.number().gt(0).max(1).optional(),
  stop: z.union([z.string(), z.array(z.string())]).optional(),
  seed: z.number().int().optional(),
});

// Validation failures use the same error envelope as every other error
function validationHook<E extends Env, P extends string>(
  result: { success: true } | { success: false; error: z.ZodError },
  c: Context<E, P>
): Response | undefined {
  if (!result.success) {
    return c.json(
      { error: { message: `Invalid request: ${formatIssues(result.error).join('; ')}`, statusCode: 400 } },
      400
    );
  }
}

// ============================================================================
// Output encoding
// ============================================================================

/**
 * Encode per-input predictions as a single v2 output tensor. Uniform numeric
 * rows become a 2-D FP32 tensor; anything irregular is sent as JSON strings.
 */
export function toOutputTensor(predictions: EncoderPrediction[]): InferTensor {
  const count = predictions.length;
  const scalars: Array<number | string> = [];
  for (const p of predictions) {
    if (!Array.isArray(p)) scalars.push(p);
  }

  if (scalars.length === count) {
    const numbers = scalars.filter((p): p is number => typeof p === 'number');
    if (numbers.length === count) {
      return {
        name: 'output-0',
        shape: [count],
        datatype: numbers.every(Number.isInteger) ? 'INT64' : 'FP32',
        data: numbers,
      };
    }
    return { name: 'output-0', shape: [count], datatype: 'BYTES', data: scalars.map(String) };
  }

  const rows = predictions.filter((p): p is Array<number | string> => Array.isArray(p));
  const width = rows[0]?.length ?? 0;
  const numericRows = rows.every((row) => row.length === width && row.every((v) => typeof v === 'number'));
  if (rows.length === count && numericRows) {
    return {
      name: 'output-0',
      shape: [count, width],
      datatype: 'FP32',
      data: rows.flat(),
    };
  }

  return {
    name: 'output-0',
    shape: [count],
    datatype: 'BYTES',
    data: predictions.map((p) => JSON.stringify(p)),
  };
}

// ============================================================================
// App
// ============================================================================

/**
 * Build the model server for the given (loaded) models
 */
export function createApp(models: RuntimeModel[]) {
  const registry = new Map<string, RuntimeModel>(models.map((m) => [m.name, m]));

  function getModel(name: string): RuntimeModel {
    const model = registry.get(name);
    if (!model) {
      throw new HTTPException(404, { message: `Model with name ${name} does not exist.` });
    }
    return model;
  }

  function getEncoder(name: string): EncoderModel {
    const model = getModel(name);
    if (model.kind !== 'encoder') {
      throw new HTTPException(400, { message: `Model ${name} is a generative model; use /openai/v1/completions` });
    }
    return model;
  }

  function getGenerator(name: string | undefined): GenerativeModel {
    const generators = models.filter((m): m is GenerativeModel => m.kind === 'generative');
    const model = name === undefined ? generators[0] : generators.find((m) => m.name === name);
    if (!model) {
      throw new HTTPException(404, {
        message: name === undefined ? 'No generative model is being served' : `Model with name ${name} does not exist.`,
      });
    }
    return model;
  }

  const allReady = () => models.length > 0 && models.every((m) => m.ready);

  const app = new Hono();

  // Request logging
  app.use('*', async (c, next) => {
    logger.info({ method: c.req.method, url: c.req.url }, `${c.req.method} ${c.req.path}`);
    await next();
  });

  // ============================================================================
  // Health Routes
  // ============================================================================

  app.get('/', (c) => c.json({ status: 'alive' }));

  app.get('/v2/health/live', (c) => c.json({ live: true }));

  app.get('/v2/health/ready', (c) => {
    const ready = allReady();
    return c.json({ ready }, ready ? 200 : 503);
  });

  // ============================================================================
  // Model Metadata Routes
  // ============================================================================

  app.get('/v1/models', (c) => c.json({ models: [...registry.keys()] }));

  app.get('/v1/models/:name', (c) => {
    const model = getModel(c.req.param('name'));
    return c.json({ name: model.name, ready: model.ready });
  });

  app.get('/v2/models/:name', (c) => {
    const model = getModel(c.req.param('name'));
    return c.json({
      name: model.name,
      versions: [],
      platform: model.backend,
      task: model.task,
      inputs: [],
      outputs: [],
    });
  });

  app.get('/v2/models/:name/ready', (c) => {
    const model = getModel(c.req.param('name'));
    return c.json({ name: model.name, ready: model.ready }, model.ready ? 200 : 503);
  });

  // ============================================================================
  // Inference Routes
  // ============================================================================

  app.post(
    '/v1/models/:target',
    zValidator('param', predictParamsSchema, validationHook),
    zValidator('json', v1PredictSchema, validationHook),
    async (c) => {
      const { target } = c.req.valid('param');
      const suffix = ':predict';
      if (!target.endsWith(suffix)) {
        throw new HTTPException(404, { message: `Route not found: POST ${c.req.path}` });
      }

      const model = getEncoder(target.slice(0, -suffix.length));
      const { instances } = c.req.valid('json');
      const predictions = await model.predict(instances);
      return c.json({ predictions });
    }
  );

  app.post(
    '/v2/models/:name/infer',
    zValidator('param', modelParamsSchema, validationHook),
    zValidator('json', v2InferSchema, validationHook),
    async (c) => {
      const model = getEncoder(c.req.valid('param').name);
      const request = c.req.valid('json');
      const texts = request.inputs[0].data;

      const predictions = await model.predict(texts);
      const response: InferResponse = {
        model_name: model.name,
        id: request.id,
        outputs: [toOutputTensor(predictions)],
      };
      return c.json(response);
    }
  );

  app.post('/openai/v1/completions', zValidator('json', completionSchema, validationHook), async (c) => {
    const request = c.req.valid('json');
    const model = getGenerator(request.model);
    return c.json(await model.generate(request));
  });

  // ============================================================================
  // Errors
  // ============================================================================

  app.notFound((c) => {
    logger.warn(
      { method: c.req.method, url: c.req.url, statusCode: 404 },
      `No route matched: ${c.req.method} ${c.req.url}`
    );
    return c.json({ error: { message: `Route not found: ${c.req.method} ${c.req.path}`, statusCode: 404 } }, 404);
  });

  app.onError((err, c) => {
    logger.error({ error: err, stack: err.stack }, `Error: ${err.message}`);

    if (err instanceof HTTPException) {
      return c.json({ error: { message: err.message, statusCode: err.status } }, err.status);
    }

    if (err instanceof PredictorError) {
      return c.json({ error: { message: err.message, statusCode: 502 } }, 502);
    }

    if (err instanceof RuntimeNotReadyError) {
      return c.json({ error: { message: err.message, statusCode: 503 } }, 503);
    }

    return c.json({ error: { message: err.message || 'Internal Server Error', statusCode: 500 } }, 500);
  });

  return app;
}

export type AppType = ReturnType<typeof createApp>;
