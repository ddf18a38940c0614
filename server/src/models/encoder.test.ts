import { describe, test, expect, vi, type Mock } from 'vitest';
import type { InferRequest, PredictorConfig } from '@transformer-serve/shared';
import { ConfigurationError, InvalidOptionsError, RuntimeNotReadyError } from '../lib/errors';
import { PredictorClient } from '../services/predictorClient';
import { MemoryFileReader, jsonResponse } from '../testing/fakes';
import { EncoderModel, type EncoderModelParams } from './encoder';

const VOCAB = [
  '[PAD]', '[UNK]', '[CLS]', '[SEP]', '[MASK]',
  'the', 'cat', 'sat', 'on', 'mat',
  'un', '##aff', '##able', '.', ',',
  'hello', 'world', '!', 'naive',
];

const predictor: PredictorConfig = {
  host: 'predictor.test',
  protocol: 'v2',
  useSsl: false,
  requestTimeoutSeconds: 5,
};

function files(extra: Record<string, string> = {}): MemoryFileReader {
  return new MemoryFileReader({ '/models/bert/vocab.txt': VOCAB.join('\n'), ...extra });
}

function params(overrides: Partial<EncoderModelParams> = {}): EncoderModelParams {
  return {
    name: 'bert',
    location: { type: 'local', path: '/models/bert' },
    task: 'sequence_classification',
    doLowerCase: true,
    addSpecialTokens: true,
    trustRemoteCode: false,
    returnTokenTypeIds: false,
    predictor,
    ...overrides,
  };
}

function createModel(
  overrides: Partial<EncoderModelParams>,
  fetchImpl: typeof fetch,
  reader: MemoryFileReader = files()
): EncoderModel {
  return new EncoderModel(params(overrides), {
    reader,
    createPredictorClient: (config) => new PredictorClient(config, fetchImpl),
  });
}

function sentBody(fetchImpl: Mock<typeof fetch>): unknown {
  const init = fetchImpl.mock.calls[0][1];
  return JSON.parse(String(init?.body));
}

describe('EncoderModel', () => {
  test('predict before load fails', async () => {
    const model = createModel({}, vi.fn<typeof fetch>());
    await expect(model.predict(['the cat'])).rejects.toThrow(RuntimeNotReadyError);
  });

  test('classifies sequences over the v2 protocol', async () => {
    const fetchImpl = vi.fn<typeof fetch>(async () =>
      jsonResponse({
        model_name: 'bert',
        outputs: [{ name: 'logits', shape: [2, 2], datatype: 'FP32', data: [0.1, 0.9, 0.8, 0.2] }],
      })
    );
    const model = createModel({ labels: { 0: 'NEGATIVE', 1: 'POSITIVE' } }, fetchImpl);

    expect(await model.load()).toBe(true);
    expect(model.ready).toBe(true);
    expect(await model.predict(['the cat', 'hello'])).toEqual(['POSITIVE', 'NEGATIVE']);

    expect(fetchImpl.mock.calls[0][0]).toBe('http://predictor.test/v2/models/bert/infer');
    const body: InferRequest = {
      inputs: [
        { name: 'input_ids', shape: [2, 4], datatype: 'INT64', data: [2, 5, 6, 3, 2, 15, 3, 0] },
        { name: 'attention_mask', shape: [2, 4], datatype: 'INT64', data: [1, 1, 1, 1, 1, 1, 1, 0] },
      ],
    };
    expect(sentBody(fetchImpl)).toEqual(body);
  });

  test('fills masks over the v1 protocol', async () => {
    // [CLS] the [MASK] sat [SEP]; position 2 scores "cat" highest
    const logits = Array.from({ length: 5 }, (_, position) =>
      Array.from({ length: VOCAB.length }, (_, id) => (position === 2 && id === 6 ? 10 : 0))
    );
    const fetchImpl = vi.fn<typeof fetch>(async () => jsonResponse({ predictions: [logits] }));
    const model = createModel({ task: 'fill_mask', predictor: { ...predictor, protocol: 'v1' } }, fetchImpl);

    await model.load();
    expect(await model.predict(['The [MASK] sat'])).toEqual(['cat']);

    expect(fetchImpl.mock.calls[0][0]).toBe('http://predictor.test/v1/models/bert:predict');
    expect(sentBody(fetchImpl)).toEqual({
      instances: [{ input_ids: [2, 5, 4, 7, 3], attention_mask: [1, 1, 1, 1, 1] }],
    });
  });

  test('sends token type ids when asked to', async () => {
    const fetchImpl = vi.fn<typeof fetch>(async () =>
      jsonResponse({
        model_name: 'bert',
        outputs: [{ name: 'logits', shape: [1, 3, 2], datatype: 'FP32', data: [0, 1, 1, 0, 0, 1] }],
      })
    );
    const model = createModel(
      { task: 'token_classification', returnTokenTypeIds: true, labels: { 0: 'O', 1: 'B-LOC' } },
      fetchImpl
    );

    await model.load();
    expect(await model.predict(['mat'])).toEqual([['O']]);

    const body = sentBody(fetchImpl);
    expect(body).toMatchObject({
      inputs: [{ name: 'input_ids' }, { name: 'attention_mask' }, { name: 'token_type_ids', data: [0, 0, 0] }],
    });
  });

  test('restricts the tensors to the configured input names', async () => {
    const fetchImpl = vi.fn<typeof fetch>(async () =>
      jsonResponse({
        model_name: 'bert',
        outputs: [{ name: 'last_hidden_state', shape: [1, 3, 2], datatype: 'FP32', data: [0, 0, 3, 4, 0, 0] }],
      })
    );
    const model = createModel({ task: 'text_embedding', tensorInputNames: ['input_ids'] }, fetchImpl);

    await model.load();
    // Mean of [0,0], [3,4], [0,0] is [1, 4/3]; normalized to unit length
    const [embedding] = await model.predict(['cat']);
    expect(Array.isArray(embedding)).toBe(true);
    if (Array.isArray(embedding)) {
      expect(embedding).toHaveLength(2);
      expect(embedding[0]).toBeCloseTo(0.6);
      expect(embedding[1]).toBeCloseTo(0.8);
    }
    expect(sentBody(fetchImpl)).toEqual({
      inputs: [{ name: 'input_ids', shape: [1, 3], datatype: 'INT64', data: [2, 6, 3] }],
    });
  });

  test('rejects unknown or unavailable input names on load', async () => {
    const unknown = createModel({ tensorInputNames: ['pixel_values'] }, vi.fn<typeof fetch>());
    await expect(unknown.load()).rejects.toThrow(InvalidOptionsError);

    const withoutFlag = createModel({ tensorInputNames: ['input_ids', 'token_type_ids'] }, vi.fn<typeof fetch>());
    await expect(withoutFlag.load()).rejects.toThrow(
      "Invalid options: tensor_input_names: 'token_type_ids' requires --return_token_type_ids"
    );
  });

  test('truncates to the model position limit by default', async () => {
    const fetchImpl = vi.fn<typeof fetch>(async () =>
      jsonResponse({
        model_name: 'bert',
        outputs: [{ name: 'logits', shape: [1, 2], datatype: 'FP32', data: [1, 0] }],
      })
    );
    const model = createModel({ maxPositionEmbeddings: 4 }, fetchImpl);

    expect(model.maxLength).toBe(4);
    await model.load();
    expect(await model.predict(['the cat sat on the mat'])).toEqual([0]);
    expect(sentBody(fetchImpl)).toEqual({
      inputs: [
        { name: 'input_ids', shape: [1, 4], datatype: 'INT64', data: [2, 5, 6, 3] },
        { name: 'attention_mask', shape: [1, 4], datatype: 'INT64', data: [1, 1, 1, 1] },
      ],
    });
  });

  test('a max length with no room for special tokens fails on load', async () => {
    const model = createModel({ maxLength: 1 }, vi.fn<typeof fetch>());
    await expect(model.load()).rejects.toThrow(InvalidOptionsError);
    expect(model.ready).toBe(false);
  });

  test('an explicit max length wins, and 512 is the fallback', () => {
    expect(createModel({ maxLength: 64, maxPositionEmbeddings: 4 }, vi.fn<typeof fetch>()).maxLength).toBe(64);
    expect(createModel({}, vi.fn<typeof fetch>()).maxLength).toBe(512);
  });

  test('tokenizers with custom code need trust_remote_code', async () => {
    const reader = files({ '/models/bert/tokenizer_config.json': JSON.stringify({ auto_map: { AutoTokenizer: 'custom.Tok' } }) });

    await expect(createModel({}, vi.fn<typeof fetch>(), reader).load()).rejects.toThrow(ConfigurationError);
    expect(await createModel({ trustRemoteCode: true }, vi.fn<typeof fetch>(), reader).load()).toBe(true);
  });

  test('an empty batch does not reach the predictor', async () => {
    const fetchImpl = vi.fn<typeof fetch>();
    const model = createModel({}, fetchImpl);
    await model.load();
    expect(await model.predict([])).toEqual([]);
    expect(fetchImpl).not.toHaveBeenCalled();
  });
});
