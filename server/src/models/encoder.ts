import type {
  EncoderPrediction,
  EncoderTask,
  InferTensor,
  PredictorConfig,
  ResolvedLocation,
} from '@transformer-serve/shared';
import { ConfigurationError, InvalidOptionsError, PredictorError } from '../lib/errors';
import { componentLogger } from '../lib/logger';
import { PredictorClient } from '../services/predictorClient';
import type { ModelFileReader } from '../services/storage';
import {
  assertMaxLengthFits,
  loadWordPieceTokenizer,
  parseTokenizerConfig,
  type EncodedBatch,
  type WordPieceTokenizer,
} from './tokenizer';
import { classifySequences, classifyTokens, embed, fillMasks, fromInferTensor, fromNestedArray, type DenseTensor } from './postprocess';
import { BaseModel } from './base';

const log = componentLogger('encoder-model');

const DEFAULT_MAX_LENGTH = 512;

export const ENCODER_INPUT_NAMES = ['input_ids', 'attention_mask', 'token_type_ids'] as const;
export type EncoderInputName = (typeof ENCODER_INPUT_NAMES)[number];

export interface EncoderModelParams {
  name: string;
  location: ResolvedLocation;
  task: EncoderTask;
  revision?: string;
  tokenizerRevision?: string;
  maxLength?: number;
  doLowerCase: boolean;
  addSpecialTokens: boolean;
  trustRemoteCode: boolean;
  tensorInputNames?: readonly string[];
  returnTokenTypeIds: boolean;
  predictor: PredictorConfig;
  labels?: Readonly<Record<number, string>>;
  maxPositionEmbeddings?: number;
}

export interface EncoderModelDeps {
  reader: ModelFileReader;
  createPredictorClient?: (config: PredictorConfig) => PredictorClient;
}

function isEncoderInputName(name: string): name is EncoderInputName {
  return ENCODER_INPUT_NAMES.some((known) => known === name);
}

/**
 * Encoder model: tokenizes locally and delegates the forward pass to a
 * predictor, then post-processes the returned tensor per task
 */
export class EncoderModel extends BaseModel {
  readonly kind = 'encoder' as const;
  private tokenizer: WordPieceTokenizer | null = null;
  private client: PredictorClient | null = null;
  private inputNames: EncoderInputName[] = [];

  constructor(
    readonly params: EncoderModelParams,
    private readonly deps: EncoderModelDeps
  ) {
    super(params.name, params.task, 'standard');
  }

  get maxLength(): number {
    return this.params.maxLength ?? this.params.maxPositionEmbeddings ?? DEFAULT_MAX_LENGTH;
  }

  async load(): Promise<boolean> {
    const { params, deps } = this;
    const revision = params.tokenizerRevision ?? params.revision;

    const tokenizerConfig = parseTokenizerConfig(
      await deps.reader.readOptionalText(params.location, 'tokenizer_config.json', revision)
    );
    if (tokenizerConfig.auto_map !== undefined) {
      if (!params.trustRemoteCode) {
        throw new ConfigurationError(
          `Tokenizer for '${params.name}' declares custom code; set --trust_remote_code to serve it with its WordPiece vocabulary`
        );
      }
      log.warn({ model: params.name }, 'Tokenizer declares custom code; using its WordPiece vocabulary');
    }

    assertMaxLengthFits({ addSpecialTokens: params.addSpecialTokens, maxLength: this.maxLength });
    this.inputNames = this.resolveInputNames();
    this.tokenizer = await loadWordPieceTokenizer(deps.reader, params.location, revision, tokenizerConfig, params.doLowerCase);
    this.client = deps.createPredictorClient?.(params.predictor) ?? new PredictorClient(params.predictor);

    this.ready = true;
    log.info(
      {
        model: params.name,
        task: params.task,
        predictor: params.predictor.host,
        protocol: params.predictor.protocol,
        inputs: this.inputNames,
      },
      'Encoder model loaded'
    );
    return this.ready;
  }

  async predict(texts: string[]): Promise<EncoderPrediction[]> {
    this.assertReady();
    const { tokenizer, client } = this;
    if (!tokenizer || !client) {
      throw new ConfigurationError(`Model '${this.name}' has no tokenizer or predictor`);
    }
    if (texts.length === 0) {
      return [];
    }

    const batch = tokenizer.encodeBatch(texts, {
      addSpecialTokens: this.params.addSpecialTokens,
      maxLength: this.maxLength,
    });
    const output = await this.forward(client, batch);

    switch (this.params.task) {
      case 'sequence_classification':
      case 'text_classification':
        return classifySequences(output, this.params.labels);
      case 'token_classification':
        return classifyTokens(
          output,
          { ...batch, isSpecialId: (id) => tokenizer.isSpecialId(id) },
          this.params.labels
        );
      case 'fill_mask':
        return fillMasks(output, batch.inputIds, tokenizer.maskTokenId, (id) => tokenizer.decode([id]));
      case 'text_embedding':
        return embed(output, batch.attentionMask);
    }
  }

  private resolveInputNames(): EncoderInputName[] {
    const available: EncoderInputName[] = this.params.returnTokenTypeIds
      ? ['input_ids', 'attention_mask', 'token_type_ids']
      : ['input_ids', 'attention_mask'];
    const requested = this.params.tensorInputNames;
    if (!requested || requested.length === 0) {
      return available;
    }

    const issues: string[] = [];
    const names: EncoderInputName[] = [];
    for (const name of requested) {
      if (!isEncoderInputName(name)) {
        issues.push(`tensor_input_names: unknown input '${name}'`);
      } else if (!available.includes(name)) {
        issues.push(`tensor_input_names: '${name}' requires --return_token_type_ids`);
      } else {
        names.push(name);
      }
    }
    if (issues.length > 0) {
      throw new InvalidOptionsError(issues);
    }
    return names;
  }

  private async forward(client: PredictorClient, batch: EncodedBatch): Promise<DenseTensor> {
    const columns: Record<EncoderInputName, number[][]> = {
      input_ids: batch.inputIds,
      attention_mask: batch.attentionMask,
      token_type_ids: batch.tokenTypeIds,
    };

    if (this.params.predictor.protocol === 'v2') {
      const inputs: InferTensor[] = this.inputNames.map((name) => ({
        name,
        shape: [columns[name].length, columns[name][0]?.length ?? 0],
        datatype: 'INT64',
        data: columns[name].flat(),
      }));
      const response = await client.inferV2(this.name, { inputs });
      const first = response.outputs[0];
      if (!first) {
        throw new PredictorError(502, 'Predictor returned no output tensors');
      }
      return fromInferTensor(first);
    }

    const instances = batch.inputIds.map((_, row) =>
      Object.fromEntries(this.inputNames.map((name) => [name, columns[name][row]]))
    );
    const response = await client.predictV1(this.name, { instances });
    return fromNestedArray(response.predictions);
  }
}
