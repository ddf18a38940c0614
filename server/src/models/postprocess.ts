import type { EncoderPrediction, InferTensor } from '@transformer-serve/shared';
import { PredictorError } from '../lib/errors';

/**
 * Row-major numeric tensor
 */
export interface DenseTensor {
  shape: number[];
  data: number[];
}

function invalidOutput(detail: string): PredictorError {
  return new PredictorError(502, `Predictor returned an unusable output: ${detail}`);
}

function shapeSize(shape: number[]): number {
  return shape.reduce((size, dim) => size * dim, 1);
}

/**
 * Convert a v2 output tensor to a dense numeric tensor
 */
export function fromInferTensor(tensor: InferTensor): DenseTensor {
  const data: number[] = [];
  for (const value of tensor.data) {
    if (typeof value !== 'number') {
      throw invalidOutput(`tensor '${tensor.name}' has non-numeric ${tensor.datatype} data`);
    }
    data.push(value);
  }
  if (shapeSize(tensor.shape) !== data.length) {
    throw invalidOutput(`tensor '${tensor.name}' has ${data.length} values for shape [${tensor.shape.join(', ')}]`);
  }
  return { shape: [...tensor.shape], data };
}

/**
 * Convert v1 nested-array predictions to a dense numeric tensor.
 * Every nesting level must be rectangular.
 */
export function fromNestedArray(value: unknown): DenseTensor {
  const shape: number[] = [];
  let probe: unknown = value;
  while (Array.isArray(probe)) {
    shape.push(probe.length);
    probe = probe[0];
  }

  const data: number[] = [];
  const walk = (node: unknown, depth: number): void => {
    if (depth === shape.length) {
      if (typeof node !== 'number') {
        throw invalidOutput('predictions contain a non-numeric value');
      }
      data.push(node);
      return;
    }
    if (!Array.isArray(node) || node.length !== shape[depth]) {
      throw invalidOutput('predictions are not a rectangular array');
    }
    for (const child of node) {
      walk(child, depth + 1);
    }
  };
  walk(value, 0);

  return { shape, data };
}

export function argmax(values: ArrayLike<number>): number {
  let best = 0;
  for (let i = 1; i < values.length; i++) {
    if (values[i] > values[best]) {
      best = i;
    }
  }
  return best;
}

function expectRank(tensor: DenseTensor, rank: number, what: string): void {
  if (tensor.shape.length !== rank) {
    throw invalidOutput(`expected rank ${rank} ${what}, got shape [${tensor.shape.join(', ')}]`);
  }
}

function labelFor(index: number, labels: Readonly<Record<number, string>> | undefined): number | string {
  return labels?.[index] ?? index;
}

/**
 * Sequence classification: one class per input from [batch, classes] logits
 */
export function classifySequences(
  logits: DenseTensor,
  labels?: Readonly<Record<number, string>>
): EncoderPrediction[] {
  expectRank(logits, 2, 'classification logits');
  const [batch, classes] = logits.shape;
  const predictions: EncoderPrediction[] = [];
  for (let b = 0; b < batch; b++) {
    const row = logits.data.slice(b * classes, (b + 1) * classes);
    predictions.push(labelFor(argmax(row), labels));
  }
  return predictions;
}

/**
 * Token view of an encoded batch, enough to skip padding and special tokens
 */
export interface TokenBatch {
  inputIds: number[][];
  attentionMask: number[][];
  isSpecialId(id: number): boolean;
}

/**
 * Token classification: one class per real token from [batch, tokens, classes] logits
 */
export function classifyTokens(
  logits: DenseTensor,
  tokens: TokenBatch,
  labels?: Readonly<Record<number, string>>
): EncoderPrediction[] {
  expectRank(logits, 3, 'token classification logits');
  const [batch, width, classes] = logits.shape;
  const predictions: EncoderPrediction[] = [];

  for (let b = 0; b < batch; b++) {
    const ids = tokens.inputIds[b] ?? [];
    const mask = tokens.attentionMask[b] ?? [];
    const row: Array<number | string> = [];
    for (let t = 0; t < width && t < ids.length; t++) {
      if (mask[t] === 0 || tokens.isSpecialId(ids[t])) continue;
      const offset = (b * width + t) * classes;
      row.push(labelFor(argmax(logits.data.slice(offset, offset + classes)), labels));
    }
    predictions.push(row);
  }
  return predictions;
}

/**
 * Fill mask: the most likely token for each mask position, from
 * [batch, tokens, vocab] logits. A single mask yields a string.
 */
export function fillMasks(
  logits: DenseTensor,
  inputIds: number[][],
  maskTokenId: number,
  decode: (id: number) => string
): EncoderPrediction[] {
  expectRank(logits, 3, 'fill-mask logits');
  const [batch, width, vocab] = logits.shape;
  const predictions: EncoderPrediction[] = [];

  for (let b = 0; b < batch; b++) {
    const ids = inputIds[b] ?? [];
    const filled: string[] = [];
    for (let t = 0; t < width && t < ids.length; t++) {
      if (ids[t] !== maskTokenId) continue;
      const offset = (b * width + t) * vocab;
      filled.push(decode(argmax(logits.data.slice(offset, offset + vocab))));
    }
    predictions.push(filled.length === 1 ? filled[0] : filled);
  }
  return predictions;
}

/**
 * Text embedding: attention-masked mean of [batch, tokens, hidden] states,
 * L2-normalized
 */
export function embed(hiddenStates: DenseTensor, attentionMask: number[][]): EncoderPrediction[] {
  expectRank(hiddenStates, 3, 'hidden states');
  const [batch, width, hidden] = hiddenStates.shape;
  const predictions: EncoderPrediction[] = [];

  for (let b = 0; b < batch; b++) {
    const sum = new Array<number>(hidden).fill(0);
    let count = 0;
    const mask = attentionMask[b] ?? [];
    for (let t = 0; t < width; t++) {
      if ((mask[t] ?? 0) === 0) continue;
      count++;
      const offset = (b * width + t) * hidden;
      for (let h = 0; h < hidden; h++) {
        sum[h] += hiddenStates.data[offset + h];
      }
    }

    const mean = sum.map((value) => value / Math.max(count, 1));
    const norm = Math.sqrt(mean.reduce((acc, value) => acc + value * value, 0));
    predictions.push(norm > 0 ? mean.map((value) => value / norm) : mean);
  }
  return predictions;
}
