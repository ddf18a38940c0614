/**
 * WordPiece Tokenizer
 *
 * For BERT-family encoders shipping vocab.txt, or tokenizer.json with a
 * WordPiece model.
 *
 * @module models/tokenizer
 */

import { z } from 'zod';
import type { ResolvedLocation } from '@transformer-serve/shared';
import { InvalidOptionsError, ModelFileError } from '../lib/errors';
import type { ModelFileReader } from '../services/storage';

export interface SpecialTokens {
  unk: string;
  cls: string;
  sep: string;
  pad: string;
  mask: string;
}

export interface WordPieceConfig {
  doLowerCase: boolean;
  specialTokens?: Partial<SpecialTokens>;
  continuingSubwordPrefix?: string;
  maxInputCharsPerWord?: number;
}

export interface EncodeOptions {
  addSpecialTokens: boolean;
  maxLength?: number;
}

/**
 * Padded batch, one row per input text
 */
export interface EncodedBatch {
  inputIds: number[][];
  attentionMask: number[][];
  tokenTypeIds: number[][];
}

const DEFAULT_SPECIAL_TOKENS: SpecialTokens = {
  unk: '[UNK]',
  cls: '[CLS]',
  sep: '[SEP]',
  pad: '[PAD]',
  mask: '[MASK]',
};

function escapeRegExp(value: string): string {
  return value.replace(/[.*+?^${}()|[\]\\]/g, '\\$&');
}

function isPunctuation(char: string): boolean {
  const cp = char.codePointAt(0) ?? 0;
  // ASCII symbols count as punctuation even where Unicode disagrees (e.g. "$", "^")
  if ((cp >= 33 && cp <= 47) || (cp >= 58 && cp <= 64) || (cp >= 91 && cp <= 96) || (cp >= 123 && cp <= 126)) {
    return true;
  }
  return /\p{P}/u.test(char);
}

function isCjk(char: string): boolean {
  const cp = char.codePointAt(0) ?? 0;
  return (
    (cp >= 0x4e00 && cp <= 0x9fff) ||
    (cp >= 0x3400 && cp <= 0x4dbf) ||
    (cp >= 0x20000 && cp <= 0x2a6df) ||
    (cp >= 0xf900 && cp <= 0xfaff) ||
    (cp >= 0x2f800 && cp <= 0x2fa1f)
  );
}

// [CLS] and [SEP]
function reservedTokenCount(options: EncodeOptions): number {
  return options.addSpecialTokens ? 2 : 0;
}

/**
 * A max length must leave room for the special tokens, or rows would
 * come out longer than requested
 */
export function assertMaxLengthFits(options: EncodeOptions): void {
  const reserved = reservedTokenCount(options);
  if (options.maxLength !== undefined && options.maxLength < reserved) {
    throw new InvalidOptionsError([
      `max_length: ${options.maxLength} is shorter than the ${reserved} special tokens; raise it or pass --disable_special_tokens`,
    ]);
  }
}

/**
 * Simple WordPiece tokenizer: BERT basic tokenization followed by greedy
 * longest-match-first subword splitting
 */
export class WordPieceTokenizer {
  readonly specialTokens: SpecialTokens;
  private readonly vocab: Map<string, number> = new Map();
  private readonly reverseVocab: Map<number, string> = new Map();
  private readonly specialIds: Set<number> = new Set();
  private readonly specialPattern: RegExp;
  private readonly doLowerCase: boolean;
  private readonly prefix: string;
  private readonly maxInputCharsPerWord: number;

  constructor(vocab: Record<string, number> | string[], config: WordPieceConfig) {
    const entries: Array<[string, number]> = Array.isArray(vocab)
      ? vocab.map((token, id): [string, number] => [token, id])
      : Object.entries(vocab);
    for (const [token, id] of entries) {
      this.vocab.set(token, id);
      this.reverseVocab.set(id, token);
    }

    this.specialTokens = { ...DEFAULT_SPECIAL_TOKENS, ...config.specialTokens };
    this.doLowerCase = config.doLowerCase;
    this.prefix = config.continuingSubwordPrefix ?? '##';
    this.maxInputCharsPerWord = config.maxInputCharsPerWord ?? 100;

    for (const token of Object.values(this.specialTokens)) {
      const id = this.vocab.get(token);
      if (id === undefined) {
        throw new ModelFileError(`Special token ${token} is missing from the vocabulary`);
      }
      this.specialIds.add(id);
    }

    const alternatives = Object.values(this.specialTokens).map(escapeRegExp).join('|');
    this.specialPattern = new RegExp(`(${alternatives})`);
  }

  get vocabSize(): number {
    return this.vocab.size;
  }

  get maskTokenId(): number {
    return this.requireId(this.specialTokens.mask);
  }

  tokenToId(token: string): number {
    return this.vocab.get(token) ?? this.requireId(this.specialTokens.unk);
  }

  idToToken(id: number): string {
    return this.reverseVocab.get(id) ?? this.specialTokens.unk;
  }

  isSpecialId(id: number): boolean {
    return this.specialIds.has(id);
  }

  /**
   * Split text into WordPiece tokens. Special tokens written in the text
   * ("[MASK]") are kept whole and never lower-cased.
   */
  tokenize(text: string): string[] {
    const tokens: string[] = [];
    for (const part of text.split(this.specialPattern)) {
      if (!part) continue;
      if (Object.values(this.specialTokens).includes(part)) {
        tokens.push(part);
        continue;
      }
      for (const word of this.basicTokenize(part)) {
        tokens.push(...this.wordPiece(word));
      }
    }
    return tokens;
  }

  /**
   * Encode one text to ids, truncating to maxLength (special tokens included)
   */
  encode(text: string, options: EncodeOptions): number[] {
    assertMaxLengthFits(options);
    let ids = this.tokenize(text).map((token) => this.tokenToId(token));

    if (options.maxLength !== undefined) {
      ids = ids.slice(0, options.maxLength - reservedTokenCount(options));
    }

    if (options.addSpecialTokens) {
      ids = [this.requireId(this.specialTokens.cls), ...ids, this.requireId(this.specialTokens.sep)];
    }
    return ids;
  }

  /**
   * Encode a batch, right-padding every row to the longest one
   */
  encodeBatch(texts: string[], options: EncodeOptions): EncodedBatch {
    const rows = texts.map((text) => this.encode(text, options));
    const width = rows.reduce((max, row) => Math.max(max, row.length), 0);
    const padId = this.requireId(this.specialTokens.pad);

    return {
      inputIds: rows.map((row) => [...row, ...new Array<number>(width - row.length).fill(padId)]),
      attentionMask: rows.map((row) => [...new Array<number>(row.length).fill(1), ...new Array<number>(width - row.length).fill(0)]),
      tokenTypeIds: rows.map(() => new Array<number>(width).fill(0)),
    };
  }

  /**
   * Join tokens back into text, merging subword continuations
   */
  decode(ids: number[], skipSpecialTokens = true): string {
    const words: string[] = [];
    for (const id of ids) {
      if (skipSpecialTokens && this.isSpecialId(id)) continue;
      const token = this.idToToken(id);
      if (token.startsWith(this.prefix) && words.length > 0) {
        words[words.length - 1] += token.slice(this.prefix.length);
      } else {
        words.push(token);
      }
    }
    return words.join(' ');
  }

  private requireId(token: string): number {
    const id = this.vocab.get(token);
    if (id === undefined) {
      throw new ModelFileError(`Token ${token} is missing from the vocabulary`);
    }
    return id;
  }

  private basicTokenize(text: string): string[] {
    let cleaned = '';
    for (const char of text) {
      const cp = char.codePointAt(0) ?? 0;
      if (cp === 0 || cp === 0xfffd || (/\p{Cc}/u.test(char) && !/\s/.test(char))) continue;
      cleaned += isCjk(char) ? ` ${char} ` : /\s/.test(char) ? ' ' : char;
    }

    const words: string[] = [];
    for (let word of cleaned.split(' ')) {
      if (!word) continue;
      if (this.doLowerCase) {
        word = word.toLowerCase().normalize('NFD').replace(/\p{Mn}/gu, '');
      }

      let current = '';
      for (const char of word) {
        if (isPunctuation(char)) {
          if (current) words.push(current);
          words.push(char);
          current = '';
        } else {
          current += char;
        }
      }
      if (current) words.push(current);
    }
    return words;
  }

  private wordPiece(word: string): string[] {
    const chars = Array.from(word);
    if (chars.length > this.maxInputCharsPerWord) {
      return [this.specialTokens.unk];
    }

    const pieces: string[] = [];
    let start = 0;
    while (start < chars.length) {
      let end = chars.length;
      let piece: string | null = null;
      while (start < end) {
        let candidate = chars.slice(start, end).join('');
        if (start > 0) candidate = this.prefix + candidate;
        if (this.vocab.has(candidate)) {
          piece = candidate;
          break;
        }
        end--;
      }
      if (piece === null) {
        return [this.specialTokens.unk];
      }
      pieces.push(piece);
      start = end;
    }
    return pieces;
  }
}

const addedTokenSchema = z.union([z.string(), z.object({ content: z.string() })]);

/**
 * The subset of tokenizer_config.json the encoder reads
 */
export const tokenizerConfigSchema = z
  .object({
    do_lower_case: z.boolean().optional(),
    unk_token: addedTokenSchema.optional(),
    cls_token: addedTokenSchema.optional(),
    sep_token: addedTokenSchema.optional(),
    pad_token: addedTokenSchema.optional(),
    mask_token: addedTokenSchema.optional(),
    auto_map: z.record(z.unknown()).optional(),
  })
  .passthrough();

export type TokenizerConfig = z.infer<typeof tokenizerConfigSchema>;

const tokenizerJsonSchema = z.object({
  model: z.object({
    type: z.string(),
    vocab: z.record(z.number()),
    continuing_subword_prefix: z.string().optional(),
    max_input_chars_per_word: z.number().int().positive().optional(),
  }),
});

const SPECIAL_TOKEN_CONFIG_KEYS: ReadonlyArray<
  readonly [keyof SpecialTokens, 'unk_token' | 'cls_token' | 'sep_token' | 'pad_token' | 'mask_token']
> = [
  ['unk', 'unk_token'],
  ['cls', 'cls_token'],
  ['sep', 'sep_token'],
  ['pad', 'pad_token'],
  ['mask', 'mask_token'],
];

function tokenContent(token: z.infer<typeof addedTokenSchema> | undefined): string | undefined {
  return typeof token === 'string' ? token : token?.content;
}

export function parseTokenizerConfig(text: string | undefined): TokenizerConfig {
  if (text === undefined) {
    return {};
  }
  let raw: unknown;
  try {
    raw = JSON.parse(text);
  } catch {
    throw new ModelFileError('tokenizer_config.json is not valid JSON');
  }
  const result = tokenizerConfigSchema.safeParse(raw);
  if (!result.success) {
    throw new ModelFileError('tokenizer_config.json has an unexpected format');
  }
  return result.data;
}

/**
 * Load a WordPiece tokenizer from the model files. vocab.txt is preferred;
 * tokenizer.json is used when it declares a WordPiece model.
 */
export async function loadWordPieceTokenizer(
  reader: ModelFileReader,
  location: ResolvedLocation,
  revision: string | undefined,
  tokenizerConfig: TokenizerConfig,
  doLowerCase: boolean
): Promise<WordPieceTokenizer> {
  const specialTokens: Partial<SpecialTokens> = {};
  for (const [key, configKey] of SPECIAL_TOKEN_CONFIG_KEYS) {
    const content = tokenContent(tokenizerConfig[configKey]);
    if (content !== undefined) {
      specialTokens[key] = content;
    }
  }

  const vocabText = await reader.readOptionalText(location, 'vocab.txt', revision);
  if (vocabText !== undefined) {
    const vocab = vocabText.split(/\r?\n/);
    if (vocab.length > 0 && vocab[vocab.length - 1] === '') {
      vocab.pop();
    }
    return new WordPieceTokenizer(vocab, { doLowerCase, specialTokens });
  }

  const tokenizerText = await reader.readOptionalText(location, 'tokenizer.json', revision);
  if (tokenizerText === undefined) {
    throw new ModelFileError('No WordPiece vocabulary found (expected vocab.txt or tokenizer.json)', 404);
  }

  let raw: unknown;
  try {
    raw = JSON.parse(tokenizerText);
  } catch {
    throw new ModelFileError('tokenizer.json is not valid JSON');
  }
  const parsed = tokenizerJsonSchema.safeParse(raw);
  if (!parsed.success || parsed.data.model.type !== 'WordPiece') {
    throw new ModelFileError('tokenizer.json does not describe a WordPiece model');
  }

  return new WordPieceTokenizer(parsed.data.model.vocab, {
    doLowerCase,
    specialTokens,
    continuingSubwordPrefix: parsed.data.model.continuing_subword_prefix,
    maxInputCharsPerWord: parsed.data.model.max_input_chars_per_word,
  });
}
