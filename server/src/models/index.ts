import type { GenerativeModel } from './generative';
import type { EncoderModel } from './encoder';

export { BaseModel } from './base';
export { GenerativeModel, type GenerativeModelParams, type GenerativeModelDeps } from './generative';
export { EncoderModel, type EncoderModelParams, type EncoderModelDeps } from './encoder';

/**
 * Any model the factory can build, discriminated by `kind`
 */
export type RuntimeModel = GenerativeModel | EncoderModel;
