/**
 * Inference request/response types (KServe v1/v2 and OpenAI completions)
 */

export type TensorDatatype = 'INT64' | 'INT32' | 'FP32' | 'FP16' | 'BYTES' | 'BOOL';

export interface InferTensor {
  name: string;
  shape: number[];
  datatype: TensorDatatype;
  data: Array<number | string | boolean>;
}

export interface InferRequest {
  id?: string;
  inputs: InferTensor[];
  outputs?: { name: string }[];
}

export interface InferResponse {
  model_name: string;
  model_version?: string;
  id?: string;
  outputs: InferTensor[];
}

export interface V1PredictRequest {
  instances: unknown[];
}

export interface V1PredictResponse {
  predictions: unknown[];
}

export interface CompletionRequest {
  model?: string;
  prompt: string | string[];
  max_tokens?: number;
  temperature?: number;
  top_p?: number;
  stop?: string | string[];
  seed?: number;
}

export interface CompletionChoice {
  index: number;
  text: string;
  finish_reason: string | null;
}

export interface CompletionResponse {
  id: string;
  object: 'text_completion';
  created: number;
  model: string;
  choices: CompletionChoice[];
  usage?: {
    prompt_tokens: number;
    completion_tokens: number;
    total_tokens: number;
  };
}

// Class index or label, filled token(s), per-token labels, or an embedding
export type EncoderPrediction = number | string | Array<number | string>;
