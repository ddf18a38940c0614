import { z } from 'zod';
import { parseBackendName, type BackendRequest, type EngineFlagValue, type PredictorProtocol } from '@transformer-serve/shared';

/**
 * Model names end up in URL paths (/v1/models/<name>:predict)
 */
export const modelNameSchema = z
  .string()
  .min(1, 'Model name cannot be empty')
  .max(253, 'Model name must be 253 characters or less')
  .regex(
    /^[A-Za-z0-9]([A-Za-z0-9._-]*[A-Za-z0-9])?$/,
    'Model name must be alphanumeric with dots, hyphens or underscores, starting and ending with alphanumeric'
  );

const optionalString = z.string().trim().min(1).optional();

const positiveInt = z.coerce.number().int().positive();

const commaSeparatedList = z
  .string()
  .transform((val) => val.split(',').map((item) => item.trim()).filter((item) => item.length > 0))
  .pipe(z.array(z.string()).min(1, 'List cannot be empty'));

export const backendSchema = z
  .string()
  .default('auto')
  .transform((val, ctx): BackendRequest => {
    const backend = parseBackendName(val);
    if (!backend) {
      ctx.addIssue({
        code: z.ZodIssueCode.custom,
        message: `Unknown backend '${val}'. Can be one of 'auto', 'standard', 'generation-engine'`,
      });
      return z.NEVER;
    }
    return backend;
  });

/**
 * Command-line options, keyed by flag name without the leading dashes
 */
export const cliOptionsSchema = z.object({
  model_name: modelNameSchema.default('model'),
  model_dir: optionalString,
  model_id: optionalString,
  model_revision: optionalString,
  tokenizer_revision: optionalString,
  max_length: positiveInt.optional(),
  disable_lower_case: z.boolean().default(false),
  disable_special_tokens: z.boolean().default(false),
  trust_remote_code: z.boolean().default(false),
  tensor_input_names: commaSeparatedList.optional(),
  task: optionalString,
  backend: backendSchema,
  return_token_type_ids: z.boolean().default(false),
  predictor_host: optionalString,
  predictor_protocol: z.enum(['v1', 'v2']).default('v1'),
  predictor_use_ssl: z.boolean().default(false),
  predictor_request_timeout_seconds: positiveInt.default(600),
  http_port: z.coerce.number().int().min(1).max(65535).default(8080),
});

export type CliOptions = z.infer<typeof cliOptionsSchema>;

/**
 * Validated server options
 */
export interface ServerOptions {
  modelName: string;
  modelDir?: string;
  modelId?: string;
  modelRevision?: string;
  tokenizerRevision?: string;
  maxLength?: number;
  doLowerCase: boolean;
  addSpecialTokens: boolean;
  trustRemoteCode: boolean;
  tensorInputNames?: string[];
  task?: string;
  backend: BackendRequest;
  returnTokenTypeIds: boolean;
  predictor: {
    host?: string;
    protocol: PredictorProtocol;
    useSsl: boolean;
    requestTimeoutSeconds: number;
  };
  httpPort: number;
  engineOptions: Record<string, EngineFlagValue>;
}

export function toServerOptions(cli: CliOptions, engineOptions: Record<string, EngineFlagValue> = {}): ServerOptions {
  return {
    modelName: cli.model_name,
    modelDir: cli.model_dir,
    modelId: cli.model_id,
    modelRevision: cli.model_revision,
    tokenizerRevision: cli.tokenizer_revision,
    maxLength: cli.max_length,
    doLowerCase: !cli.disable_lower_case,
    addSpecialTokens: !cli.disable_special_tokens,
    trustRemoteCode: cli.trust_remote_code,
    tensorInputNames: cli.tensor_input_names,
    task: cli.task,
    backend: cli.backend,
    returnTokenTypeIds: cli.return_token_type_ids,
    predictor: {
      host: cli.predictor_host,
      protocol: cli.predictor_protocol,
      useSsl: cli.predictor_use_ssl,
      requestTimeoutSeconds: cli.predictor_request_timeout_seconds,
    },
    httpPort: cli.http_port,
    engineOptions,
  };
}

/**
 * Format zod issues the way the CLI reports them
 */
export function formatIssues(error: z.ZodError): string[] {
  return error.errors.map((e) => (e.path.length > 0 ? `${e.path.join('.')}: ${e.message}` : e.message));
}
