import { InvalidOptionsError } from '../lib/errors';
import { cliOptionsSchema, formatIssues, toServerOptions, type ServerOptions } from '../lib/validation';
import { componentLogger } from '../lib/logger';
import type { EngineFlagValue } from '@transformer-serve/shared';

const log = componentLogger('config');

const BOOLEAN_FLAGS = new Set([
  'disable_lower_case',
  'disable_special_tokens',
  'trust_remote_code',
  'return_token_type_ids',
  'predictor_use_ssl',
]);

const VALUE_FLAGS = new Set([
  'model_name',
  'model_dir',
  'model_id',
  'model_revision',
  'tokenizer_revision',
  'max_length',
  'tensor_input_names',
  'task',
  'backend',
  'predictor_host',
  'predictor_protocol',
  'predictor_request_timeout_seconds',
  'http_port',
]);

/**
 * Flags split into the ones this server understands and the ones it
 * forwards to the generation engine untouched
 */
export interface ParsedCommandLine {
  help: boolean;
  flags: Record<string, string | boolean>;
  engineOptions: Record<string, EngineFlagValue>;
}

export const USAGE = `Usage: transformer-serve [options]

Model:
  --model_name <name>                  Name the model is served under (default: model)
  --model_dir <path|file://uri>        Local directory holding the model files
  --model_id <id>                      HuggingFace model id
  --model_revision <rev>               HuggingFace model revision
  --tokenizer_revision <rev>           HuggingFace tokenizer revision
  --task <task>                        The ML task name (inferred from the architecture if omitted)
  --backend <backend>                  auto | standard | generation-engine (default: auto)

Tokenizer:
  --max_length <n>                     Max sequence length for the tokenizer
  --disable_lower_case                 Do not use lower case for the tokenizer
  --disable_special_tokens             Do not add the model's special tokens
  --return_token_type_ids              Send token type ids to the predictor
  --tensor_input_names <a,b,...>       Tensor input names passed to the predictor
  --trust_remote_code                  Allow models and tokenizers with custom code

Predictor (encoder tasks):
  --predictor_host <host[:port]>       Predictor that runs the encoder model
  --predictor_protocol <v1|v2>         Inference protocol (default: v1)
  --predictor_use_ssl                  Use https to reach the predictor
  --predictor_request_timeout_seconds  Predictor request timeout (default: 600)

Server:
  --http_port <port>                   HTTP port (default: 8080)
  -h, --help                           Show this help

Any other --flag [value] is passed through to the generation engine.`;

/**
 * Split argv into known flags and engine pass-through flags.
 * Accepts both `--flag value` and `--flag=value`.
 */
export function parseCommandLine(argv: string[]): ParsedCommandLine {
  const parsed: ParsedCommandLine = { help: false, flags: {}, engineOptions: {} };

  for (let i = 0; i < argv.length; i++) {
    const arg = argv[i];

    if (arg === '--help' || arg === '-h') {
      parsed.help = true;
      continue;
    }

    if (!arg.startsWith('--') || arg.length === 2) {
      throw new InvalidOptionsError([`Unexpected argument: ${arg}`]);
    }

    const eq = arg.indexOf('=');
    const name = eq === -1 ? arg.slice(2) : arg.slice(2, eq);
    const inlineValue = eq === -1 ? undefined : arg.slice(eq + 1);
    const next = argv[i + 1];
    const nextIsValue = next !== undefined && !next.startsWith('--');

    if (BOOLEAN_FLAGS.has(name)) {
      if (inlineValue !== undefined && inlineValue !== 'true' && inlineValue !== 'false') {
        throw new InvalidOptionsError([`${name}: expected true or false, got '${inlineValue}'`]);
      }
      parsed.flags[name] = inlineValue !== 'false';
    } else if (VALUE_FLAGS.has(name)) {
      if (inlineValue !== undefined) {
        parsed.flags[name] = inlineValue;
      } else if (nextIsValue) {
        parsed.flags[name] = next;
        i++;
      } else {
        throw new InvalidOptionsError([`${name}: expected a value`]);
      }
    } else if (inlineValue !== undefined) {
      parsed.engineOptions[name] = inlineValue;
    } else if (nextIsValue) {
      parsed.engineOptions[name] = next;
      i++;
    } else {
      parsed.engineOptions[name] = true;
    }
  }

  return parsed;
}

/**
 * Validate the parsed flags and apply defaults
 */
export function resolveServerOptions(parsed: ParsedCommandLine): ServerOptions {
  const result = cliOptionsSchema.safeParse(parsed.flags);
  if (!result.success) {
    throw new InvalidOptionsError(formatIssues(result.error));
  }

  const engineFlags = Object.keys(parsed.engineOptions);
  if (engineFlags.length > 0) {
    log.debug({ engineFlags }, 'Collected engine pass-through flags');
  }

  return toServerOptions(result.data, parsed.engineOptions);
}

/**
 * Process-level settings read from the environment. The providers read
 * their own executable paths and ports.
 */
export interface RuntimeEnvironment {
  hfToken?: string;
  hfEndpoint: string;
}

export function readRuntimeEnvironment(env: NodeJS.ProcessEnv = process.env): RuntimeEnvironment {
  return {
    hfToken: env.HF_TOKEN || env.HUGGING_FACE_HUB_TOKEN || undefined,
    hfEndpoint: (env.HF_ENDPOINT || 'https://huggingface.co').replace(/\/+$/, ''),
  };
}
