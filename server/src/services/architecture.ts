import { z } from 'zod';
import type { ArchitectureMetadata, ResolvedLocation } from '@transformer-serve/shared';
import { ModelFileError } from '../lib/errors';
import { componentLogger } from '../lib/logger';
import type { ModelFileReader } from './storage';

const log = componentLogger('architecture');

/**
 * The subset of a HuggingFace config.json the server reads
 */
export const modelConfigSchema = z
  .object({
    architectures: z.array(z.string()).nullish(),
    model_type: z.string().optional(),
    id2label: z.record(z.string()).optional(),
    max_position_embeddings: z.number().int().positive().optional(),
  })
  .passthrough();

export interface ArchitectureInspector {
  inspect(location: ResolvedLocation, revision?: string): Promise<ArchitectureMetadata>;
}

/**
 * Turn a parsed config.json into frozen architecture metadata
 */
export function parseArchitectureMetadata(raw: unknown, revision?: string): ArchitectureMetadata {
  const result = modelConfigSchema.safeParse(raw);
  if (!result.success) {
    const issues = result.error.errors.map((e) => `${e.path.join('.')}: ${e.message}`);
    throw new ModelFileError(`Invalid config.json: ${issues.join(', ')}`);
  }

  const config = result.data;
  let labels: Record<number, string> | undefined;
  if (config.id2label) {
    labels = {};
    for (const [id, label] of Object.entries(config.id2label)) {
      const index = Number(id);
      if (Number.isInteger(index)) {
        labels[index] = label;
      }
    }
    Object.freeze(labels);
  }

  return Object.freeze({
    architectures: Object.freeze([...(config.architectures ?? [])]),
    revision,
    modelType: config.model_type,
    labels,
    maxPositionEmbeddings: config.max_position_embeddings,
  });
}

/**
 * Reads config.json through the model file reader. Reader errors are
 * propagated as they are.
 */
export class ConfigArchitectureInspector implements ArchitectureInspector {
  constructor(private readonly reader: ModelFileReader) {}

  async inspect(location: ResolvedLocation, revision?: string): Promise<ArchitectureMetadata> {
    const text = await this.reader.readText(location, 'config.json', revision);

    let raw: unknown;
    try {
      raw = JSON.parse(text);
    } catch {
      throw new ModelFileError('config.json is not valid JSON');
    }

    const metadata = parseArchitectureMetadata(raw, revision);
    log.info(
      { architectures: metadata.architectures, modelType: metadata.modelType, revision },
      'Read model architecture'
    );
    return metadata;
  }
}
