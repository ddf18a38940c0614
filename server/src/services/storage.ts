import { readFile, stat } from 'fs/promises';
import * as path from 'path';
import { fileURLToPath } from 'url';
import type { ResolvedLocation } from '@transformer-serve/shared';
import { ModelFileError, UnsupportedStorageUriError } from '../lib/errors';
import { withRetry } from '../lib/retry';
import { componentLogger } from '../lib/logger';

const log = componentLogger('storage');

const URI_SCHEME = /^([a-z][a-z0-9+.-]*):\/\//i;

/**
 * Resolves a `model_dir` reference to a directory the runtimes can read
 */
export interface ModelLocator {
  locate(modelDir: string): Promise<ResolvedLocation>;
}

/**
 * Locator for model directories that are already on this machine.
 * Remote storage URIs must be downloaded by an init container beforehand.
 */
export class LocalModelLocator implements ModelLocator {
  async locate(modelDir: string): Promise<ResolvedLocation> {
    const scheme = URI_SCHEME.exec(modelDir)?.[1]?.toLowerCase();
    if (scheme !== undefined && scheme !== 'file') {
      throw new UnsupportedStorageUriError(modelDir);
    }

    const localPath = path.resolve(scheme === 'file' ? fileURLToPath(modelDir) : modelDir);

    let isDirectory = false;
    try {
      isDirectory = (await stat(localPath)).isDirectory();
    } catch {
      throw new ModelFileError(`Model directory not found: ${localPath}`, 404);
    }
    if (!isDirectory) {
      throw new ModelFileError(`Model path is not a directory: ${localPath}`);
    }

    log.debug({ modelDir, localPath }, 'Located model directory');
    return { type: 'local', path: localPath };
  }
}

/**
 * Reads individual model files (config.json, vocab.txt, ...)
 */
export interface ModelFileReader {
  /** Read a file, throwing ModelFileError if it does not exist */
  readText(location: ResolvedLocation, filename: string, revision?: string): Promise<string>;
  /** Read a file, returning undefined if it does not exist */
  readOptionalText(location: ResolvedLocation, filename: string, revision?: string): Promise<string | undefined>;
}

export interface HubOptions {
  endpoint: string;
  token?: string;
  fetchImpl?: typeof fetch;
}

/**
 * File reader for local directories and HuggingFace Hub repositories
 */
export class DefaultModelFileReader implements ModelFileReader {
  private readonly fetchImpl: typeof fetch;

  constructor(private readonly hub: HubOptions) {
    this.fetchImpl = hub.fetchImpl ?? fetch;
  }

  async readText(location: ResolvedLocation, filename: string, revision?: string): Promise<string> {
    const text = await this.readOptionalText(location, filename, revision);
    if (text === undefined) {
      const where = location.type === 'local' ? location.path : location.modelId;
      throw new ModelFileError(`${filename} not found for ${where}`, 404);
    }
    return text;
  }

  async readOptionalText(location: ResolvedLocation, filename: string, revision?: string): Promise<string | undefined> {
    if (location.type === 'local') {
      return this.readLocal(path.join(location.path, filename));
    }
    return this.readFromHub(location.modelId, filename, revision);
  }

  /**
   * Build the Hub download URL for a file at a revision
   */
  fileUrl(modelId: string, filename: string, revision = 'main'): string {
    return `${this.hub.endpoint}/${modelId}/resolve/${encodeURIComponent(revision)}/${filename}`;
  }

  private async readLocal(filePath: string): Promise<string | undefined> {
    try {
      return await readFile(filePath, 'utf-8');
    } catch (error) {
      if (error instanceof Error && 'code' in error && error.code === 'ENOENT') {
        return undefined;
      }
      throw error;
    }
  }

  private async readFromHub(modelId: string, filename: string, revision?: string): Promise<string | undefined> {
    const url = this.fileUrl(modelId, filename, revision);
    const headers: Record<string, string> = { 'User-Agent': 'transformer-serve' };
    if (this.hub.token) {
      headers['Authorization'] = `Bearer ${this.hub.token}`;
    }

    return withRetry(
      async () => {
        const response = await this.fetchImpl(url, { headers });
        if (response.status === 404) {
          return undefined;
        }
        if (!response.ok) {
          throw new ModelFileError(
            `Failed to fetch ${filename} for ${modelId}: ${response.status} ${response.statusText}`,
            response.status
          );
        }
        return response.text();
      },
      { label: `fetch ${modelId}/${filename}` }
    );
  }
}
