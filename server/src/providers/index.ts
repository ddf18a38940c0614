import type { ResolvedBackend } from '@transformer-serve/shared';
import type { Provider } from './types';
import { vllmProvider } from './vllm';
import { tgiProvider } from './tgi';
import logger from '../lib/logger';

// Re-export types
export * from './types';

/**
 * Provider Registry
 * One generation provider per resolved backend
 */
export class ProviderRegistry {
  private providers: Map<ResolvedBackend, Provider> = new Map();

  constructor(providers: Provider[] = [vllmProvider, tgiProvider]) {
    for (const provider of providers) {
      this.register(provider);
    }
  }

  /**
   * Register a provider in the registry
   */
  register(provider: Provider): void {
    if (this.providers.has(provider.id)) {
      logger.warn({ providerId: provider.id }, `Provider for '${provider.id}' is already registered. Overwriting.`);
    }
    this.providers.set(provider.id, provider);
  }

  /**
   * Get the provider for a backend
   * @throws Error if no provider is registered
   */
  getProvider(backend: ResolvedBackend): Provider {
    const provider = this.providers.get(backend);
    if (!provider) {
      throw new Error(`No provider registered for backend '${backend}'. Available: ${this.listBackends().join(', ')}`);
    }
    return provider;
  }

  hasProvider(backend: ResolvedBackend): boolean {
    return this.providers.has(backend);
  }

  listBackends(): ResolvedBackend[] {
    return Array.from(this.providers.keys());
  }

  /**
   * Whether the generation engine's executable can be run here
   */
  async isEngineAvailable(): Promise<boolean> {
    const engine = this.providers.get('generation-engine');
    if (!engine) {
      return false;
    }
    const status = await engine.checkInstallation();
    logger.info(
      { provider: engine.name, installed: status.installed, version: status.version },
      status.installed ? `${engine.name} is available` : `${engine.name} is not available`
    );
    return status.installed;
  }
}

// Export singleton registry
export const providerRegistry = new ProviderRegistry();
