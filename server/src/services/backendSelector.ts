import {
  isGenerativeTask,
  type ArchitectureMetadata,
  type BackendRequest,
  type MLTask,
  type ResolvedBackend,
} from '@transformer-serve/shared';
import engineTable from '../data/engine-architectures.json';
import { BackendUnavailableError } from '../lib/errors';
import { componentLogger } from '../lib/logger';

const log = componentLogger('backend-selector');

const ENGINE_ARCHITECTURES: ReadonlySet<string> = new Set(engineTable.architectures);

/**
 * Architectures the generation engine can run
 */
export function getEngineArchitectures(): string[] {
  return [...ENGINE_ARCHITECTURES];
}

/**
 * The engine-compatible architecture declared by the model, if any
 */
export function findEngineArchitecture(architecture: ArchitectureMetadata): string | undefined {
  return architecture.architectures.find((name) => ENGINE_ARCHITECTURES.has(name));
}

export function isEngineCompatible(architecture: ArchitectureMetadata): boolean {
  return findEngineArchitecture(architecture) !== undefined;
}

export interface BackendSelectionHints {
  /** Resolved task; `auto` only upgrades generative tasks to the engine */
  task?: MLTask;
}

/**
 * Decide the concrete backend.
 *
 * - `standard` is always honored.
 * - `generation-engine` fails when the engine is not installed or cannot run
 *   the architecture; it is never silently replaced.
 * - `auto` upgrades to the engine when it is installed and the architecture is
 *   compatible, and degrades to `standard` otherwise.
 */
export function selectBackend(
  requested: BackendRequest,
  architecture: ArchitectureMetadata,
  engineAvailable: boolean,
  hints: BackendSelectionHints = {}
): ResolvedBackend {
  switch (requested) {
    case 'standard':
      return 'standard';

    case 'generation-engine':
      if (!engineAvailable) {
        throw new BackendUnavailableError('generation-engine');
      }
      if (!isEngineCompatible(architecture)) {
        const declared = architecture.architectures.length > 0 ? architecture.architectures.join(', ') : 'none declared';
        throw new BackendUnavailableError(
          'generation-engine',
          `the generation engine does not support architecture ${declared}`
        );
      }
      return 'generation-engine';

    case 'auto': {
      if (!engineAvailable) {
        log.info('Generation engine not available, using standard backend');
        return 'standard';
      }
      if (!isEngineCompatible(architecture)) {
        log.info({ architectures: architecture.architectures }, 'Architecture not supported by the generation engine, using standard backend');
        return 'standard';
      }
      if (hints.task !== undefined && !isGenerativeTask(hints.task)) {
        log.info({ task: hints.task }, 'Task is not generative, using standard backend');
        return 'standard';
      }
      return 'generation-engine';
    }
  }
}
