import {
  SUPPORTED_TASKS,
  TASK_INFO,
  isMLTask,
  type ArchitectureMetadata,
  type MLTask,
} from '@transformer-serve/shared';
import { TaskInferenceError, UnsupportedTaskError } from '../lib/errors';
import { findEngineArchitecture } from './backendSelector';

/**
 * Architecture class-name suffixes and the task their head implements.
 * Longer suffixes come first so the most specific head wins.
 */
export const ARCHITECTURE_TASK_SUFFIXES: ReadonlyArray<readonly [suffix: string, task: MLTask]> = [
  ['ForSequenceClassification', 'sequence_classification'],
  ['ForConditionalGeneration', 'text2text_generation'],
  ['ForTokenClassification', 'token_classification'],
  ['ForMaskedLM', 'fill_mask'],
  ['LMHeadModel', 'text_generation'],
  ['ForCausalLM', 'text_generation'],
];

/**
 * Look up a task requested by name. Unknown names and known but
 * unsupported tasks are both rejected.
 */
export function parseTaskName(name: string): MLTask {
  if (!isMLTask(name) || !TASK_INFO[name].supported) {
    throw new UnsupportedTaskError(name, SUPPORTED_TASKS);
  }
  return name;
}

/**
 * Infer the task from the declared architectures. The first architecture
 * with a known head decides.
 */
export function inferTaskFromArchitecture(architecture: ArchitectureMetadata): MLTask {
  for (const name of architecture.architectures) {
    const match = ARCHITECTURE_TASK_SUFFIXES.find(([suffix]) => name.endsWith(suffix));
    if (match) {
      return match[1];
    }
  }
  throw new TaskInferenceError(architecture.architectures, findEngineArchitecture(architecture));
}

/**
 * An explicit task always wins over inference
 */
export function resolveTask(explicitTask: string | undefined, architecture: ArchitectureMetadata): MLTask {
  if (explicitTask) {
    return parseTaskName(explicitTask);
  }
  return inferTaskFromArchitecture(architecture);
}
