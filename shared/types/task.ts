/**
 * ML task types
 */

export const ML_TASKS = [
  'feature_extraction',
  'fill_mask',
  'question_answering',
  'sequence_classification',
  'text_classification',
  'token_classification',
  'summarization',
  'translation',
  'text2text_generation',
  'text_generation',
  'table_question_answering',
  'multiple_choice',
  'text_embedding',
] as const;

export type MLTask = (typeof ML_TASKS)[number];

export interface TaskInfo {
  generative: boolean;           // Produces text via a generation runtime
  supported: boolean;            // Can be served by this server
}

export const TASK_INFO: Record<MLTask, TaskInfo> = {
  feature_extraction: { generative: false, supported: false },
  fill_mask: { generative: false, supported: true },
  question_answering: { generative: false, supported: false },
  sequence_classification: { generative: false, supported: true },
  text_classification: { generative: false, supported: true },
  token_classification: { generative: false, supported: true },
  summarization: { generative: false, supported: false },
  translation: { generative: false, supported: false },
  text2text_generation: { generative: true, supported: true },
  text_generation: { generative: true, supported: true },
  table_question_answering: { generative: false, supported: false },
  multiple_choice: { generative: false, supported: false },
  text_embedding: { generative: false, supported: true },
};

export const SUPPORTED_TASKS: readonly MLTask[] = ML_TASKS.filter((task) => TASK_INFO[task].supported);

export type GenerativeTask = 'text_generation' | 'text2text_generation';
export type EncoderTask = 'fill_mask' | 'sequence_classification' | 'text_classification' | 'token_classification' | 'text_embedding';

export function isMLTask(name: string): name is MLTask {
  return ML_TASKS.some((task) => task === name);
}

export function isGenerativeTask(task: MLTask): task is GenerativeTask {
  return TASK_INFO[task].generative;
}

export function isEncoderTask(task: MLTask): task is EncoderTask {
  return TASK_INFO[task].supported && !TASK_INFO[task].generative;
}
