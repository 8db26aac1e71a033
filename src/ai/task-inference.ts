import { type QueryInput, TASK_TYPES, type TaskType } from './types.js';

/**
 * Default task type implied by the shape of the input, used when the caller
 * gives no hint. Free text and conversations are chat.
 */
export function inferTaskType(input: QueryInput): TaskType {
  if (typeof input === 'string') return TASK_TYPES.CHAT;
  if ('messages' in input) return TASK_TYPES.CHAT;
  if ('image' in input) return TASK_TYPES.VISION;
  if ('code' in input) return TASK_TYPES.CODE_ANALYSIS;
  return TASK_TYPES.CLASSIFY;
}

/** Short name of an input's shape, for error messages. */
export function describeInput(input: QueryInput): string {
  if (typeof input === 'string') return 'text';
  if ('messages' in input) return 'conversation';
  if ('image' in input) return 'image';
  if ('code' in input) return 'code';
  return 'text';
}
