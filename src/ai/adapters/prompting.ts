import type { z } from 'zod';
import { AdapterError } from '../errors.js';
import type { ChatMessage, PromptContext, QueryInput, QueryParameters } from '../types.js';

const CONTEXT_EXCERPT_LIMIT = 800;

/**
 * Wrap a question in the post it is being asked about.
 * Long posts are cut to an excerpt with a trailing ellipsis.
 */
export function buildContextPrompt(question: string, context: PromptContext): string {
  const excerpt =
    context.content.length > CONTEXT_EXCERPT_LIMIT
      ? `${context.content.slice(0, CONTEXT_EXCERPT_LIMIT)}...`
      : context.content;

  return [
    `You are viewing a post titled: "${context.title ?? 'Untitled'}"`,
    '',
    'Post content excerpt:',
    excerpt,
    '',
    `User question: ${question}`,
    '',
    'Please answer based on the post content above.',
  ].join('\n');
}

export function fenced(code: string, language?: string): string {
  return `\`\`\`${language ?? ''}\n${code}\n\`\`\``;
}

/**
 * Plain text carried by an input, or null for inputs that have none (images).
 * For a conversation this is the latest user turn.
 */
export function inputText(input: QueryInput): string | null {
  if (typeof input === 'string') return input;
  if ('text' in input) return input.text;
  if ('code' in input) return input.code;
  if ('messages' in input) {
    const lastUser = [...input.messages].reverse().find((message) => message.role === 'user');
    return lastUser?.content ?? null;
  }
  return null;
}

/**
 * Chat transcript for a general-purpose model, with the system prompt and
 * post context applied. Null when the input cannot be expressed as chat.
 */
export function buildChatMessages(input: QueryInput, parameters: QueryParameters): ChatMessage[] | null {
  let messages: ChatMessage[];

  if (typeof input === 'string') {
    messages = [{ role: 'user', content: input }];
  } else if ('messages' in input) {
    messages = input.messages.map((message) => ({ ...message }));
  } else if ('text' in input) {
    messages = [{ role: 'user', content: input.text }];
  } else if ('code' in input) {
    messages = [{ role: 'user', content: fenced(input.code, input.language) }];
  } else {
    return null;
  }

  if (parameters.context) {
    for (let i = messages.length - 1; i >= 0; i--) {
      const message = messages[i];
      if (message && message.role === 'user') {
        messages[i] = { role: 'user', content: buildContextPrompt(message.content, parameters.context) };
        break;
      }
    }
  }

  if (parameters.system && !messages.some((message) => message.role === 'system')) {
    messages.unshift({ role: 'system', content: parameters.system });
  }

  return messages;
}

/**
 * Parse a model's JSON reply against the shape the adapter expects.
 */
export function parseJsonReply<S extends z.ZodTypeAny>(raw: string, shape: S, backend: string): z.output<S> {
  let data: unknown;
  try {
    data = JSON.parse(raw);
  } catch (error) {
    throw new AdapterError('malformed_response', `${backend} did not return JSON`, error);
  }

  const parsed = shape.safeParse(data);
  if (!parsed.success) {
    const issues = parsed.error.issues.map((issue) => `${issue.path.join('.') || '(root)'}: ${issue.message}`);
    throw new AdapterError('malformed_response', `${backend} returned an unexpected shape: ${issues.join('; ')}`);
  }
  return parsed.data;
}
