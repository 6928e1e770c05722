import { type JsonObject } from './json';

export type ChatRole = 'user' | 'assistant';

export interface ChatMessage {
  readonly role    : ChatRole;
  readonly content : string;
  /** Fields found on a persisted record that this version does not model. */
  readonly extra?  : Readonly<JsonObject>;
}

export function createChatMessage(role: ChatRole, content: string, extra?: JsonObject): ChatMessage {
  const message: ChatMessage = extra && Object.keys(extra).length > 0
    ? { role, content, extra: Object.freeze({ ...extra }) }
    : { role, content };
  return Object.freeze(message);
}

export const userMessage = (content: string): ChatMessage => createChatMessage('user', content);
export const assistantMessage = (content: string): ChatMessage => createChatMessage('assistant', content);

/**
 * Persisted shape of a message. Unknown fields go first so `role` and
 * `content` always reflect the message itself.
 */
export function serializeChatMessage(message: ChatMessage): JsonObject {
  return { ...(message.extra ?? {}), role: message.role, content: message.content };
}
