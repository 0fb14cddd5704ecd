import type { Message, MessageMetadata, MessageRole, MetadataValue } from './types.js';

import { ConfigError } from './errors.js';
import { stableStringify } from './utils.js';

export interface MessageOptions {
  metadata?: Record<string, MetadataValue>;
  toolCallId?: string;
}

const deepFreeze = <T>(value: T): T => {
  if (value !== null && typeof value === 'object') {
    Object.values(value).forEach((nested) => { deepFreeze(nested); });
    Object.freeze(value);
  }
  return value;
};

/**
 * Build an immutable message. User and system turns must carry content;
 * tool turns must name the call they answer. Empty assistant content is
 * accepted here (a placeholder while a provider call is pending) but
 * rejected by the run history.
 */
export function createMessage(role: MessageRole, content: string, opts: MessageOptions = {}): Message {
  if ((role === 'user' || role === 'system') && content.trim().length === 0) {
    throw new ConfigError(`${role} message content cannot be empty`, { field: 'content' });
  }
  if (role === 'tool' && (opts.toolCallId === undefined || opts.toolCallId.length === 0)) {
    throw new ConfigError('tool message requires a tool call id', { field: 'toolCallId' });
  }
  // nested values are copied and frozen too
  const metadata: MessageMetadata = deepFreeze(structuredClone(opts.metadata ?? {}));
  const message: Message = opts.toolCallId !== undefined
    ? { role, content, metadata, toolCallId: opts.toolCallId }
    : { role, content, metadata };
  return Object.freeze(message);
}

export const systemMessage = (content: string, metadata?: Record<string, MetadataValue>): Message =>
  createMessage('system', content, { metadata });

export const userMessage = (content: string, metadata?: Record<string, MetadataValue>): Message =>
  createMessage('user', content, { metadata });

export const assistantMessage = (content: string, metadata?: Record<string, MetadataValue>): Message =>
  createMessage('assistant', content, { metadata });

export const toolMessage = (content: string, toolCallId: string, metadata?: Record<string, MetadataValue>): Message =>
  createMessage('tool', content, { metadata, toolCallId });

/** Corrections are new messages: returns a copy with the metadata patch applied. */
export function withMetadata(message: Message, patch: Record<string, MetadataValue>): Message {
  return createMessage(message.role, message.content, {
    metadata: { ...message.metadata, ...patch },
    toolCallId: message.toolCallId,
  });
}

export function getMetadata(message: Message, key: string): MetadataValue | undefined {
  return Object.prototype.hasOwnProperty.call(message.metadata, key) ? message.metadata[key] : undefined;
}

/** Identity is role + content + metadata. */
export function messagesEqual(a: Message, b: Message): boolean {
  return a.role === b.role
    && a.content === b.content
    && stableStringify(a.metadata) === stableStringify(b.metadata);
}

export interface ProviderPayloadEntry {
  role: MessageRole;
  content: string;
  toolCallId?: string;
}

export function toProviderPayload(messages: readonly Message[]): ProviderPayloadEntry[] {
  return messages.map((message) => (
    message.toolCallId !== undefined
      ? { role: message.role, content: message.content, toolCallId: message.toolCallId }
      : { role: message.role, content: message.content }
  ));
}

export function lastMessages(messages: readonly Message[], count: number): Message[] {
  if (count <= 0) return [];
  return messages.slice(-count);
}

export function messagesByRole(messages: readonly Message[], role: MessageRole): Message[] {
  return messages.filter((message) => message.role === role);
}

/** Messages whose metadata has `key`, optionally equal to `value`. */
export function messagesWithMetadata(messages: readonly Message[], key: string, value?: MetadataValue): Message[] {
  return messages.filter((message) => {
    const current = getMetadata(message, key);
    if (current === undefined) return false;
    return value === undefined || stableStringify(current) === stableStringify(value);
  });
}

/** Case-insensitive search over content, or over one metadata key when given. */
export function searchMessages(messages: readonly Message[], query: string, metadataKey?: string): Message[] {
  const needle = query.toLowerCase();
  return messages.filter((message) => {
    if (metadataKey === undefined) return message.content.toLowerCase().includes(needle);
    const value = getMetadata(message, metadataKey);
    if (value === undefined || value === null) return false;
    const haystack = typeof value === 'string' ? value : stableStringify(value);
    return haystack.toLowerCase().includes(needle);
  });
}

/**
 * For providers without a native system role: system turns become user turns,
 * tagged so the origin stays visible.
 */
export function demoteSystemMessages(messages: readonly Message[]): Message[] {
  return messages.map((message) => (
    message.role === 'system'
      ? createMessage('user', message.content, { metadata: { ...message.metadata, demotedFrom: 'system' } })
      : message
  ));
}

/** Throws ConfigError when stamped timestamps go backwards. */
export function validateMessageChain(messages: readonly Message[]): void {
  let previous: string | undefined;
  messages.forEach((message, index) => {
    const stamp = getMetadata(message, 'timestamp');
    if (typeof stamp !== 'string') return;
    if (previous !== undefined && stamp < previous) {
      throw new ConfigError(`message ${String(index)} is out of chronological order`, { field: 'messages' });
    }
    previous = stamp;
  });
}
