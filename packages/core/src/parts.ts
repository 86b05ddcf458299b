import type { DataPart, Message, MessageRole, Part, TextPart } from './protocol.js';
import { generateId } from './utils.js';

export function textPart(text: string): TextPart {
  return { kind: 'text', text };
}

export function dataPart(data: Record<string, unknown>): DataPart {
  return { kind: 'data', data };
}

/** Build a message with a fresh `messageId`. */
export function createMessage(
  role: MessageRole,
  parts: Part[],
  ids: { taskId?: string; contextId?: string } = {},
): Message {
  return {
    kind: 'message',
    role,
    parts,
    messageId: generateId(),
    ...(ids.taskId ? { taskId: ids.taskId } : {}),
    ...(ids.contextId ? { contextId: ids.contextId } : {}),
  };
}

/** All text parts joined by newlines. */
export function extractText(message: Pick<Message, 'parts'>): string {
  return message.parts
    .filter((p): p is TextPart => p.kind === 'text')
    .map((p) => p.text)
    .join('\n');
}

/** Payloads of all data parts, in order. */
export function extractData(message: Pick<Message, 'parts'>): Record<string, unknown>[] {
  return message.parts
    .filter((p): p is DataPart => p.kind === 'data')
    .map((p) => p.data);
}
