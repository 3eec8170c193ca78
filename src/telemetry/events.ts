import type { Span } from '@opentelemetry/api';

import type { ChatContentPart, ChatMessage, ToolCall, UserContent } from '../types.js';
import {
  ASSISTANT_MESSAGE_EVENT,
  EVENT_PAYLOAD_KEY,
  FUNCTION_MESSAGE_EVENT,
  GEN_AI_SYSTEM_KEY,
  GEN_AI_SYSTEM_VALUE,
  REDACTED,
  SYSTEM_MESSAGE_EVENT,
  TOOL_MESSAGE_EVENT,
  USER_MESSAGE_EVENT,
} from './constants.js';

export type SanitizedPart =
  | { type: 'text'; content: string | null }
  | { type: 'image'; detail_level: string | null; content: string | null };

export type SanitizedToolCall = {
  id: string;
  type: 'function';
  function: { name: string; arguments: string | null };
};

export function sanitizeText(text: string | null | undefined, recordContent: boolean): string | null {
  if (text == null) return null;
  return recordContent ? text : REDACTED;
}

export function sanitizeParts(parts: ChatContentPart[], recordContent: boolean): SanitizedPart[] {
  return parts.map((part) =>
    part.kind === 'text'
      ? { type: 'text', content: sanitizeText(part.text, recordContent) }
      : {
          type: 'image',
          detail_level: part.detail ?? null,
          content: sanitizeText(part.imageUrl, recordContent),
        }
  );
}

function userParts(content: UserContent): ChatContentPart[] {
  if (typeof content === 'string') return [{ kind: 'text', text: content }];
  return content.map((part): ChatContentPart =>
    part.type === 'text'
      ? { kind: 'text', text: part.text }
      : {
          kind: 'image',
          imageUrl: part.image_url.url,
          ...(part.image_url.detail ? { detail: part.image_url.detail } : {}),
        }
  );
}

/** Tool calls with their arguments redacted; `null` when there are none. */
export function sanitizeToolCalls(
  calls: ToolCall[] | undefined,
  recordContent: boolean
): SanitizedToolCall[] | null {
  if (!calls?.length) return null;
  return calls.map((call) => ({
    id: call.id,
    type: call.type,
    function: {
      name: call.function.name,
      arguments: sanitizeText(call.function.arguments, recordContent),
    },
  }));
}

/** Event name and payload describing one request message. */
export function messageEvent(
  message: ChatMessage,
  recordContent: boolean
): { name: string; payload: Record<string, unknown> } {
  switch (message.role) {
    case 'system':
      return {
        name: SYSTEM_MESSAGE_EVENT,
        payload: { content: sanitizeText(message.content, recordContent) },
      };
    case 'user':
      return {
        name: USER_MESSAGE_EVENT,
        payload: { content: sanitizeParts(userParts(message.content), recordContent) },
      };
    case 'assistant':
      return {
        name: ASSISTANT_MESSAGE_EVENT,
        payload: {
          content: sanitizeText(message.content, recordContent),
          tool_calls: sanitizeToolCalls(message.tool_calls, recordContent),
        },
      };
    case 'tool':
      return {
        name: TOOL_MESSAGE_EVENT,
        payload: {
          content: sanitizeText(message.content, recordContent),
          tool_call_id: message.tool_call_id,
        },
      };
    case 'function':
      return {
        name: FUNCTION_MESSAGE_EVENT,
        payload: { content: sanitizeText(message.content, recordContent) },
      };
  }
}

export function writeEvent(span: Span, name: string, payload: Record<string, unknown>): void {
  span.addEvent(name, {
    [EVENT_PAYLOAD_KEY]: JSON.stringify(payload),
    [GEN_AI_SYSTEM_KEY]: GEN_AI_SYSTEM_VALUE,
  });
}
