/**
 * Decoding of chat completion payloads (one SSE frame, or a buffered unary
 * body) into typed records. Decoding is lenient: a field with an unexpected
 * shape is dropped rather than failing the whole payload.
 */

import { z } from 'zod';

import type { LogFn } from '../log.js';
import type {
  ChatCompletionResponse,
  ChatContentPart,
  EmbeddingResponse,
  StreamingChatUpdate,
  TokenUsage,
  ToolCallUpdate,
  WireUsage,
} from '../types.js';

function lenient<T extends z.ZodTypeAny>(schema: T) {
  return schema.nullish().catch(undefined);
}

/** Array whose malformed elements are skipped instead of rejecting the array. */
function lenientArray<T extends z.ZodTypeAny>(item: T) {
  return z
    .array(z.unknown())
    .transform((items) => {
      const out: z.infer<T>[] = [];
      for (const raw of items) {
        const parsed = item.safeParse(raw);
        if (parsed.success) out.push(parsed.data);
      }
      return out;
    })
    .nullish()
    .catch(undefined);
}

const roleSchema = z.enum(['system', 'user', 'assistant', 'tool', 'function']);

const usageSchema = z.object({
  prompt_tokens: lenient(z.number()),
  completion_tokens: lenient(z.number()),
  total_tokens: lenient(z.number()),
});

const contentPartSchema = z.discriminatedUnion('type', [
  z.object({ type: z.literal('text'), text: z.string() }),
  z.object({
    type: z.literal('image_url'),
    image_url: z.object({
      url: z.string(),
      detail: lenient(z.enum(['auto', 'low', 'high'])),
    }),
  }),
]);

/** Tool-call positions are backfilled up to the highest index seen. */
export const MAX_TOOL_CALL_INDEX = 255;

const toolCallDeltaSchema = z.object({
  index: z.number().int().nonnegative().max(MAX_TOOL_CALL_INDEX),
  id: lenient(z.string()),
  function: lenient(
    z.object({
      name: lenient(z.string()),
      arguments: lenient(z.string()),
    })
  ),
});

const deltaSchema = z.object({
  role: lenient(roleSchema),
  content: z.union([z.string(), lenientArray(contentPartSchema)]).nullish().catch(undefined),
  refusal: lenient(z.string()),
  tool_calls: lenientArray(toolCallDeltaSchema),
});

const streamChoiceSchema = z.object({
  index: z.number().int().nonnegative().catch(0),
  delta: lenient(deltaSchema),
  finish_reason: lenient(z.string()),
});

const streamChunkSchema = z.object({
  id: lenient(z.string()),
  model: lenient(z.string()),
  created: lenient(z.number()),
  system_fingerprint: lenient(z.string()),
  choices: lenientArray(streamChoiceSchema),
  usage: lenient(usageSchema),
});

export function toTokenUsage(usage: WireUsage): TokenUsage {
  const inputTokens = usage.prompt_tokens ?? 0;
  const outputTokens = usage.completion_tokens ?? 0;
  return {
    inputTokens,
    outputTokens,
    totalTokens: usage.total_tokens ?? inputTokens + outputTokens,
  };
}

type WireContent = z.infer<typeof deltaSchema>['content'];

function toContentParts(content: WireContent): ChatContentPart[] | undefined {
  if (content == null) return undefined;
  if (typeof content === 'string') return [{ kind: 'text', text: content }];
  return content.map((part): ChatContentPart => {
    if (part.type === 'text') return { kind: 'text', text: part.text };
    return {
      kind: 'image',
      imageUrl: part.image_url.url,
      ...(part.image_url.detail != null ? { detail: part.image_url.detail } : {}),
    };
  });
}

type WireToolCallDelta = z.infer<typeof toolCallDeltaSchema>;

function toToolCallUpdate(tc: WireToolCallDelta): ToolCallUpdate {
  return {
    index: tc.index,
    ...(tc.id != null ? { id: tc.id } : {}),
    ...(tc.function?.name != null ? { functionName: tc.function.name } : {}),
    ...(tc.function?.arguments != null ? { argumentsUpdate: tc.function.arguments } : {}),
  };
}

/**
 * Decode one SSE data payload into zero or more updates: one per choice, or a
 * single response-level update when the chunk carries no choices (e.g. the
 * usage-only terminal chunk). Non-JSON payloads decode to nothing.
 */
export function decodeStreamingUpdates(data: string, log?: LogFn): StreamingChatUpdate[] {
  let json: unknown;
  try {
    json = JSON.parse(data);
  } catch {
    log?.(`skipping non-JSON stream payload: ${data.slice(0, 100)}`);
    return [];
  }

  const parsed = streamChunkSchema.safeParse(json);
  if (!parsed.success) {
    log?.(`skipping stream payload that is not an object: ${data.slice(0, 100)}`);
    return [];
  }
  const chunk = parsed.data;

  const base: StreamingChatUpdate = {
    ...(chunk.id != null ? { id: chunk.id } : {}),
    ...(chunk.model != null ? { model: chunk.model } : {}),
    ...(chunk.created != null ? { created: chunk.created } : {}),
    ...(chunk.system_fingerprint != null ? { systemFingerprint: chunk.system_fingerprint } : {}),
    ...(chunk.usage != null ? { usage: toTokenUsage(compactUsage(chunk.usage)) } : {}),
  };

  if (!chunk.choices?.length) return [base];

  return chunk.choices.map((choice): StreamingChatUpdate => {
    const delta = choice.delta;
    const content = toContentParts(delta?.content);
    const toolCalls = delta?.tool_calls?.map(toToolCallUpdate);
    return {
      ...base,
      choiceIndex: choice.index,
      ...(delta?.role != null ? { role: delta.role } : {}),
      ...(content ? { contentUpdate: content } : {}),
      ...(delta?.refusal != null ? { refusalUpdate: delta.refusal } : {}),
      ...(toolCalls?.length ? { toolCallUpdates: toolCalls } : {}),
      ...(choice.finish_reason != null ? { finishReason: choice.finish_reason } : {}),
    };
  });
}

// ── Buffered bodies ─────────────────────────────────────────────────────

const toolCallSchema = z.object({
  id: z.string().catch(''),
  type: z.literal('function').catch('function'),
  function: z.object({
    name: z.string().catch(''),
    arguments: z.string().catch(''),
  }),
});

const completionSchema = z.object({
  id: lenient(z.string()),
  model: lenient(z.string()),
  created: lenient(z.number()),
  system_fingerprint: lenient(z.string()),
  choices: lenientArray(
    z.object({
      index: z.number().int().nonnegative().catch(0),
      message: lenient(
        z.object({
          role: lenient(roleSchema),
          content: lenient(z.string()),
          refusal: lenient(z.string()),
          tool_calls: lenientArray(toolCallSchema),
        })
      ),
      finish_reason: lenient(z.string()),
    })
  ),
  usage: lenient(usageSchema),
});

const embeddingSchema = z.object({
  model: lenient(z.string()),
  data: lenientArray(
    z.object({
      index: z.number().int().nonnegative().catch(0),
      embedding: z.array(z.number()).catch([]),
    })
  ),
  usage: lenient(usageSchema),
});

function compactUsage(usage: z.infer<typeof usageSchema>): WireUsage {
  return {
    ...(usage.prompt_tokens != null ? { prompt_tokens: usage.prompt_tokens } : {}),
    ...(usage.completion_tokens != null ? { completion_tokens: usage.completion_tokens } : {}),
    ...(usage.total_tokens != null ? { total_tokens: usage.total_tokens } : {}),
  };
}

/** Decode a buffered chat completion body. Throws on invalid JSON. */
export function decodeChatCompletion(text: string): ChatCompletionResponse {
  const raw: unknown = JSON.parse(text);
  const parsed = completionSchema.parse(raw);
  return {
    ...(parsed.id != null ? { id: parsed.id } : {}),
    ...(parsed.model != null ? { model: parsed.model } : {}),
    ...(parsed.created != null ? { created: parsed.created } : {}),
    ...(parsed.system_fingerprint != null ? { system_fingerprint: parsed.system_fingerprint } : {}),
    choices: (parsed.choices ?? []).map((c) => ({
      index: c.index,
      ...(c.message != null
        ? {
            message: {
              ...(c.message.role != null ? { role: c.message.role } : {}),
              content: c.message.content ?? null,
              ...(c.message.refusal != null ? { refusal: c.message.refusal } : {}),
              ...(c.message.tool_calls?.length ? { tool_calls: c.message.tool_calls } : {}),
            },
          }
        : {}),
      finish_reason: c.finish_reason ?? null,
    })),
    ...(parsed.usage != null ? { usage: compactUsage(parsed.usage) } : {}),
  };
}

/** Decode a buffered embeddings body. Throws on invalid JSON. */
export function decodeEmbeddingResponse(text: string): EmbeddingResponse {
  const raw: unknown = JSON.parse(text);
  const parsed = embeddingSchema.parse(raw);
  return {
    ...(parsed.model != null ? { model: parsed.model } : {}),
    data: parsed.data ?? [],
    ...(parsed.usage != null ? { usage: compactUsage(parsed.usage) } : {}),
  };
}
