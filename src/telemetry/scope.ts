import {
  SpanKind,
  SpanStatusCode,
  type AttributeValue,
  type Attributes,
  type Counter,
  type Histogram,
  type Span,
  type Tracer,
} from '@opentelemetry/api';

import { GENERIC_ERROR_TYPE, CANCELLED_ERROR_TYPE, asError, classifyError } from '../client/error-utils.js';
import type { Logger } from '../log.js';
import type {
  ChatCompletionResponse,
  ChatMessage,
  EmbeddingResponse,
  StreamingCompletionSummary,
} from '../types.js';
import {
  CHOICE_EVENT,
  ERROR_TYPE_KEY,
  GEN_AI_OPERATION_NAME_KEY,
  GEN_AI_REQUEST_MAX_TOKENS_KEY,
  GEN_AI_REQUEST_MODEL_KEY,
  GEN_AI_REQUEST_TEMPERATURE_KEY,
  GEN_AI_REQUEST_TOP_P_KEY,
  GEN_AI_RESPONSE_FINISH_REASONS_KEY,
  GEN_AI_RESPONSE_ID_KEY,
  GEN_AI_RESPONSE_MODEL_KEY,
  GEN_AI_SYSTEM_KEY,
  GEN_AI_SYSTEM_VALUE,
  GEN_AI_TOKEN_TYPE_KEY,
  GEN_AI_USAGE_INPUT_TOKENS_KEY,
  GEN_AI_USAGE_OUTPUT_TOKENS_KEY,
  SERVER_ADDRESS_KEY,
  SERVER_PORT_KEY,
  type OperationName,
} from './constants.js';
import { messageEvent, sanitizeParts, sanitizeToolCalls, writeEvent } from './events.js';

/** What a finished call looked like, handed to `onReport` once per call. */
export type CallReport = {
  operation: OperationName;
  streaming: boolean;
  requestModel: string;
  responseId: string | null;
  responseModel: string | null;
  finishReasons: string[];
  inputTokens: number | null;
  outputTokens: number | null;
  errorType: string | null;
  durationMs: number;
  /** Aggregated result, streaming calls only. */
  summary?: StreamingCompletionSummary;
};

export type ReportHook = (report: CallReport) => void | Promise<void>;

export type Instruments = {
  duration: Histogram;
  tokens: Histogram;
  streamsStarted: Counter;
  streamsCompleted: Counter;
};

export type ScopeSettings = {
  operation: OperationName;
  requestModel: string;
  serverAddress: string;
  serverPort: number;
  recordEvents: boolean;
  recordContent: boolean;
  tracer: Tracer;
  instruments: Instruments;
  logger: Logger;
  onReport?: ReportHook;
};

/** Request fields that end up on the span. */
export type ScopeRequest = {
  maxTokens?: number;
  temperature?: number;
  topP?: number;
  messages?: ChatMessage[];
};

/** Telemetry for one logical call. `end()` may be called any number of times. */
export interface OperationScope {
  recordChatCompletion(completion: ChatCompletionResponse): void;
  recordEmbeddings(result: EmbeddingResponse): void;
  recordStreamingCompletion(summary: StreamingCompletionSummary): void;
  recordException(error: unknown): void;
  recordCancellation(): void;
  end(): void;
}

export const disabledScope: OperationScope = {
  recordChatCompletion: () => {},
  recordEmbeddings: () => {},
  recordStreamingCompletion: () => {},
  recordException: () => {},
  recordCancellation: () => {},
  end: () => {},
};

type Override = readonly [key: string, value: AttributeValue | null | undefined];

/** Copy of `base` with the non-null overrides applied. */
export function withOverrides(base: Readonly<Attributes>, overrides: readonly Override[]): Attributes {
  const out: Attributes = { ...base };
  for (const [key, value] of overrides) {
    if (value != null) out[key] = value;
  }
  return out;
}

export class TracedOperationScope implements OperationScope {
  private readonly startedAt = performance.now();
  private readonly base: Readonly<Attributes>;
  private readonly span: Span;

  private responseId: string | null = null;
  private responseModel: string | null = null;
  private finishReasons: string[] = [];
  private inputTokens: number | null = null;
  private outputTokens: number | null = null;
  private errorType: string | null = null;
  private error: Error | null = null;
  private summary: StreamingCompletionSummary | undefined;
  private ended = false;

  constructor(
    private readonly settings: ScopeSettings,
    request: ScopeRequest,
    private readonly streaming = false
  ) {
    this.base = Object.freeze({
      [GEN_AI_SYSTEM_KEY]: GEN_AI_SYSTEM_VALUE,
      [GEN_AI_REQUEST_MODEL_KEY]: settings.requestModel,
      [SERVER_ADDRESS_KEY]: settings.serverAddress,
      [SERVER_PORT_KEY]: settings.serverPort,
      [GEN_AI_OPERATION_NAME_KEY]: settings.operation,
    });

    this.span = settings.tracer.startSpan(`${settings.operation} ${settings.requestModel}`, {
      kind: SpanKind.CLIENT,
      attributes: withOverrides(this.base, [
        [GEN_AI_REQUEST_MAX_TOKENS_KEY, request.maxTokens],
        [GEN_AI_REQUEST_TEMPERATURE_KEY, request.temperature],
        [GEN_AI_REQUEST_TOP_P_KEY, request.topP],
      ]),
    });

    if (settings.recordEvents && request.messages && this.span.isRecording()) {
      for (const message of request.messages) {
        const { name, payload } = messageEvent(message, settings.recordContent);
        writeEvent(this.span, name, payload);
      }
    }

    if (streaming) settings.instruments.streamsStarted.add(1, this.base);
  }

  recordChatCompletion(completion: ChatCompletionResponse): void {
    this.responseId = completion.id ?? null;
    this.responseModel = completion.model ?? null;
    this.finishReasons = completion.choices.flatMap((c) => (c.finish_reason ? [c.finish_reason] : []));
    this.inputTokens = completion.usage?.prompt_tokens ?? null;
    this.outputTokens = completion.usage?.completion_tokens ?? null;

    if (!this.settings.recordEvents || !this.span.isRecording()) return;
    const rc = this.settings.recordContent;
    for (const choice of completion.choices) {
      const text = choice.message?.content;
      writeEvent(this.span, CHOICE_EVENT, {
        index: choice.index,
        finish_reason: choice.finish_reason ?? null,
        message: {
          role: choice.message?.role ?? null,
          content: text != null ? sanitizeParts([{ kind: 'text', text }], rc) : null,
          tool_calls: sanitizeToolCalls(choice.message?.tool_calls, rc),
        },
      });
    }
  }

  recordEmbeddings(result: EmbeddingResponse): void {
    this.responseModel = result.model ?? null;
    this.inputTokens = result.usage?.prompt_tokens ?? null;
  }

  recordStreamingCompletion(summary: StreamingCompletionSummary): void {
    this.summary = summary;
    this.responseId = summary.responseId;
    this.responseModel = summary.responseModel;
    this.finishReasons = summary.finishReason ? [summary.finishReason] : [];
    this.inputTokens = summary.usage?.inputTokens ?? null;
    this.outputTokens = summary.usage?.outputTokens ?? null;

    if (this.settings.recordEvents && this.span.isRecording()) {
      const rc = this.settings.recordContent;
      writeEvent(this.span, CHOICE_EVENT, {
        index: 0,
        finish_reason: summary.finishReason,
        message: {
          role: summary.role,
          content: sanitizeParts([summary.content], rc),
          tool_calls: sanitizeToolCalls(summary.toolCalls, rc),
        },
      });
    }

    this.settings.instruments.streamsCompleted.add(1, this.base);
  }

  recordException(error: unknown): void {
    this.errorType = classifyError(error);
    this.error = asError(error);
  }

  recordCancellation(): void {
    this.errorType = CANCELLED_ERROR_TYPE;
  }

  end(): void {
    if (this.ended) return;
    this.ended = true;

    // A chat call that produced no finish reason and no error did not
    // receive a complete response.
    if (this.settings.operation === 'chat' && !this.finishReasons.length && this.errorType == null) {
      this.errorType = GENERIC_ERROR_TYPE;
    }

    const durationMs = performance.now() - this.startedAt;
    try {
      this.emit(durationMs);
    } catch (e) {
      this.settings.logger.warn(`telemetry emission failed: ${asError(e).message}`);
    }

    this.report({
      operation: this.settings.operation,
      streaming: this.streaming,
      requestModel: this.settings.requestModel,
      responseId: this.responseId,
      responseModel: this.responseModel,
      finishReasons: this.finishReasons,
      inputTokens: this.inputTokens,
      outputTokens: this.outputTokens,
      errorType: this.errorType,
      durationMs,
      ...(this.summary ? { summary: this.summary } : {}),
    });
  }

  private emit(durationMs: number): void {
    const span = this.span;
    try {
      if (this.responseId != null) span.setAttribute(GEN_AI_RESPONSE_ID_KEY, this.responseId);
      if (this.responseModel != null) span.setAttribute(GEN_AI_RESPONSE_MODEL_KEY, this.responseModel);
      if (this.finishReasons.length) {
        span.setAttribute(GEN_AI_RESPONSE_FINISH_REASONS_KEY, this.finishReasons);
      }
      if (this.inputTokens != null) span.setAttribute(GEN_AI_USAGE_INPUT_TOKENS_KEY, this.inputTokens);
      if (this.outputTokens != null) span.setAttribute(GEN_AI_USAGE_OUTPUT_TOKENS_KEY, this.outputTokens);
      if (this.errorType != null) {
        span.setAttribute(ERROR_TYPE_KEY, this.errorType);
        if (this.error) span.recordException(this.error);
        span.setStatus({ code: SpanStatusCode.ERROR, message: this.error?.message ?? this.errorType });
      }

      const tags = withOverrides(this.base, [
        [GEN_AI_RESPONSE_MODEL_KEY, this.responseModel],
        [ERROR_TYPE_KEY, this.errorType],
      ]);
      const { duration, tokens } = this.settings.instruments;
      duration.record(durationMs / 1000, tags);
      if (this.inputTokens != null) {
        tokens.record(this.inputTokens, withOverrides(tags, [[GEN_AI_TOKEN_TYPE_KEY, 'input']]));
      }
      if (this.outputTokens != null) {
        tokens.record(this.outputTokens, withOverrides(tags, [[GEN_AI_TOKEN_TYPE_KEY, 'output']]));
      }
    } finally {
      span.end();
    }
  }

  private report(report: CallReport): void {
    const hook = this.settings.onReport;
    if (!hook) return;
    const warn = (e: unknown) =>
      this.settings.logger.warn(`onReport hook failed: ${asError(e).message}`);
    try {
      const pending = hook(report);
      if (pending) void pending.catch(warn);
    } catch (e) {
      warn(e);
    }
  }
}
