import { Agent } from 'undici';

import { StreamingChatUpdates } from './chat/streaming.js';
import { decodeChatCompletion, decodeEmbeddingResponse } from './chat/updates.js';
import { asError, isConnRefused, makeClientError } from './client/error-utils.js';
import { createLogger, type Logger } from './log.js';
import { ChatTelemetry, type TelemetryOptions } from './telemetry/factory.js';
import type { OperationScope } from './telemetry/scope.js';
import type {
  CallContext,
  ChatCompletionResponse,
  ChatRequest,
  EmbeddingRequest,
  EmbeddingResponse,
} from './types.js';

/** Sends one HTTP request. Defaults to `fetch` over a pooled undici agent. */
export type Transport = (url: string, init: RequestInit) => Promise<Response>;

export type ChatClientOptions = {
  /** Base URL including the API version, e.g. `https://api.example.com/v1`. */
  endpoint: string;
  apiKey?: string;
  /** Model used when a request does not name one. */
  model: string;
  telemetry?: TelemetryOptions;
  verbose?: boolean;
  logger?: Logger;
  transport?: Transport;
};

function isRecord(v: unknown): v is Record<string, unknown> {
  return typeof v === 'object' && v !== null && !Array.isArray(v);
}

function optionalNumber(v: unknown): number | undefined {
  return typeof v === 'number' ? v : undefined;
}

/** The request fields telemetry cares about, read back from a raw body. */
function requestFromBody(body: Record<string, unknown>): ChatRequest {
  return {
    model: typeof body.model === 'string' ? body.model : undefined,
    messages: [],
    maxTokens: optionalNumber(body.max_tokens),
    temperature: optionalNumber(body.temperature),
    topP: optionalNumber(body.top_p),
  };
}

function recordFailure(scope: OperationScope, error: unknown, signal?: AbortSignal): void {
  if (signal?.aborted) scope.recordCancellation();
  else scope.recordException(error);
}

export class ChatClient {
  readonly telemetry: ChatTelemetry;
  private readonly endpoint: string;
  private readonly apiKey?: string;
  private readonly model: string;
  private readonly logger: Logger;
  private readonly transport: Transport;
  private agent: Agent | null = null;
  private cachedHeaders?: Record<string, string>;

  constructor(opts: ChatClientOptions) {
    this.endpoint = opts.endpoint.replace(/\/+$/, '');
    this.apiKey = opts.apiKey;
    this.model = opts.model;
    this.logger = opts.logger ?? createLogger({ verbose: opts.verbose });
    this.telemetry = new ChatTelemetry(opts.model, this.endpoint, {
      logger: this.logger,
      ...opts.telemetry,
    });
    this.transport = opts.transport ?? ((url, init) => this.pooledFetch(url, init));
  }

  /** Unary chat completion. */
  async complete(request: ChatRequest, ctx: CallContext = {}): Promise<ChatCompletionResponse> {
    const scope = this.telemetry.startChat(request, ctx);
    try {
      const res = await this.post('/chat/completions', this.buildBody(request, false), ctx.signal);
      const completion = decodeChatCompletion(await res.text());
      scope.recordChatCompletion(completion);
      return completion;
    } catch (e) {
      recordFailure(scope, e, ctx.signal);
      throw e;
    } finally {
      scope.end();
    }
  }

  /**
   * Protocol-level unary call with a caller-built body. When the call is
   * instrumented here the body is buffered so it can be read for telemetry
   * and the caller receives a response over the buffered copy. With
   * `ctx.instrumented` the response is returned untouched.
   */
  async completeRaw(body: Record<string, unknown>, ctx: CallContext = {}): Promise<Response> {
    if (ctx.instrumented) return this.post('/chat/completions', body, ctx.signal);

    const scope = this.telemetry.startChat(requestFromBody(body), ctx);
    try {
      const res = await this.post('/chat/completions', body, ctx.signal);
      const text = await res.text();
      try {
        scope.recordChatCompletion(decodeChatCompletion(text));
      } catch (e) {
        this.logger.debug(`raw completion body is not a chat completion: ${asError(e).message}`);
        scope.recordException(e);
      }
      return new Response(text.length ? text : null, {
        status: res.status,
        statusText: res.statusText,
        headers: res.headers,
      });
    } catch (e) {
      recordFailure(scope, e, ctx.signal);
      throw e;
    } finally {
      scope.end();
    }
  }

  /**
   * Streaming chat completion. Returns immediately; the request is sent on
   * the first pull from the returned sequence.
   */
  stream(request: ChatRequest, ctx: CallContext = {}): StreamingChatUpdates {
    const scope = this.telemetry.startStreamingChat(request, ctx);
    const body = this.buildBody(request, true);
    // The stream owns the telemetry; the bootstrap call must not start its own.
    return new StreamingChatUpdates(() => this.completeRaw(body, { ...ctx, instrumented: true }), scope, {
      signal: ctx.signal,
      logger: this.logger,
    });
  }

  async embed(request: EmbeddingRequest, ctx: CallContext = {}): Promise<EmbeddingResponse> {
    const scope = this.telemetry.startEmbedding(request, ctx);
    try {
      const body: Record<string, unknown> = {
        model: request.model ?? this.model,
        input: request.input,
        ...(request.dimensions !== undefined ? { dimensions: request.dimensions } : {}),
      };
      const res = await this.post('/embeddings', body, ctx.signal);
      const result = decodeEmbeddingResponse(await res.text());
      scope.recordEmbeddings(result);
      return result;
    } catch (e) {
      recordFailure(scope, e, ctx.signal);
      throw e;
    } finally {
      scope.end();
    }
  }

  /** Release pooled connections. The client can still be used afterwards. */
  async close(): Promise<void> {
    const agent = this.agent;
    this.agent = null;
    await agent?.close();
  }

  private headers(): Record<string, string> {
    if (this.cachedHeaders) return this.cachedHeaders;
    const h: Record<string, string> = {
      'Content-Type': 'application/json',
    };
    if (this.apiKey) h.Authorization = `Bearer ${this.apiKey}`;
    this.cachedHeaders = h;
    return h;
  }

  private buildBody(request: ChatRequest, stream: boolean): Record<string, unknown> {
    const body: Record<string, unknown> = {
      model: request.model ?? this.model,
      messages: request.messages.map((m) => ({ ...m })),
      tools: request.tools?.length ? request.tools : undefined,
      tool_choice: request.toolChoice,
      max_tokens: request.maxTokens,
      temperature: request.temperature,
      top_p: request.topP,
      stream,
      ...request.extra,
    };

    // Ask the server to include usage in the terminal SSE chunk.
    if (stream) {
      const so = isRecord(body.stream_options) ? body.stream_options : {};
      if (so.include_usage === undefined) {
        body.stream_options = { ...so, include_usage: true };
      }
    }

    for (const k of Object.keys(body)) {
      if (body[k] === undefined) delete body[k];
    }
    return body;
  }

  private pooledFetch(url: string, init: RequestInit): Promise<Response> {
    // Reuses TCP+TLS connections across requests.
    this.agent ??= new Agent({
      keepAliveTimeout: 30_000,
      keepAliveMaxTimeout: 120_000,
      connections: 16,
      pipelining: 1,
    });
    return fetch(url, { ...init, dispatcher: this.agent });
  }

  private async post(path: string, body: Record<string, unknown>, signal?: AbortSignal): Promise<Response> {
    const url = `${this.endpoint}${path}`;
    this.logger.debug(`→ POST ${url}`);

    let res: Response;
    try {
      res = await this.transport(url, {
        method: 'POST',
        headers: this.headers(),
        body: JSON.stringify(body),
        signal,
      });
    } catch (e) {
      if (signal?.aborted) throw e;
      if (isConnRefused(e)) {
        throw makeClientError(`Cannot reach ${url} (connection refused)`, undefined, true);
      }
      throw asError(e, `connection failure to ${url}`);
    }

    this.logger.debug(`← ${res.status} ${path}`);
    if (!res.ok) {
      const text = await res.text().catch(() => '');
      throw makeClientError(
        `POST ${path} failed: ${res.status} ${res.statusText}${text ? `\n${text.slice(0, 2000)}` : ''}`,
        res.status,
        res.status === 429 || res.status >= 500
      );
    }
    return res;
  }
}
