import { metrics, trace, ValueType, type Meter, type Tracer } from '@opentelemetry/api';

import { noopLogger, type Logger } from '../log.js';
import type { CallContext, ChatRequest, EmbeddingRequest } from '../types.js';
import {
  INSTRUMENTATION_NAME,
  OPERATION_DURATION_METRIC,
  STREAMS_COMPLETED_METRIC,
  STREAMS_STARTED_METRIC,
  TOKEN_USAGE_METRIC,
  type OperationName,
} from './constants.js';
import {
  TracedOperationScope,
  disabledScope,
  type Instruments,
  type OperationScope,
  type ReportHook,
  type ScopeRequest,
} from './scope.js';
import { StreamingScope } from './streaming-scope.js';

export type TelemetryOptions = {
  /** Default true. When false every scope is a no-op. */
  enabled?: boolean;
  /** Write per-message and per-choice span events. */
  recordEvents?: boolean;
  /** Keep message text, image URLs and tool arguments in events instead of `REDACTED`. */
  recordContent?: boolean;
  /** Defaults to the globally registered tracer provider. */
  tracer?: Tracer;
  /** Defaults to the globally registered meter provider. */
  meter?: Meter;
  onReport?: ReportHook;
  logger?: Logger;
};

function defaultPort(url: URL): number {
  if (url.port) return Number(url.port);
  return url.protocol === 'https:' ? 443 : 80;
}

function createInstruments(meter: Meter): Instruments {
  return {
    duration: meter.createHistogram(OPERATION_DURATION_METRIC, {
      unit: 's',
      description: 'Measures GenAI operation duration.',
    }),
    tokens: meter.createHistogram(TOKEN_USAGE_METRIC, {
      unit: '{token}',
      description: 'Measures the number of input and output tokens used.',
      valueType: ValueType.INT,
    }),
    streamsStarted: meter.createCounter(STREAMS_STARTED_METRIC, {
      unit: '{stream}',
      description: 'Measures the number of started streaming calls.',
    }),
    streamsCompleted: meter.createCounter(STREAMS_COMPLETED_METRIC, {
      unit: '{stream}',
      description: 'Measures the number of completed streaming calls.',
    }),
  };
}

/** Starts telemetry scopes for calls made against one endpoint. */
export class ChatTelemetry {
  readonly serverAddress: string;
  readonly serverPort: number;
  readonly enabled: boolean;
  private readonly recordEvents: boolean;
  private readonly recordContent: boolean;
  private readonly tracer: Tracer;
  private readonly instruments: Instruments;
  private readonly logger: Logger;
  private readonly onReport?: ReportHook;

  constructor(
    private readonly model: string,
    endpoint: string | URL,
    opts: TelemetryOptions = {}
  ) {
    const url = new URL(endpoint);
    this.serverAddress = url.hostname;
    this.serverPort = defaultPort(url);
    this.enabled = opts.enabled !== false;
    this.recordEvents = opts.recordEvents === true;
    this.recordContent = opts.recordContent === true;
    this.tracer = opts.tracer ?? trace.getTracer(INSTRUMENTATION_NAME);
    this.instruments = createInstruments(opts.meter ?? metrics.getMeter(INSTRUMENTATION_NAME));
    this.logger = opts.logger ?? noopLogger;
    this.onReport = opts.onReport;
  }

  startChat(request: ChatRequest, ctx: CallContext = {}): OperationScope {
    return this.start('chat', request.model, request, ctx);
  }

  startEmbedding(request: EmbeddingRequest, ctx: CallContext = {}): OperationScope {
    return this.start('embedding', request.model, {}, ctx);
  }

  /** Starts a chat scope that also counts as a started stream. */
  startStreamingChat(request: ChatRequest, ctx: CallContext = {}): StreamingScope {
    return new StreamingScope(this.start('chat', request.model, request, ctx, true), this.logger);
  }

  private start(
    operation: OperationName,
    model: string | undefined,
    request: ScopeRequest,
    ctx: CallContext,
    streaming = false
  ): OperationScope {
    // An outer call already owns the telemetry for this request.
    if (!this.enabled || ctx.instrumented) return disabledScope;
    return new TracedOperationScope(
      {
        operation,
        requestModel: model ?? this.model,
        serverAddress: this.serverAddress,
        serverPort: this.serverPort,
        recordEvents: this.recordEvents,
        recordContent: this.recordContent,
        tracer: this.tracer,
        instruments: this.instruments,
        logger: this.logger,
        onReport: this.onReport,
      },
      request,
      streaming
    );
  }
}
