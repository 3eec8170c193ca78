import { asError } from '../client/error-utils.js';
import { noopLogger, type Logger } from '../log.js';
import type {
  ChatContentPart,
  FinalizeCause,
  ImageDetail,
  Role,
  StreamingChatUpdate,
  StreamingCompletionSummary,
  TokenUsage,
  ToolCall,
  ToolCallUpdate,
} from '../types.js';
import type { OperationScope } from './scope.js';

class ContentBuffer {
  private kind: ChatContentPart['kind'] = 'text';
  private imageUrl: string | null = null;
  private detail: ImageDetail | null = null;
  private readonly text: string[] = [];

  add(part: ChatContentPart): void {
    if (part.kind === 'image') {
      // Once an image is seen the content stays an image.
      this.kind = 'image';
      this.imageUrl = part.imageUrl;
      if (part.detail) this.detail = part.detail;
      return;
    }
    this.text.push(part.text);
  }

  toContent(): ChatContentPart {
    if (this.kind === 'image') {
      return {
        kind: 'image',
        imageUrl: this.imageUrl ?? '',
        ...(this.detail ? { detail: this.detail } : {}),
      };
    }
    return { kind: 'text', text: this.text.join('') };
  }
}

class ToolCallBuffer {
  private id: string | null = null;
  private name: string | null = null;
  private args: string[] | null = null;

  add(update: ToolCallUpdate): void {
    if (update.id != null) this.id = update.id;
    if (update.functionName != null) this.name = update.functionName;
    if (update.argumentsUpdate != null) (this.args ??= []).push(update.argumentsUpdate);
  }

  toCall(): ToolCall {
    return {
      id: this.id ?? '',
      type: 'function',
      function: { name: this.name ?? '', arguments: this.args?.join('') ?? '' },
    };
  }
}

/**
 * Accumulates the updates of one streaming call and reports the aggregate
 * exactly once, whichever of completion, failure, cancellation or disposal
 * happens first.
 */
export class StreamingScope {
  private responseId: string | null = null;
  private responseModel: string | null = null;
  private role: Role | null = null;
  private finishReason: string | null = null;
  private usage: TokenUsage | null = null;
  private readonly content = new ContentBuffer();
  private readonly tools: ToolCallBuffer[] = [];
  private reported = false;

  constructor(
    private readonly scope: OperationScope,
    private readonly logger: Logger = noopLogger
  ) {}

  get finalized(): boolean {
    return this.reported;
  }

  accumulate(update: StreamingChatUpdate): void {
    if (update.model != null) this.responseModel = update.model;
    if (update.id != null) this.responseId = update.id;
    if (update.role != null) this.role = update.role;
    for (const part of update.contentUpdate ?? []) this.content.add(part);
    for (const tc of update.toolCallUpdates ?? []) this.toolBuffer(tc.index).add(tc);
    if (update.finishReason != null) this.finishReason = update.finishReason;
    if (update.usage != null) this.usage = update.usage;
  }

  /** Report and close the scope. Returns false when it was already finalized. */
  finalize(cause: FinalizeCause): boolean {
    // Test-and-set happens before any await point, so an abort listener and
    // the consuming loop cannot both get past it.
    if (this.reported) return false;
    this.reported = true;

    try {
      if (cause.kind === 'failed') this.scope.recordException(cause.error);
      else if (cause.kind === 'cancelled') this.scope.recordCancellation();
      this.scope.recordStreamingCompletion(this.summary());
    } catch (e) {
      this.logger.warn(`failed to record streaming completion: ${asError(e).message}`);
    } finally {
      this.scope.end();
    }
    return true;
  }

  summary(): StreamingCompletionSummary {
    return {
      responseId: this.responseId,
      responseModel: this.responseModel,
      role: this.role,
      finishReason: this.finishReason,
      usage: this.usage,
      content: this.content.toContent(),
      toolCalls: this.tools.map((t) => t.toCall()),
    };
  }

  private toolBuffer(index: number): ToolCallBuffer {
    // Indices can arrive out of order; backfill so positions stay stable.
    while (this.tools.length <= index) this.tools.push(new ToolCallBuffer());
    return this.tools[index];
  }
}
