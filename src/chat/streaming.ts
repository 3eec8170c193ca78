import { InvalidStateError, asError } from '../client/error-utils.js';
import { noopLogger, type Logger } from '../log.js';
import type { StreamingScope } from '../telemetry/streaming-scope.js';
import type { FinalizeCause, StreamingChatUpdate } from '../types.js';
import { readEventsFrom, type ServerSentEvent } from './sse.js';
import { decodeStreamingUpdates } from './updates.js';

/** Payload of the frame that terminates a stream. */
export const DONE_SENTINEL = '[DONE]';

export type ResponseBootstrap = () => Promise<Response>;

type Phase = 'idle' | 'streaming' | 'done';

/**
 * Lazy, single-pass sequence of the updates of one streaming call.
 *
 * Nothing is requested until the first `next()`. Each SSE frame decodes into
 * zero or more updates, which are handed out one at a time after being merged
 * into the call's {@link StreamingScope}. The scope is finalized exactly once,
 * on the sentinel, on exhaustion, on failure, on cancellation or on disposal,
 * whichever comes first, and the response body is released on the same path.
 */
export class StreamingChatUpdates implements AsyncIterable<StreamingChatUpdate> {
  private phase: Phase = 'idle';
  private iterated = false;
  private busy = false;
  private response: Response | null = null;
  private reader: ReadableStreamDefaultReader<Uint8Array> | null = null;
  private frames: AsyncGenerator<ServerSentEvent, void, undefined> | null = null;
  private readonly queue: StreamingChatUpdate[] = [];
  private readonly signal?: AbortSignal;
  private readonly logger: Logger;
  private readonly onAbort = () => {
    this.scope.finalize({ kind: 'cancelled' });
    // Settles a read that a pending next() waits on; that call then releases.
    void this.reader?.cancel(this.signal?.reason).catch((e: unknown) => {
      this.logger.debug(`cancelling stream response failed: ${asError(e).message}`);
    });
  };

  constructor(
    private readonly bootstrap: ResponseBootstrap,
    private readonly scope: StreamingScope,
    opts: { signal?: AbortSignal; logger?: Logger } = {}
  ) {
    this.signal = opts.signal;
    this.logger = opts.logger ?? noopLogger;
    if (this.signal?.aborted) this.onAbort();
    else this.signal?.addEventListener('abort', this.onAbort, { once: true });
  }

  /** The raw HTTP response, once the stream has been opened. */
  get rawResponse(): Response | null {
    return this.response;
  }

  [Symbol.asyncIterator](): AsyncIterator<StreamingChatUpdate> {
    if (this.iterated) throw new InvalidStateError('streaming updates can only be iterated once');
    this.iterated = true;
    return {
      next: () => this.advance(),
      return: () => this.dispose(),
    };
  }

  /** Dispose without iterating: finalizes the scope and releases the response. */
  async close(): Promise<void> {
    await this.dispose();
  }

  private async advance(): Promise<IteratorResult<StreamingChatUpdate, undefined>> {
    if (this.phase === 'done') {
      throw new InvalidStateError('stream has already completed or been disposed');
    }
    if (this.busy) throw new InvalidStateError('next() called before the previous call settled');
    this.busy = true;
    try {
      const update = await this.pull();
      if (!update) {
        await this.finish({ kind: 'completed' });
        return { done: true, value: undefined };
      }
      this.scope.accumulate(update);
      return { done: false, value: update };
    } catch (error) {
      await this.finish(this.signal?.aborted ? { kind: 'cancelled' } : { kind: 'failed', error });
      throw error;
    } finally {
      this.busy = false;
    }
  }

  private async pull(): Promise<StreamingChatUpdate | null> {
    while (true) {
      const queued = this.queue.shift();
      if (queued) return queued;

      this.signal?.throwIfAborted();
      const frames = this.frames ?? (await this.open());
      if (this.disposed()) {
        // Disposed while the request was in flight.
        await this.release();
        return null;
      }
      this.signal?.throwIfAborted();
      const next = await frames.next();
      // Disposed while the read was pending; release() already ran.
      if (this.disposed()) return null;
      this.signal?.throwIfAborted();
      if (next.done || next.value.data === DONE_SENTINEL) return null;

      this.queue.push(...decodeStreamingUpdates(next.value.data, this.logger.debug));
    }
  }

  private disposed(): boolean {
    return this.phase === 'done';
  }

  private async open(): Promise<AsyncGenerator<ServerSentEvent, void, undefined>> {
    this.phase = 'streaming';
    const response = await this.bootstrap();
    this.response = response;
    if (!response.body) throw new InvalidStateError('streaming response has no readable body');
    this.reader = response.body.getReader();
    this.frames = readEventsFrom(this.reader);
    return this.frames;
  }

  private async dispose(): Promise<IteratorResult<StreamingChatUpdate, undefined>> {
    await this.finish({ kind: 'completed' });
    return { done: true, value: undefined };
  }

  private async finish(cause: FinalizeCause): Promise<void> {
    if (this.phase === 'done') return;
    this.phase = 'done';
    this.signal?.removeEventListener('abort', this.onAbort);
    this.scope.finalize(cause);
    await this.release();
  }

  private async release(): Promise<void> {
    const { frames, reader } = this;
    this.frames = null;
    this.reader = null;
    this.queue.length = 0;
    const failed = (e: unknown) => {
      this.logger.debug(`releasing stream response failed: ${asError(e).message}`);
    };
    if (!reader) return;
    // Cancel before returning the frame source: a pending read would
    // otherwise hold the return() back until the server sends more data.
    await reader.cancel().catch(failed);
    try {
      await frames?.return(undefined);
      reader.releaseLock();
    } catch (e) {
      failed(e);
    }
  }
}
