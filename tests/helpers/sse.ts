const encoder = new TextEncoder();

/** SSE body for `chunks`, terminated by the `[DONE]` sentinel unless `done` is false. */
export function mkSse(chunks: unknown[], done = true): string {
  const frames = chunks.map((c) => `data: ${typeof c === 'string' ? c : JSON.stringify(c)}\n\n`).join('');
  return done ? `${frames}data: [DONE]\n\n` : frames;
}

export type BodyState = { cancelled: boolean; pulls: number };

/**
 * A byte stream serving `chunks` one pull at a time. After the last chunk it
 * closes, errors with `error`, or (with `hold`) stays open without data.
 */
export function trackedBody(
  chunks: Array<string | Uint8Array>,
  opts: { hold?: boolean; error?: Error } = {}
): { stream: ReadableStream<Uint8Array>; state: BodyState } {
  const state: BodyState = { cancelled: false, pulls: 0 };
  let i = 0;
  const stream = new ReadableStream<Uint8Array>({
    pull(controller) {
      state.pulls++;
      if (i < chunks.length) {
        const chunk = chunks[i++];
        controller.enqueue(typeof chunk === 'string' ? encoder.encode(chunk) : chunk);
        return;
      }
      if (opts.error) controller.error(opts.error);
      else if (!opts.hold) controller.close();
    },
    cancel() {
      state.cancelled = true;
    },
  });
  return { stream, state };
}

export function sseResponse(stream: ReadableStream<Uint8Array>): Response {
  return new Response(stream, {
    status: 200,
    headers: { 'content-type': 'text/event-stream' },
  });
}

export function jsonResponse(body: unknown, status = 200): Response {
  return new Response(JSON.stringify(body), {
    status,
    headers: { 'content-type': 'application/json' },
  });
}
