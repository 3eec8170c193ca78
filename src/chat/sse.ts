/**
 * Server-sent event framing over a byte stream.
 *
 * Frames are separated by a blank line. Only the `data`, `event`, `id` and
 * `retry` fields are kept; comment lines (leading `:`) are skipped.
 */

export type ServerSentEvent = {
  data: string;
  event?: string;
  id?: string;
  retry?: number;
};

const LINE_BREAK = /\r\n|\r|\n/;

type FrameBuilder = {
  data: string[];
  event?: string;
  id?: string;
  retry?: number;
};

function emptyFrame(): FrameBuilder {
  return { data: [] };
}

/** Apply one `field: value` line to the frame under construction. */
function applyLine(frame: FrameBuilder, line: string): void {
  if (line.startsWith(':')) return;

  const colon = line.indexOf(':');
  const field = colon === -1 ? line : line.slice(0, colon);
  let value = colon === -1 ? '' : line.slice(colon + 1);
  if (value.startsWith(' ')) value = value.slice(1);

  switch (field) {
    case 'data':
      frame.data.push(value);
      break;
    case 'event':
      frame.event = value;
      break;
    case 'id':
      frame.id = value;
      break;
    case 'retry': {
      const n = Number(value);
      if (Number.isInteger(n) && n >= 0) frame.retry = n;
      break;
    }
    default:
      break;
  }
}

function toEvent(frame: FrameBuilder): ServerSentEvent | null {
  // A frame without data lines dispatches nothing.
  if (!frame.data.length) return null;
  const out: ServerSentEvent = { data: frame.data.join('\n') };
  if (frame.event !== undefined) out.event = frame.event;
  if (frame.id !== undefined) out.id = frame.id;
  if (frame.retry !== undefined) out.retry = frame.retry;
  return out;
}

/**
 * Lazily decode `stream` into server-sent events. The reader is only acquired
 * on the first pull; returning the generator early cancels it, which closes
 * the underlying connection.
 */
export async function* readServerSentEvents(
  stream: ReadableStream<Uint8Array>
): AsyncGenerator<ServerSentEvent, void, undefined> {
  const reader = stream.getReader();
  let finished = false;
  try {
    yield* readEventsFrom(reader);
    finished = true;
  } finally {
    try {
      if (!finished) await reader.cancel();
    } finally {
      reader.releaseLock();
    }
  }
}

/**
 * Decode events from a reader owned by the caller. The caller cancels and
 * releases it; cancelling settles a pending read and ends the sequence.
 */
export async function* readEventsFrom(
  reader: ReadableStreamDefaultReader<Uint8Array>
): AsyncGenerator<ServerSentEvent, void, undefined> {
  const decoder = new TextDecoder();
  let buf = '';
  let frame = emptyFrame();
  let finished = false;

  while (true) {
    const { value, done } = await reader.read();
    if (done) {
      finished = true;
      buf += decoder.decode();
    } else {
      buf += decoder.decode(value, { stream: true });
    }

    while (true) {
      const match = LINE_BREAK.exec(buf);
      if (!match) break;
      // A trailing '\r' may be the first half of '\r\n'; wait for more input.
      if (match[0] === '\r' && match.index === buf.length - 1 && !finished) break;

      const line = buf.slice(0, match.index);
      buf = buf.slice(match.index + match[0].length);

      if (line === '') {
        const event = toEvent(frame);
        frame = emptyFrame();
        if (event) yield event;
        continue;
      }
      applyLine(frame, line);
    }

    if (finished) {
      if (buf.length) applyLine(frame, buf);
      const event = toEvent(frame);
      if (event) yield event;
      return;
    }
  }
}
