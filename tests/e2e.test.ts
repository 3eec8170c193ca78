import { describe, it } from 'node:test';
import assert from 'node:assert/strict';
import http from 'node:http';

import { z } from 'zod';

import { ChatClient } from '../src/client.js';
import { noopLogger } from '../src/log.js';
import type { CallReport } from '../src/telemetry/scope.js';
import { createTelemetryHarness } from './helpers/otel.js';
import { mkSse } from './helpers/sse.js';

const reqBodySchema = z.object({
  model: z.string().optional(),
  stream: z.boolean().optional(),
  messages: z.array(z.object({ role: z.string(), content: z.unknown() })),
});

type ReqBody = z.infer<typeof reqBodySchema>;

const HELLO = [
  { id: 'mock-1', model: 'mock-model', choices: [{ index: 0, delta: { role: 'assistant', content: 'Hel' } }] },
  { id: 'mock-1', choices: [{ index: 0, delta: { content: 'lo' }, finish_reason: 'stop' }] },
  { id: 'mock-1', choices: [], usage: { prompt_tokens: 5, completion_tokens: 2, total_tokens: 7 } },
];

type MockServer = {
  endpoint: string;
  port: number;
  requests: ReqBody[];
  /** Resolves when the response of the n-th request is closed, by either side. */
  closed: Array<Promise<void>>;
  stop(): Promise<void>;
};

function readBody(req: http.IncomingMessage): Promise<string> {
  return new Promise<string>((resolve) => {
    let b = '';
    req.setEncoding('utf8');
    req.on('data', (d) => (b += d));
    req.on('end', () => resolve(b));
  });
}

async function startServer(): Promise<MockServer> {
  const requests: ReqBody[] = [];
  const closed: Array<Promise<void>> = [];

  const server = http.createServer(async (req, res) => {
    closed.push(new Promise<void>((resolve) => res.on('close', () => resolve())));

    if (req.method !== 'POST' || req.url !== '/v1/chat/completions') {
      res.writeHead(404).end();
      return;
    }
    const body = reqBodySchema.parse(JSON.parse(await readBody(req)));
    requests.push(body);

    if (!body.stream) {
      res.writeHead(200, { 'content-type': 'application/json' });
      res.end(
        JSON.stringify({
          id: 'mock-2',
          model: 'mock-model',
          choices: [{ index: 0, message: { role: 'assistant', content: 'done' }, finish_reason: 'stop' }],
          usage: { prompt_tokens: 4, completion_tokens: 1 },
        })
      );
      return;
    }

    res.writeHead(200, {
      'content-type': 'text/event-stream',
      'cache-control': 'no-cache',
      connection: 'keep-alive',
    });

    if (body.messages[0]?.content === 'hang') {
      // First frame only; the connection stays open until the client goes away.
      res.write(mkSse([HELLO[0]], false));
      return;
    }
    res.end(mkSse(HELLO));
  });

  await new Promise<void>((resolve) => server.listen(0, '127.0.0.1', () => resolve()));
  const addr = server.address();
  if (!addr || typeof addr === 'string') throw new Error('mock server has no port');

  return {
    endpoint: `http://127.0.0.1:${addr.port}/v1`,
    port: addr.port,
    requests,
    closed,
    stop: () =>
      new Promise<void>((resolve, reject) => {
        server.closeAllConnections();
        server.close((err) => (err ? reject(err) : resolve()));
      }),
  };
}

async function withClient(
  fn: (ctx: { client: ChatClient; server: MockServer; reports: CallReport[] }) => Promise<void>
): Promise<void> {
  const server = await startServer();
  const harness = createTelemetryHarness();
  const reports: CallReport[] = [];
  const client = new ChatClient({
    endpoint: server.endpoint,
    apiKey: 'test-secret',
    model: 'mock-model',
    logger: noopLogger,
    telemetry: {
      tracer: harness.tracer,
      meter: harness.meter,
      onReport: (r) => {
        reports.push(r);
      },
    },
  });
  try {
    await fn({ client, server, reports });
    assert.equal(harness.spans().length, reports.length);
    for (const span of harness.spans()) assert.equal(span.attributes['server.port'], server.port);
  } finally {
    await client.close();
    await server.stop();
    await harness.shutdown();
  }
}

describe('end-to-end (mock server)', () => {
  it('streams a completion over HTTP', async () => {
    await withClient(async ({ client, server, reports }) => {
      let text = '';
      for await (const u of client.stream({ messages: [{ role: 'user', content: 'hi' }] })) {
        for (const part of u.contentUpdate ?? []) if (part.kind === 'text') text += part.text;
      }

      assert.equal(text, 'Hello');
      assert.equal(server.requests.length, 1);
      assert.equal(server.requests[0].stream, true);
      assert.equal(reports.length, 1);
      assert.equal(reports[0].responseId, 'mock-1');
      assert.deepEqual(reports[0].finishReasons, ['stop']);
      assert.equal(reports[0].inputTokens, 5);
      assert.equal(reports[0].outputTokens, 2);
      assert.equal(reports[0].summary?.role, 'assistant');
    });
  });

  it('runs a unary completion over HTTP', async () => {
    await withClient(async ({ client, reports }) => {
      const res = await client.complete({ messages: [{ role: 'user', content: 'hi' }] });
      assert.equal(res.choices[0].message?.content, 'done');
      assert.equal(reports.length, 1);
      assert.equal(reports[0].errorType, null);
    });
  });

  it('closes the connection when the consumer stops early', async () => {
    await withClient(async ({ client, server, reports }) => {
      for await (const u of client.stream({ messages: [{ role: 'user', content: 'hang' }] })) {
        assert.equal(u.id, 'mock-1');
        break;
      }

      await server.closed[0];
      assert.equal(reports.length, 1);
      assert.equal(reports[0].summary?.role, 'assistant');
    });
  });

  it('cancels a stream in flight', async () => {
    await withClient(async ({ client, server, reports }) => {
      const ac = new AbortController();
      const updates = client.stream({ messages: [{ role: 'user', content: 'hang' }] }, { signal: ac.signal });
      const iter = updates[Symbol.asyncIterator]();

      assert.equal((await iter.next()).done, false);
      ac.abort();
      assert.equal(reports.length, 1);
      assert.equal(reports[0].errorType, 'cancelled');

      await assert.rejects(iter.next(), { name: 'AbortError' });
      await server.closed[0];
      assert.equal(reports.length, 1);
    });
  });
});
