import assert from 'node:assert';
import { test } from 'node:test';
import { HttpError, makeHttpClient } from './http.js';

type Call = { url: string; method: string; headers: Headers; body: string | null };

function scripted(responses: Array<Response | Error>, calls: Call[]): typeof fetch {
  return async (input, init) => {
    calls.push({
      url: String(input),
      method: init?.method ?? 'GET',
      headers: new Headers(init?.headers),
      body: typeof init?.body === 'string' ? init.body : null
    });
    const next = responses.shift();
    if (!next) throw new Error('no scripted response left');
    if (next instanceof Error) throw next;
    return next;
  };
}

const json = (body: unknown, status = 200) => new Response(JSON.stringify(body), { status });

test('getJson returns the parsed body', async () => {
  const calls: Call[] = [];
  const http = makeHttpClient({ fetchImpl: scripted([json({ ok: 1 })], calls), retryDelayMs: 0 });
  assert.deepEqual(await http.getJson('https://example.test/a'), { ok: 1 });
  assert.equal(calls.length, 1);
  assert.equal(calls[0]?.headers.get('accept'), 'application/json');
});

test('5xx and network errors get one more attempt', async () => {
  const calls: Call[] = [];
  const http = makeHttpClient({
    fetchImpl: scripted([new Response('busy', { status: 503 }), json([1])], calls),
    retryDelayMs: 0
  });
  assert.deepEqual(await http.getJson('https://example.test/a'), [1]);
  assert.equal(calls.length, 2);

  const calls2: Call[] = [];
  const http2 = makeHttpClient({ fetchImpl: scripted([new Error('ECONNRESET'), json('x')], calls2), retryDelayMs: 0 });
  assert.equal(await http2.getJson('https://example.test/b'), 'x');
  assert.equal(calls2.length, 2);
});

test('retries are bounded', async () => {
  const calls: Call[] = [];
  const http = makeHttpClient({
    fetchImpl: scripted([new Response('a', { status: 500 }), new Response('b', { status: 500 })], calls),
    retryDelayMs: 0
  });
  await assert.rejects(http.getJson('https://example.test/a'), (e: unknown) => {
    assert.ok(e instanceof HttpError);
    assert.equal(e.status, 500);
    return true;
  });
  assert.equal(calls.length, 2);
});

test('4xx fails without retry', async () => {
  const calls: Call[] = [];
  const http = makeHttpClient({ fetchImpl: scripted([new Response('nope', { status: 404 })], calls), retryDelayMs: 0 });
  await assert.rejects(http.getJson('https://example.test/a'), HttpError);
  assert.equal(calls.length, 1);
});

test('requests time out', async () => {
  const hanging: typeof fetch = (_input, init) =>
    new Promise((_resolve, reject) => {
      init?.signal?.addEventListener('abort', () => reject(new Error('aborted')));
    });
  const http = makeHttpClient({ fetchImpl: hanging, maxRetries: 0, timeoutMs: 10 });
  await assert.rejects(http.getJson('https://example.test/slow'), /aborted/);
});

test('postJson sends a JSON body', async () => {
  const calls: Call[] = [];
  const http = makeHttpClient({ fetchImpl: scripted([new Response(null, { status: 204 })], calls), retryDelayMs: 0 });
  await http.postJson('https://hooks.example.test/x', { message: 'hi' });
  assert.equal(calls[0]?.method, 'POST');
  assert.equal(calls[0]?.headers.get('content-type'), 'application/json');
  assert.equal(calls[0]?.body, '{"message":"hi"}');
});

test('a body that stalls after the headers still times out', async () => {
  const stalled = () =>
    new Response(
      new ReadableStream<Uint8Array>({
        start(controller) {
          controller.enqueue(new TextEncoder().encode('['));
        }
      }),
      { status: 200 }
    );
  const http = makeHttpClient({ fetchImpl: async () => stalled(), maxRetries: 0, timeoutMs: 50 });
  await assert.rejects(http.getJson('https://example.test/stall'), /aborted after 50ms/);
});

test('postJson reads the reply body', async () => {
  const reply = new Response('ok', { status: 200 });
  const http = makeHttpClient({ fetchImpl: scripted([reply], []), retryDelayMs: 0 });
  await http.postJson('https://hooks.example.test/x', { message: 'hi' });
  assert.equal(reply.bodyUsed, true);
});
