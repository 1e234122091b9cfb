import { setTimeout as sleep } from 'node:timers/promises';

export type HttpClient = {
  getJson: (url: string, opts?: { timeoutMs?: number }) => Promise<unknown>;
  postJson: (url: string, body: unknown, opts?: { timeoutMs?: number }) => Promise<void>;
};

export type HttpClientOptions = {
  userAgent?: string;
  timeoutMs?: number;
  // extra attempts after the first one; the loop retries on its own schedule
  maxRetries?: number;
  retryDelayMs?: number;
  fetchImpl?: typeof fetch;
};

export class HttpError extends Error {
  constructor(readonly status: number, message: string) {
    super(message);
    this.name = 'HttpError';
  }
}

export function makeHttpClient(params: HttpClientOptions = {}): HttpClient {
  const maxRetries = params.maxRetries ?? 1;
  const retryDelayMs = params.retryDelayMs ?? 250;
  const defaultTimeoutMs = params.timeoutMs ?? 10_000;
  const userAgent = params.userAgent ?? 'btc15m-alerts/0.1';
  const doFetch = params.fetchImpl ?? fetch;

  // The timer covers the whole exchange, body included: a server that sends
  // headers and then stalls must not hold the caller past timeoutMs.
  async function request<T>(
    url: string,
    init: RequestInit,
    timeoutMs: number,
    read: (r: Response) => Promise<T>
  ): Promise<T> {
    let attempt = 0;
    let lastErr: unknown = null;

    while (attempt <= maxRetries) {
      const controller = new AbortController();
      const t = setTimeout(() => controller.abort(), timeoutMs);
      const bounded = <V>(p: Promise<V>) => withAbort(p, controller.signal, timeoutMs);
      try {
        const r = await bounded(doFetch(url, { ...init, signal: controller.signal }));

        // 429 and 5xx are worth one more try; other statuses are final.
        if (r.status === 429 || (r.status >= 500 && r.status <= 599)) {
          lastErr = new HttpError(r.status, `http ${r.status} ${r.statusText} ${await bounded(safeText(r))}`.trim());
        } else if (!r.ok) {
          throw new HttpError(r.status, `http ${r.status} ${r.statusText} ${await bounded(safeText(r))}`.trim());
        } else {
          return await bounded(read(r));
        }
      } catch (e) {
        if (e instanceof HttpError && e.status < 500 && e.status !== 429) throw e;
        // network error, timeout or unreadable body
        lastErr = e;
      } finally {
        clearTimeout(t);
      }

      attempt++;
      if (attempt <= maxRetries && retryDelayMs > 0) await sleep(retryDelayMs);
    }

    throw lastErr ?? new Error('http_failed');
  }

  return {
    async getJson(url, opts) {
      return request(
        url,
        { method: 'GET', headers: { accept: 'application/json', 'user-agent': userAgent } },
        opts?.timeoutMs ?? defaultTimeoutMs,
        (r): Promise<unknown> => r.json()
      );
    },

    async postJson(url, body, opts) {
      await request(
        url,
        {
          method: 'POST',
          headers: { 'content-type': 'application/json', 'user-agent': userAgent },
          body: JSON.stringify(body)
        },
        opts?.timeoutMs ?? defaultTimeoutMs,
        // drain the reply so the connection goes back to the pool
        (r) => safeText(r)
      );
    }
  };
}

function withAbort<T>(p: Promise<T>, signal: AbortSignal, timeoutMs: number): Promise<T> {
  const timedOut = () => new Error(`request aborted after ${timeoutMs}ms timeout`);
  if (signal.aborted) return Promise.reject(timedOut());
  return new Promise<T>((resolve, reject) => {
    const onAbort = () => reject(timedOut());
    signal.addEventListener('abort', onAbort, { once: true });
    p.then(
      (v) => {
        signal.removeEventListener('abort', onAbort);
        resolve(v);
      },
      (e: unknown) => {
        signal.removeEventListener('abort', onAbort);
        reject(e);
      }
    );
  });
}

async function safeText(r: Response) {
  try {
    return await r.text();
  } catch {
    return '';
  }
}
