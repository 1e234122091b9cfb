import type { HttpClient } from './http.js';
import { DeliveryFailure, describeError } from './errors.js';
import type { NotificationSink } from './types.js';

// POSTs {"message": text} to a chat webhook.
export class WebhookSink implements NotificationSink {
  constructor(private opts: { http: HttpClient; url: string; timeoutMs?: number }) {}

  async send(text: string): Promise<void> {
    try {
      await this.opts.http.postJson(this.opts.url, { message: text }, { timeoutMs: this.opts.timeoutMs });
    } catch (e) {
      throw new DeliveryFailure(`webhook delivery failed: ${describeError(e)}`, { cause: e });
    }
  }
}

// dry-run: print instead of posting
export class ConsoleSink implements NotificationSink {
  constructor(private write: (line: string) => void = (line) => console.log(line)) {}

  async send(text: string): Promise<void> {
    this.write(`\n${text}\n`);
  }
}
