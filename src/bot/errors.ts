export type MonitorErrorKind = 'fetch' | 'data-unavailable' | 'delivery' | 'configuration';

export class MonitorError extends Error {
  readonly kind: MonitorErrorKind;

  constructor(kind: MonitorErrorKind, message: string, options?: { cause?: unknown }) {
    super(message, options);
    this.name = new.target.name;
    this.kind = kind;
  }
}

/** Market or price source unreachable, non-2xx, or returned a payload we can't read. */
export class FetchFailure extends MonitorError {
  constructor(message: string, options?: { cause?: unknown }) {
    super('fetch', message, options);
  }
}

/** Price feed answered but without usable numbers. Distinct from a zero reading. */
export class DataUnavailable extends MonitorError {
  constructor(message: string, options?: { cause?: unknown }) {
    super('data-unavailable', message, options);
  }
}

export class DeliveryFailure extends MonitorError {
  constructor(message: string, options?: { cause?: unknown }) {
    super('delivery', message, options);
  }
}

export class ConfigurationError extends MonitorError {
  readonly issues: string[];

  constructor(message: string, issues: string[] = []) {
    super('configuration', message);
    this.issues = issues;
  }
}

export function describeError(e: unknown): string {
  if (e instanceof Error) return e.message;
  return String(e);
}
