export class MonitorError extends Error {
  readonly url?: string;

  constructor(message: string, url?: string, options?: ErrorOptions) {
    super(message, options);
    this.name = new.target.name;
    this.url = url;
  }
}

/** Network or HTTP-level failure while retrieving a page. */
export class FetchError extends MonitorError {}

/** The response could not be turned into visible text. */
export class ParseError extends MonitorError {}

/** The summarization service could not produce a summary. */
export class SummaryError extends MonitorError {}

export class StoreError extends MonitorError {}

/** Another run currently holds the data directory. */
export class LockError extends MonitorError {}

export class ConfigError extends MonitorError {}

export function errorMessage(err: unknown): string {
  return err instanceof Error ? err.message : String(err);
}
