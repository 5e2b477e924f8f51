import type { AuditSink, SinkFilter } from "./types.js";
import { createSinkFilter, toSinkPayload } from "./types.js";
import type { AuditRecord } from "../types.js";

export interface WebhookSinkOptions extends SinkFilter {
  url: string;
  headers?: Record<string, string>;
  /** Extra attempts after a 5xx response or a network error. */
  retries?: number;
  /** Override fetch for testing. */
  fetchFn?: typeof fetch;
}

/**
 * Sends audit records as POST requests to a webhook URL. The kind, action
 * and severity also travel as headers so receivers can route without
 * parsing the body. Errors are logged to stderr, never thrown.
 */
export class WebhookSink implements AuditSink {
  readonly name = "webhook";
  private url: string;
  private headers: Record<string, string>;
  private retries: number;
  private accepts: (record: AuditRecord) => boolean;
  private fetchFn: typeof fetch;

  constructor(options: WebhookSinkOptions) {
    this.url = options.url;
    this.headers = options.headers ?? {};
    this.retries = options.retries ?? 1;
    this.accepts = createSinkFilter(options);
    this.fetchFn = options.fetchFn ?? fetch;
  }

  async emit(record: AuditRecord): Promise<void> {
    if (!this.accepts(record)) return;

    const payload = toSinkPayload(record);
    const init: RequestInit = {
      method: "POST",
      headers: {
        "Content-Type": "application/json",
        "X-Causeway-Kind": payload.kind,
        "X-Causeway-Action": payload.action_id,
        "X-Causeway-Severity": payload.severity,
        ...this.headers,
      },
      body: JSON.stringify(payload),
    };

    for (let attempt = 0; attempt <= this.retries; attempt++) {
      const final = attempt === this.retries;
      try {
        const res = await this.fetchFn(this.url, init);
        if (res.ok) return;
        // Only 5xx is retried
        if (res.status < 500 || final) {
          console.error(`[causeway] webhook sink got HTTP ${res.status} for ${record.kind}`);
          return;
        }
      } catch (err) {
        if (final) {
          console.error(`[causeway] webhook sink error: ${err}`);
          return;
        }
      }
    }
  }
}
