/**
 * HTTP delivery channels.
 *
 * Both post JSON with the global fetch (replaceable for tests) and resolve a
 * Result instead of rejecting:
 * - non-2xx response → HTTP_STATUS
 * - aborted by the attempt signal → TIMEOUT
 * - anything else → TRANSPORT
 */

import { ok, err } from "@closegate/types";
import type { Result } from "@closegate/types";
import type { Logger } from "pino";
import { DeliveryError } from "./errors.js";
import type { EmailChannel, EmailMessage, WebhookChannel } from "./types.js";

export type FetchFn = typeof fetch;

async function postJson(
  fetchFn: FetchFn,
  url: string,
  body: unknown,
  headers: Readonly<Record<string, string>>,
  signal: AbortSignal,
): Promise<Result<void, DeliveryError>> {
  try {
    const response = await fetchFn(url, {
      method: "POST",
      headers: { "Content-Type": "application/json", ...headers },
      body: JSON.stringify(body),
      signal,
    });
    // The reply body is never read; release the connection either way.
    await response.body?.cancel();
    if (!response.ok) {
      return err(new DeliveryError("HTTP_STATUS", `${url} responded ${response.status}`, response.status));
    }
    return ok(undefined);
  } catch (cause: unknown) {
    if (signal.aborted) {
      return err(new DeliveryError("TIMEOUT", `${url} did not respond in time`));
    }
    const message = cause instanceof Error ? cause.message : String(cause);
    return err(new DeliveryError("TRANSPORT", message));
  }
}

// =============================================================================
// Email
// =============================================================================

export interface HttpEmailChannelOptions {
  /** Mail relay endpoint accepting `{ from, to, subject, html }`. */
  readonly url: string;
  readonly apiKey?: string | undefined;
  readonly fetchFn?: FetchFn | undefined;
}

export class HttpEmailChannel implements EmailChannel {
  private readonly url: string;
  private readonly headers: Readonly<Record<string, string>>;
  private readonly fetchFn: FetchFn;

  constructor(options: HttpEmailChannelOptions) {
    this.url = options.url;
    this.headers = options.apiKey !== undefined ? { Authorization: `Bearer ${options.apiKey}` } : {};
    this.fetchFn = options.fetchFn ?? fetch;
  }

  send(message: EmailMessage, signal: AbortSignal): Promise<Result<void, DeliveryError>> {
    return postJson(this.fetchFn, this.url, message, this.headers, signal);
  }
}

/**
 * Used when no relay is configured: the message is written to the
 * operational log instead of being sent.
 */
export class LogEmailChannel implements EmailChannel {
  constructor(private readonly logger: Logger) {}

  send(message: EmailMessage): Promise<Result<void, DeliveryError>> {
    this.logger.info({ to: message.to, subject: message.subject }, "email not sent: no mail relay configured");
    return Promise.resolve(ok(undefined));
  }
}

// =============================================================================
// Webhook
// =============================================================================

export class HttpWebhookChannel implements WebhookChannel {
  private readonly fetchFn: FetchFn;

  constructor(options: { readonly fetchFn?: FetchFn | undefined } = {}) {
    this.fetchFn = options.fetchFn ?? fetch;
  }

  post(url: string, payload: unknown, signal: AbortSignal): Promise<Result<void, DeliveryError>> {
    return postJson(this.fetchFn, url, payload, {}, signal);
  }
}
