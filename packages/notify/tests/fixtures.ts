import { createPov } from "@closegate/types";
import type { Result } from "@closegate/types";
import { DeliveryError } from "../src/errors.js";
import type { EmailChannel, EmailMessage, WebhookChannel } from "../src/types.js";

export const POV = createPov({ scenario: "Actual", period: "2024M1", entity: "Plant01" });
export const FIXED_NOW = new Date("2024-02-05T09:30:45.000Z");

type Outcome = Result<void, DeliveryError>;

export const DELIVERED: Outcome = { ok: true, value: undefined };

export function failed(message = "relay down"): Outcome {
  return { ok: false, error: new DeliveryError("HTTP_STATUS", message, 502) };
}

export class RecordingEmail implements EmailChannel {
  readonly sent: EmailMessage[] = [];

  constructor(private readonly outcome: (message: EmailMessage) => Outcome = () => DELIVERED) {}

  send(message: EmailMessage): Promise<Outcome> {
    this.sent.push(message);
    return Promise.resolve(this.outcome(message));
  }
}

export class RecordingWebhook implements WebhookChannel {
  readonly posts: { url: string; payload: unknown }[] = [];

  constructor(private readonly outcome: () => Outcome = () => DELIVERED) {}

  post(url: string, payload: unknown): Promise<Outcome> {
    this.posts.push({ url, payload });
    return Promise.resolve(this.outcome());
  }
}
