/**
 * NotificationDispatcher
 *
 * Resolves recipients per role, renders one message per recipient and
 * attempts email plus, where a webhook is configured, a chat card. Every
 * recipient and every channel is attempted independently and concurrently,
 * each under its own timeout. Nothing here rejects: failures are logged and
 * reported in the DispatchReport.
 */

import pino from "pino";
import type { Logger } from "pino";
import { DeliveryError } from "./errors.js";
import { planMessages } from "./routing.js";
import type { PlannedMessage } from "./routing.js";
import { renderHtmlBody, renderMessageCard } from "./template.js";
import type {
  ChannelName,
  DeliveryAttempt,
  DispatchReport,
  EmailChannel,
  NotificationEvent,
  RoleDirectory,
  SkippedRecipient,
  WebhookChannel,
} from "./types.js";
import type { Result } from "@closegate/types";

export const DEFAULT_APP_NAME = "Close Gate";
export const DEFAULT_FROM_ADDRESS = "closegate-noreply@example.com";
export const DEFAULT_ATTEMPT_TIMEOUT_MS = 10_000;

export interface NotificationDispatcherConfig {
  readonly email: EmailChannel;
  readonly webhook: WebhookChannel;
  readonly directory: RoleDirectory;
  readonly appName?: string | undefined;
  readonly from?: string | undefined;
  readonly attemptTimeoutMs?: number | undefined;
  readonly clock?: (() => Date) | undefined;
  readonly logger?: Logger | undefined;
}

type RecipientOutcome =
  | { readonly kind: "attempted"; readonly attempts: readonly DeliveryAttempt[] }
  | { readonly kind: "skipped"; readonly skipped: SkippedRecipient };

export class NotificationDispatcher {
  private readonly email: EmailChannel;
  private readonly webhook: WebhookChannel;
  private readonly directory: RoleDirectory;
  private readonly appName: string;
  private readonly from: string;
  private readonly attemptTimeoutMs: number;
  private readonly clock: () => Date;
  private readonly logger: Logger;

  constructor(config: NotificationDispatcherConfig) {
    this.email = config.email;
    this.webhook = config.webhook;
    this.directory = config.directory;
    this.appName = config.appName ?? DEFAULT_APP_NAME;
    this.from = config.from ?? DEFAULT_FROM_ADDRESS;
    this.attemptTimeoutMs = config.attemptTimeoutMs ?? DEFAULT_ATTEMPT_TIMEOUT_MS;
    this.clock = config.clock ?? (() => new Date());
    this.logger = config.logger ?? pino({ level: "silent" });
  }

  /**
   * Fire-and-forget entry point. Returns immediately.
   */
  notify(event: NotificationEvent, onReport?: (report: DispatchReport) => void): void {
    void this.dispatch(event)
      .then((report) => onReport?.(report))
      .catch((error: unknown) => {
        this.logger.error({ err: error, kind: event.kind }, "notification dispatch failed");
      });
  }

  /**
   * Dispatch and wait for every attempt to settle.
   */
  async dispatch(event: NotificationEvent): Promise<DispatchReport> {
    const messages = planMessages(event, this.appName);
    const outcomes = await Promise.all(messages.map((message) => this.deliver(event, message)));

    const attempts: DeliveryAttempt[] = [];
    const skipped: SkippedRecipient[] = [];
    for (const outcome of outcomes) {
      if (outcome.kind === "attempted") {
        attempts.push(...outcome.attempts);
      } else {
        skipped.push(outcome.skipped);
      }
    }

    const report: DispatchReport = {
      kind: event.kind,
      entity: event.pov.entity,
      recipients: messages.length - skipped.length,
      attempts,
      skipped,
    };
    this.logger.info(
      {
        kind: report.kind,
        entity: report.entity,
        recipients: report.recipients,
        delivered: attempts.filter((a) => a.delivered).length,
        failed: attempts.filter((a) => !a.delivered).length,
      },
      "notification dispatched",
    );
    return report;
  }

  // ─── Internal ───────────────────────────────────────────────────────

  private async deliver(event: NotificationEvent, message: PlannedMessage): Promise<RecipientOutcome> {
    const { role, entity } = message;

    let address: string | undefined;
    try {
      address = await this.directory.resolve(entity, role);
    } catch (cause: unknown) {
      const reason = `recipient lookup failed: ${errorMessage(cause)}`;
      this.logger.warn({ role, entity, err: cause }, reason);
      return { kind: "skipped", skipped: { role, entity, reason } };
    }

    if (address === undefined) {
      const reason = `no ${role} configured`;
      this.logger.info({ role, entity }, reason);
      return { kind: "skipped", skipped: { role, entity, reason } };
    }

    const now = this.clock();
    const html = renderHtmlBody({
      appName: this.appName,
      title: message.title,
      summary: message.summary,
      scenario: event.pov.scenario,
      period: event.pov.period,
      entity,
      timestamp: now,
      detailsHtml: message.detailsHtml,
      accentColor: message.accentColor,
    });
    const to = address;

    const attempts: Promise<DeliveryAttempt>[] = [
      this.attempt("email", to, entity, (signal) =>
        this.email.send({ from: this.from, to, subject: message.subject, html }, signal),
      ),
    ];

    const webhookUrl = await this.webhookFor(entity);
    if (webhookUrl !== undefined) {
      const card = renderMessageCard(message.subject, entity, now);
      attempts.push(
        this.attempt("webhook", webhookUrl, entity, (signal) => this.webhook.post(webhookUrl, card, signal)),
      );
    }

    return { kind: "attempted", attempts: await Promise.all(attempts) };
  }

  private async webhookFor(entity: string): Promise<string | undefined> {
    try {
      return await this.directory.webhookUrl(entity);
    } catch (cause: unknown) {
      this.logger.warn({ entity, err: cause }, "webhook lookup failed; sending email only");
      return undefined;
    }
  }

  private async attempt(
    channel: ChannelName,
    target: string,
    entity: string,
    send: (signal: AbortSignal) => Promise<Result<void, DeliveryError>>,
  ): Promise<DeliveryAttempt> {
    let result: Result<void, DeliveryError>;
    try {
      result = await send(AbortSignal.timeout(this.attemptTimeoutMs));
    } catch (cause: unknown) {
      result = { ok: false, error: new DeliveryError("TRANSPORT", errorMessage(cause)) };
    }

    if (result.ok) {
      this.logger.info({ channel, target, entity }, `${channel} notification sent`);
      return { channel, target, entity, delivered: true };
    }

    this.logger.warn(
      { channel, target, entity, code: result.error.code, status: result.error.status },
      `${channel} notification failed: ${result.error.message}`,
    );
    return { channel, target, entity, delivered: false, error: result.error.message };
  }
}

function errorMessage(cause: unknown): string {
  return cause instanceof Error ? cause.message : String(cause);
}
