/**
 * @closegate/notify domain types.
 */

import type { NotificationKind, Pov, Result } from "@closegate/types";
import type { DeliveryError } from "./errors.js";

// =============================================================================
// Events
// =============================================================================

/**
 * Extra fields understood by the templates:
 * `rejectionReason`, `failureDetails`, `partnerEntity`, `mismatchDetails`.
 */
export type NotificationFields = Readonly<Record<string, string>>;

export interface NotificationEvent {
  readonly kind: NotificationKind;
  readonly pov: Pov;
  /** The user whose action raised the event. */
  readonly actor?: string | undefined;
  readonly extraFields?: NotificationFields | undefined;
}

export type NotificationRole = "Approver" | "Submitter" | "DataSteward" | "Controller";

// =============================================================================
// Channels
// =============================================================================

export interface EmailMessage {
  readonly from: string;
  readonly to: string;
  readonly subject: string;
  readonly html: string;
}

export interface EmailChannel {
  send(message: EmailMessage, signal: AbortSignal): Promise<Result<void, DeliveryError>>;
}

export interface WebhookChannel {
  post(url: string, payload: unknown, signal: AbortSignal): Promise<Result<void, DeliveryError>>;
}

/** Role → address and entity → webhook lookups, entity first then global default. */
export interface RoleDirectory {
  resolve(entity: string, role: NotificationRole): Promise<string | undefined>;
  webhookUrl(entity: string): Promise<string | undefined>;
}

// =============================================================================
// Dispatch report
// =============================================================================

export type ChannelName = "email" | "webhook";

export interface DeliveryAttempt {
  readonly channel: ChannelName;
  readonly target: string;
  readonly entity: string;
  readonly delivered: boolean;
  readonly error?: string | undefined;
}

export interface SkippedRecipient {
  readonly role: NotificationRole;
  readonly entity: string;
  readonly reason: string;
}

export interface DispatchReport {
  readonly kind: NotificationKind;
  readonly entity: string;
  readonly recipients: number;
  readonly attempts: readonly DeliveryAttempt[];
  readonly skipped: readonly SkippedRecipient[];
}
