/**
 * Delivery failure on an outbound channel. Logged by the dispatcher, never
 * surfaced to whoever raised the notification.
 */

export type DeliveryErrorCode = "HTTP_STATUS" | "TIMEOUT" | "TRANSPORT";

export class DeliveryError extends Error {
  constructor(
    public readonly code: DeliveryErrorCode,
    message: string,
    public readonly status?: number | undefined,
  ) {
    super(message);
    this.name = "DeliveryError";
  }
}
