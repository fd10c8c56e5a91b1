/**
 * @closegate/notify: Outcome notifications by email and chat webhook.
 */

export type {
  NotificationEvent,
  NotificationFields,
  NotificationRole,
  EmailMessage,
  EmailChannel,
  WebhookChannel,
  RoleDirectory,
  ChannelName,
  DeliveryAttempt,
  SkippedRecipient,
  DispatchReport,
} from "./types.js";

export { DeliveryError } from "./errors.js";
export type { DeliveryErrorCode } from "./errors.js";

export {
  escapeHtml,
  textToHtml,
  formatUtcSeconds,
  renderHtmlBody,
  renderMessageCard,
  CARD_THEME_COLOR,
} from "./template.js";
export type { HtmlBodyInput, MessageCard } from "./template.js";

export { SEVERITY_COLORS, ROLE_FOR_KIND, planMessages, inferNotificationKind } from "./routing.js";
export type { PlannedMessage } from "./routing.js";

export { ConfigRoleDirectory } from "./directory.js";

export { HttpEmailChannel, HttpWebhookChannel, LogEmailChannel } from "./channels.js";
export type { FetchFn, HttpEmailChannelOptions } from "./channels.js";

export {
  NotificationDispatcher,
  DEFAULT_APP_NAME,
  DEFAULT_FROM_ADDRESS,
  DEFAULT_ATTEMPT_TIMEOUT_MS,
} from "./dispatcher.js";
export type { NotificationDispatcherConfig } from "./dispatcher.js";
