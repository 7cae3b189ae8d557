/**
 * Alerting - transition notifications delivered through a Discord webhook
 */

export {
  createNotificationDispatcher,
  DEFAULT_RETRY_POLICY,
  type NotificationDispatcher,
  type RetryPolicy,
} from "./dispatcher";
export { formatEvent, formatStartup, formatTimestamp } from "./messages";
export { createDiscordNotifier } from "./providers/discord";
export type { DispatchResult, NotificationMessage, Notifier, SendResult } from "./types";
