/**
 * Core types for notification delivery
 */

export interface EmbedField {
  name: string;
  value: string;
  inline: boolean;
}

/**
 * Transport-neutral message; providers render it into their wire format
 */
export interface NotificationMessage {
  title: string;
  description: string;
  color: number;
  fields: EmbedField[];
}

/**
 * Outcome of one send attempt, classified so the dispatcher can pick
 * between backing off and honoring a server wait
 */
export type SendResult =
  | { status: "delivered" }
  | { status: "rate_limited"; retryAfterMs?: number }
  | { status: "transient"; error: string };

export interface Notifier {
  readonly name: string;
  send(message: NotificationMessage): Promise<SendResult>;
}

export type DispatchResult =
  | { status: "delivered"; attempts: number }
  | { status: "failed"; reason: string; attempts: number };
