/**
 * Notification dispatcher - bounded retries with exponential backoff and
 * rate-limit compliance
 */

import { hostname } from "node:os";
import { logger } from "../lib/logger";
import { recordNotification } from "../lib/prometheus";
import { isAbortError, type Sleep, sleep as defaultSleep } from "../lib/sleep";
import type { NotificationEvent } from "../types/monitor";
import { formatEvent } from "./messages";
import type { DispatchResult, NotificationMessage, Notifier, SendResult } from "./types";

export interface RetryPolicy {
  maxAttempts: number;
  baseDelayMs: number;
  maxDelayMs: number;
  // Server-requested waits longer than this are clamped
  maxRetryAfterMs: number;
}

export const DEFAULT_RETRY_POLICY: RetryPolicy = {
  maxAttempts: 3,
  baseDelayMs: 1_000,
  maxDelayMs: 30_000,
  maxRetryAfterMs: 60_000,
};

export interface DispatcherOptions {
  notifier: Notifier;
  policy?: Partial<RetryPolicy>;
  sleep?: Sleep;
  signal?: AbortSignal;
  host?: string;
}

export type DeliveryKind = NotificationEvent["kind"] | "startup";

export interface NotificationDispatcher {
  dispatch(event: NotificationEvent): Promise<DispatchResult>;
  deliver(message: NotificationMessage, kind?: DeliveryKind): Promise<DispatchResult>;
}

/**
 * Backoff before the attempt after `attempt`: base, 2*base, 4*base... capped
 */
export function backoffDelay(attempt: number, policy: RetryPolicy): number {
  return Math.min(policy.baseDelayMs * 2 ** (attempt - 1), policy.maxDelayMs);
}

/**
 * How long to wait after a failed attempt
 */
export function retryDelay(result: SendResult, attempt: number, policy: RetryPolicy): number {
  if (result.status === "rate_limited" && result.retryAfterMs !== undefined) {
    return Math.min(result.retryAfterMs, policy.maxRetryAfterMs);
  }
  return backoffDelay(attempt, policy);
}

function describeFailure(result: SendResult): string {
  switch (result.status) {
    case "rate_limited":
      return "rate limited";
    case "transient":
      return result.error;
    case "delivered":
      return "delivered";
  }
}

export function createNotificationDispatcher(options: DispatcherOptions): NotificationDispatcher {
  const policy: RetryPolicy = { ...DEFAULT_RETRY_POLICY, ...options.policy };
  const sleep = options.sleep ?? defaultSleep;
  const host = options.host ?? hostname();
  const { notifier, signal } = options;

  if (!Number.isInteger(policy.maxAttempts) || policy.maxAttempts < 1) {
    throw new RangeError(`maxAttempts must be an integer >= 1, got ${policy.maxAttempts}`);
  }

  const attemptSend = async (message: NotificationMessage): Promise<SendResult> => {
    try {
      return await notifier.send(message);
    } catch (error) {
      return {
        status: "transient",
        error: error instanceof Error ? error.message : String(error),
      };
    }
  };

  const deliver = async (
    message: NotificationMessage,
    kind: DeliveryKind = "startup",
  ): Promise<DispatchResult> => {
    let lastFailure = "no attempt made";

    for (let attempt = 1; attempt <= policy.maxAttempts; attempt++) {
      const result = await attemptSend(message);

      if (result.status === "delivered") {
        logger.debug({ notifier: notifier.name, kind, attempt }, "Notification delivered");
        recordNotification(kind, "delivered");
        return { status: "delivered", attempts: attempt };
      }

      lastFailure = describeFailure(result);

      if (attempt === policy.maxAttempts) {
        break;
      }

      const delayMs = retryDelay(result, attempt, policy);
      logger.warn(
        {
          notifier: notifier.name,
          kind,
          attempt,
          maxAttempts: policy.maxAttempts,
          delayMs,
          error: lastFailure,
        },
        result.status === "rate_limited"
          ? "Notification rate limited; retrying after server-requested wait"
          : "Notification attempt failed; retrying with backoff",
      );

      try {
        await sleep(delayMs, signal);
      } catch (error) {
        if (!isAbortError(error)) throw error;
        logger.warn({ notifier: notifier.name, kind, attempt }, "Notification retry cancelled");
        recordNotification(kind, "failed");
        return { status: "failed", reason: "Delivery cancelled", attempts: attempt };
      }
    }

    logger.error(
      { notifier: notifier.name, kind, attempts: policy.maxAttempts, error: lastFailure },
      "Notification delivery failed after all attempts",
    );
    recordNotification(kind, "failed");
    return {
      status: "failed",
      reason: `Gave up after ${policy.maxAttempts} attempts: ${lastFailure}`,
      attempts: policy.maxAttempts,
    };
  };

  return {
    deliver,

    dispatch(event: NotificationEvent): Promise<DispatchResult> {
      return deliver(formatEvent(event, host), event.kind);
    },
  };
}
