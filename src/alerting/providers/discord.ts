/**
 * Discord notification provider
 */

import { hostname } from "node:os";
import { z } from "zod";
import type { FetchFn } from "../../checkers/http";
import { APP_NAME, APP_VERSION } from "../../lib/config";
import type { NotificationMessage, Notifier, SendResult } from "../types";

export interface DiscordNotifierOptions {
  webhookUrl: string;
  fetchFn?: FetchFn;
  timeoutMs?: number;
  footer?: string;
  now?: () => Date;
}

const DEFAULT_TIMEOUT_MS = 15_000;

// Discord reports the wait in seconds (fractional) in the 429 body
const RateLimitBodySchema = z.object({
  retry_after: z.coerce.number().nonnegative(),
});

function parseRetryAfterMs(body: string, header: string | null): number | undefined {
  try {
    const parsed = RateLimitBodySchema.safeParse(JSON.parse(body));
    if (parsed.success) {
      return Math.round(parsed.data.retry_after * 1000);
    }
  } catch {
    // Not JSON; fall back to the header
  }

  if (header !== null) {
    const seconds = Number(header);
    if (Number.isFinite(seconds) && seconds >= 0) {
      return Math.round(seconds * 1000);
    }
  }

  return undefined;
}

export function buildDiscordPayload(message: NotificationMessage, footer: string, timestamp: Date) {
  return {
    embeds: [
      {
        title: message.title,
        description: message.description,
        color: message.color,
        fields: message.fields,
        timestamp: timestamp.toISOString(),
        footer: { text: footer },
      },
    ],
  };
}

/**
 * Create a notifier posting embeds to a Discord webhook.
 *
 * Responses are classified for the dispatcher: 2xx delivered, 429 rate
 * limited, anything else transient.
 */
export function createDiscordNotifier(options: DiscordNotifierOptions): Notifier {
  const fetchFn = options.fetchFn ?? fetch;
  const timeoutMs = options.timeoutMs ?? DEFAULT_TIMEOUT_MS;
  const footer = options.footer ?? `${APP_NAME} v${APP_VERSION} • ${hostname()}`;
  const now = options.now ?? (() => new Date());

  return {
    name: "discord",

    async send(message: NotificationMessage): Promise<SendResult> {
      const controller = new AbortController();
      const timeoutHandle = setTimeout(() => controller.abort(), timeoutMs);

      try {
        const response = await fetchFn(options.webhookUrl, {
          method: "POST",
          headers: {
            "Content-Type": "application/json",
          },
          body: JSON.stringify(buildDiscordPayload(message, footer, now())),
          signal: controller.signal,
        });

        if (response.ok) {
          return { status: "delivered" };
        }

        const errorText = await response.text();

        if (response.status === 429) {
          return {
            status: "rate_limited",
            retryAfterMs: parseRetryAfterMs(errorText, response.headers.get("retry-after")),
          };
        }

        return {
          status: "transient",
          error: `Discord API error: ${response.status} ${errorText.slice(0, 200)}`.trim(),
        };
      } catch (error) {
        if (error instanceof Error && error.name === "AbortError") {
          return { status: "transient", error: `Discord request timed out after ${timeoutMs}ms` };
        }

        return {
          status: "transient",
          error: error instanceof Error ? error.message : "Unknown error",
        };
      } finally {
        clearTimeout(timeoutHandle);
      }
    },
  };
}
