/**
 * Notification message formatting
 */

import { APP_NAME, APP_VERSION } from "../lib/config";
import {
  type NotificationEvent,
  SERVICE_DISPLAY_NAMES,
  SERVICE_KINDS,
  type ServiceKind,
} from "../types/monitor";
import type { EmbedField, NotificationMessage } from "./types";

export const COLOR_RED = 0xff0000;
export const COLOR_GREEN = 0x00ff00;
export const COLOR_BLUE = 0x3498db;

// Discord rejects embed field values longer than this
const FIELD_VALUE_LIMIT = 1024;

/**
 * Render a date as "2026-01-02 03:04:05 UTC"
 */
export function formatTimestamp(date: Date): string {
  return `${date.toISOString().slice(0, 19).replace("T", " ")} UTC`;
}

function field(name: string, value: string, inline: boolean): EmbedField {
  return { name, value: value.slice(0, FIELD_VALUE_LIMIT), inline };
}

/**
 * Build the alert or recovery message for a transition
 */
export function formatEvent(event: NotificationEvent, host: string): NotificationMessage {
  const label = event.instance.label;
  const timestamp = formatTimestamp(event.timestamp);

  if (event.kind === "alert") {
    return {
      title: `⚠️ ${label} is DOWN`,
      description: `${label} has failed ${event.consecutiveFailures} consecutive health checks.`,
      color: COLOR_RED,
      fields: [
        field("Service", label, true),
        field("Status", "UNHEALTHY", true),
        field("Timestamp", timestamp, false),
        field("Reason", event.reason ?? "Unknown", false),
        field("Host", host, true),
      ],
    };
  }

  return {
    title: `✅ ${label} has RECOVERED`,
    description: `${label} is back online and healthy.`,
    color: COLOR_GREEN,
    fields: [
      field("Service", label, true),
      field("Status", "HEALTHY", true),
      field("Timestamp", timestamp, false),
      field("Host", host, true),
    ],
  };
}

export interface StartupSummary {
  urls: Record<ServiceKind, string[]>;
  checkIntervalSeconds: number;
  failureThreshold: number;
}

export function formatStartup(
  summary: StartupSummary,
  host: string,
  startedAt: Date = new Date(),
): NotificationMessage {
  return {
    title: `👁️ ${APP_NAME} is now watching`,
    description: `${APP_NAME} v${APP_VERSION}`,
    color: COLOR_BLUE,
    fields: [
      field("Host", host, true),
      field("Interval", `${summary.checkIntervalSeconds}s`, true),
      field("Failure Threshold", String(summary.failureThreshold), true),
      ...SERVICE_KINDS.map((kind) =>
        field(SERVICE_DISPLAY_NAMES[kind], summary.urls[kind].join(", "), false),
      ),
      field("Started At", formatTimestamp(startedAt), false),
    ],
  };
}
