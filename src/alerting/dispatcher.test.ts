import { describe, expect, test } from "vitest";
import { createLokiInstance, createRecordingSleep, createScriptedNotifier } from "../test-utils";
import type { NotificationEvent } from "../types/monitor";
import { backoffDelay, createNotificationDispatcher, DEFAULT_RETRY_POLICY } from "./dispatcher";
import type { NotificationMessage } from "./types";

const message: NotificationMessage = {
  title: "test",
  description: "test message",
  color: 0,
  fields: [],
};

const transient = { status: "transient", error: "Discord API error: 502 Bad Gateway" } as const;
const delivered = { status: "delivered" } as const;

describe("backoffDelay", () => {
  test("doubles from the base delay up to the cap", () => {
    const policy = { ...DEFAULT_RETRY_POLICY, baseDelayMs: 1000, maxDelayMs: 5000 };

    expect([1, 2, 3, 4, 5].map((attempt) => backoffDelay(attempt, policy))).toEqual([
      1000, 2000, 4000, 5000, 5000,
    ]);
  });
});

describe("createNotificationDispatcher", () => {
  test("delivers on the first attempt without waiting", async () => {
    const notifier = createScriptedNotifier([delivered]);
    const { sleep, delays } = createRecordingSleep();
    const dispatcher = createNotificationDispatcher({ notifier, sleep });

    expect(await dispatcher.deliver(message)).toEqual({ status: "delivered", attempts: 1 });
    expect(delays).toEqual([]);
  });

  test("fails twice then succeeds, backing off 1s then 2s", async () => {
    const notifier = createScriptedNotifier([transient, transient, delivered]);
    const { sleep, delays } = createRecordingSleep();
    const dispatcher = createNotificationDispatcher({ notifier, sleep });

    expect(await dispatcher.deliver(message)).toEqual({ status: "delivered", attempts: 3 });
    expect(delays).toEqual([1000, 2000]);
    expect(notifier.sent).toHaveLength(3);
  });

  test("waits exactly the server-specified duration when rate limited", async () => {
    const notifier = createScriptedNotifier([{ status: "rate_limited", retryAfterMs: 5000 }]);
    const { sleep, delays } = createRecordingSleep();
    const dispatcher = createNotificationDispatcher({ notifier, sleep });

    const result = await dispatcher.deliver(message);

    expect(delays).toEqual([5000, 5000]);
    expect(notifier.sent).toHaveLength(3);
    expect(result).toEqual({
      status: "failed",
      reason: "Gave up after 3 attempts: rate limited",
      attempts: 3,
    });
  });

  test("a rate-limit wait overrides backoff for that attempt only", async () => {
    const notifier = createScriptedNotifier([
      transient,
      { status: "rate_limited", retryAfterMs: 750 },
      transient,
      delivered,
    ]);
    const { sleep, delays } = createRecordingSleep();
    const dispatcher = createNotificationDispatcher({
      notifier,
      sleep,
      policy: { maxAttempts: 4 },
    });

    expect(await dispatcher.deliver(message)).toEqual({ status: "delivered", attempts: 4 });
    expect(delays).toEqual([1000, 750, 4000]);
  });

  test("uses backoff when a rate limit carries no wait", async () => {
    const notifier = createScriptedNotifier([{ status: "rate_limited" }, delivered]);
    const { sleep, delays } = createRecordingSleep();
    const dispatcher = createNotificationDispatcher({ notifier, sleep });

    expect(await dispatcher.deliver(message)).toEqual({ status: "delivered", attempts: 2 });
    expect(delays).toEqual([1000]);
  });

  test("clamps absurd server waits", async () => {
    const notifier = createScriptedNotifier([
      { status: "rate_limited", retryAfterMs: 3_600_000 },
      delivered,
    ]);
    const { sleep, delays } = createRecordingSleep();
    const dispatcher = createNotificationDispatcher({ notifier, sleep });

    await dispatcher.deliver(message);

    expect(delays).toEqual([60_000]);
  });

  test("gives up after all attempts without waiting after the last", async () => {
    const notifier = createScriptedNotifier([transient]);
    const { sleep, delays } = createRecordingSleep();
    const dispatcher = createNotificationDispatcher({ notifier, sleep });

    expect(await dispatcher.deliver(message)).toEqual({
      status: "failed",
      reason: "Gave up after 3 attempts: Discord API error: 502 Bad Gateway",
      attempts: 3,
    });
    expect(delays).toEqual([1000, 2000]);
  });

  test("retries a client error with backoff like any other failure", async () => {
    const notFound = { status: "transient", error: "Discord API error: 404 Unknown Webhook" } as const;
    const notifier = createScriptedNotifier([notFound, delivered]);
    const { sleep, delays } = createRecordingSleep();
    const dispatcher = createNotificationDispatcher({ notifier, sleep });

    expect(await dispatcher.deliver(message)).toEqual({ status: "delivered", attempts: 2 });
    expect(delays).toEqual([1000]);
    expect(notifier.sent).toHaveLength(2);
  });

  test("a webhook that keeps rejecting is given up on after all attempts", async () => {
    const notifier = createScriptedNotifier([
      { status: "transient", error: "Discord API error: 404 Unknown Webhook" },
    ]);
    const { sleep, delays } = createRecordingSleep();
    const dispatcher = createNotificationDispatcher({ notifier, sleep });

    expect(await dispatcher.deliver(message)).toEqual({
      status: "failed",
      reason: "Gave up after 3 attempts: Discord API error: 404 Unknown Webhook",
      attempts: 3,
    });
    expect(delays).toEqual([1000, 2000]);
  });

  test("treats a throwing notifier as a transient failure", async () => {
    const notifier = createScriptedNotifier([new Error("network down"), delivered]);
    const { sleep, delays } = createRecordingSleep();
    const dispatcher = createNotificationDispatcher({ notifier, sleep });

    expect(await dispatcher.deliver(message)).toEqual({ status: "delivered", attempts: 2 });
    expect(delays).toEqual([1000]);
  });

  test("a shutdown interrupts the backoff wait", async () => {
    const controller = new AbortController();
    const notifier = createScriptedNotifier([transient]);
    const { sleep, delays } = createRecordingSleep(() => controller.abort());
    const dispatcher = createNotificationDispatcher({
      notifier,
      sleep,
      signal: controller.signal,
    });

    expect(await dispatcher.deliver(message)).toEqual({
      status: "failed",
      reason: "Delivery cancelled",
      attempts: 1,
    });
    expect(delays).toEqual([1000]);
    expect(notifier.sent).toHaveLength(1);
  });

  test("still makes one attempt after shutdown was requested", async () => {
    const controller = new AbortController();
    controller.abort();
    const notifier = createScriptedNotifier([transient]);
    const { sleep, delays } = createRecordingSleep();
    const dispatcher = createNotificationDispatcher({
      notifier,
      sleep,
      signal: controller.signal,
    });

    expect(await dispatcher.deliver(message)).toEqual({
      status: "failed",
      reason: "Delivery cancelled",
      attempts: 1,
    });
    expect(delays).toEqual([]);
  });

  test("dispatch formats the event before delivery", async () => {
    const notifier = createScriptedNotifier([delivered]);
    const dispatcher = createNotificationDispatcher({
      notifier,
      sleep: createRecordingSleep().sleep,
      host: "monitor-host",
    });
    const event: NotificationEvent = {
      kind: "alert",
      instance: createLokiInstance(),
      previousHealth: "healthy",
      newHealth: "unhealthy",
      reason: "Request timed out after 10s",
      consecutiveFailures: 2,
      timestamp: new Date("2026-03-04T05:06:07Z"),
    };

    expect(await dispatcher.dispatch(event)).toEqual({ status: "delivered", attempts: 1 });
    expect(notifier.sent[0]?.title).toBe("⚠️ Loki is DOWN");
    expect(notifier.sent[0]?.fields.find((field) => field.name === "Host")?.value).toBe(
      "monitor-host",
    );
  });

  test("rejects a policy without attempts", () => {
    expect(() =>
      createNotificationDispatcher({
        notifier: createScriptedNotifier([delivered]),
        policy: { maxAttempts: 0 },
      }),
    ).toThrow(RangeError);
  });
});
