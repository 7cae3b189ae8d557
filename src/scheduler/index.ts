import { logger } from "../lib/logger";
import { recordProbe, recordTransition } from "../lib/prometheus";
import { isAbortError, sleep as defaultSleep } from "../lib/sleep";
import { createInstanceState } from "../monitor/instances";
import { evaluate } from "../monitor/transition";
import type { InstanceState, MonitoredInstance } from "../types/monitor";
import type { SchedulerOptions, SchedulerPhase } from "./types";

const DEFAULT_SLICE_MS = 1_000;

export interface Scheduler {
  /**
   * Run until the signal aborts: startup notification, then polling cycles
   * separated by the check interval
   */
  run(signal: AbortSignal): Promise<void>;
  /**
   * Probe every instance once, in order
   */
  runCycle(signal?: AbortSignal): Promise<void>;
  getPhase(): SchedulerPhase;
  getState(instanceId: string): Readonly<InstanceState> | undefined;
  getInstanceCount(): number;
}

/**
 * Create scheduler instance
 */
export function createScheduler(options: SchedulerOptions): Scheduler {
  const sleep = options.sleep ?? defaultSleep;
  const sliceMs = options.sliceMs ?? DEFAULT_SLICE_MS;
  const { instances, prober, dispatcher, failureThreshold } = options;

  if (!Number.isInteger(failureThreshold) || failureThreshold < 1) {
    throw new RangeError(`failureThreshold must be an integer >= 1, got ${failureThreshold}`);
  }
  if (!(options.checkIntervalSeconds > 0)) {
    throw new RangeError(
      `checkIntervalSeconds must be > 0, got ${options.checkIntervalSeconds}`,
    );
  }

  const seen = new Set<string>();
  for (const instance of instances) {
    if (seen.has(instance.id)) {
      throw new RangeError(`Duplicate instance ${instance.id}`);
    }
    seen.add(instance.id);
  }

  let phase: SchedulerPhase = "starting";

  // Owned here and nowhere else; one entry per instance for the process lifetime
  const states = new Map<string, InstanceState>(
    instances.map((instance) => [instance.id, createInstanceState()]),
  );

  const checkInstance = async (instance: MonitoredInstance) => {
    const current = states.get(instance.id) ?? createInstanceState();
    const outcome = await prober(instance, options.requestTimeoutSeconds);

    logger.debug(
      {
        instance: instance.id,
        success: outcome.success,
        reason: outcome.reason,
        latencyMs: outcome.latencyMs,
      },
      `${instance.label} check completed`,
    );

    const { state, event } = evaluate(instance, current, outcome, failureThreshold);
    states.set(instance.id, state);
    recordProbe(instance, outcome, state);

    if (!event) {
      if (!outcome.success) {
        logger.debug(
          {
            instance: instance.id,
            failures: state.consecutiveFailures,
            threshold: failureThreshold,
            reason: outcome.reason,
          },
          `${instance.label} failure ${state.consecutiveFailures}/${failureThreshold}`,
        );
      }
      return;
    }

    recordTransition(event);

    if (event.kind === "alert") {
      logger.warn({ instance: instance.id, reason: event.reason }, `${instance.label} is UNHEALTHY`);
    } else {
      logger.info({ instance: instance.id }, `${instance.label} recovered`);
    }

    // The transition is already committed; a failed delivery does not undo it
    const result = await dispatcher.dispatch(event);

    if (result.status === "delivered") {
      logger.info(
        { instance: instance.id, kind: event.kind, attempts: result.attempts },
        `${event.kind === "alert" ? "Alert" : "Recovery"} notification sent for ${instance.label}`,
      );
    } else {
      logger.error(
        { instance: instance.id, kind: event.kind, reason: result.reason },
        `Failed to send ${event.kind} notification for ${instance.label}`,
      );
    }
  };

  const runCycle = async (signal?: AbortSignal) => {
    for (const instance of instances) {
      if (signal?.aborted) {
        logger.debug({ instance: instance.id }, "Shutdown requested; skipping rest of cycle");
        return;
      }

      try {
        await checkInstance(instance);
      } catch (error) {
        logger.error(
          { instance: instance.id, error },
          "Unexpected error while checking instance; skipped for this cycle",
        );
      }
    }
  };

  // Interval sleep in short slices so a shutdown is noticed promptly
  const waitForNextCycle = async (signal: AbortSignal) => {
    let remainingMs = options.checkIntervalSeconds * 1000;

    while (remainingMs > 0 && !signal.aborted) {
      const sliceDuration = Math.min(sliceMs, remainingMs);
      try {
        await sleep(sliceDuration, signal);
      } catch (error) {
        if (isAbortError(error)) return;
        throw error;
      }
      remainingMs -= sliceDuration;
    }
  };

  const sendStartupNotification = async () => {
    if (!options.startupMessage) return;

    try {
      const result = await dispatcher.deliver(options.startupMessage, "startup");
      if (result.status === "delivered") {
        logger.info("Startup notification sent");
      } else {
        logger.error({ reason: result.reason }, "Failed to send startup notification");
      }
    } catch (error) {
      logger.error({ error }, "Failed to send startup notification");
    }
  };

  return {
    async run(signal: AbortSignal) {
      if (phase !== "starting") {
        throw new Error(`Scheduler cannot run from phase ${phase}`);
      }

      logger.info({ instanceCount: instances.length }, "Starting scheduler...");
      await sendStartupNotification();

      logger.info(
        {
          instances: instances.map((instance) => instance.address),
          intervalSeconds: options.checkIntervalSeconds,
          threshold: failureThreshold,
        },
        "Monitoring started",
      );
      phase = "running";

      while (!signal.aborted) {
        await runCycle(signal);
        await waitForNextCycle(signal);
      }

      phase = "shutting_down";
      logger.info("Stopping scheduler...");
      phase = "stopped";
      logger.info("Scheduler stopped");
    },

    runCycle,

    getPhase(): SchedulerPhase {
      return phase;
    },

    getState(instanceId: string) {
      return states.get(instanceId);
    },

    getInstanceCount(): number {
      return instances.length;
    },
  };
}

export type { SchedulerOptions, SchedulerPhase } from "./types";
