import { describe, expect, test, vi } from "vitest";
import { createGrafanaInstance, createLokiInstance, successOutcome } from "../test-utils";
import type { Prober } from "./http";
import { createProber } from "./index";

describe("createProber", () => {
  test("dispatches on the instance's service kind", async () => {
    const loki = vi.fn<Prober>(async () => successOutcome(5));
    const grafana = vi.fn<Prober>(async () => ({ success: false, reason: "db", latencyMs: 7 }));
    const probe = createProber({ loki, grafana });

    const lokiInstance = createLokiInstance();
    const grafanaInstance = createGrafanaInstance();

    expect(await probe(lokiInstance, 3)).toEqual({ success: true, reason: "ok", latencyMs: 5 });
    expect(await probe(grafanaInstance, 4)).toEqual({ success: false, reason: "db", latencyMs: 7 });
    expect(loki).toHaveBeenCalledWith(lokiInstance, 3);
    expect(grafana).toHaveBeenCalledWith(grafanaInstance, 4);
  });

  test("lets unexpected errors propagate", async () => {
    const probe = createProber({
      loki: async () => {
        throw new Error("checker bug");
      },
      grafana: async () => successOutcome(),
    });

    await expect(probe(createLokiInstance(), 1)).rejects.toThrow("checker bug");
  });
});
