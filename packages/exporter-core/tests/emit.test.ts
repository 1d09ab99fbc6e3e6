// SPDX-License-Identifier: LicenseRef-PolyForm-Shield-1.0.0
// SPDX-FileCopyrightText: 2025 Cogni-DAO

/**
 * Module: `@pipex/exporter-core/tests/emit`
 * Purpose: Unit tests for metric emission helpers and status expansion.
 * Scope: Test-only. Does not contain production code.
 * Side-effects: none
 * @internal
 */

import type { Logger } from "pino";
import { describe, expect, it, vi } from "vitest";

import { emitStatusMetric, MetricKind, storeSetMetric } from "../src/index";
import { FakeStore } from "./_fakes/fake-store";
import { noopLogger } from "./_fakes/fixtures";

const STATUSES = ["success", "failed", "skipped", "cancelled"] as const;
const labels = { project: "g1", ref: "main" };

describe("emitStatusMetric", () => {
  it("writes one metric per status when not sparse", async () => {
    const store = new FakeStore();

    await emitStatusMetric(
      { store, logger: noopLogger },
      MetricKind.Status,
      labels,
      STATUSES,
      "success",
      false
    );

    const written = store.ofKind(MetricKind.Status);
    expect(written).toHaveLength(4);
    expect(
      written.map((m) => [m.labels.status, m.value])
    ).toEqual([
      ["success", 1],
      ["failed", 0],
      ["skipped", 0],
      ["cancelled", 0],
    ]);
    expect(written[0]?.labels).toEqual({ ...labels, status: "success" });
  });

  it("writes only the current status when sparse", async () => {
    const store = new FakeStore();

    await emitStatusMetric(
      { store, logger: noopLogger },
      MetricKind.Status,
      labels,
      STATUSES,
      "success",
      true
    );

    expect(store.ofKind(MetricKind.Status)).toEqual([
      {
        kind: MetricKind.Status,
        labels: { ...labels, status: "success" },
        value: 1,
      },
    ]);
  });

  it("removes previously zeroed statuses when sparse", async () => {
    const store = new FakeStore();
    const deps = { store, logger: noopLogger };

    await emitStatusMetric(deps, MetricKind.Status, labels, STATUSES, "failed", false);
    await emitStatusMetric(deps, MetricKind.Status, labels, STATUSES, "success", true);

    expect(store.ofKind(MetricKind.Status).map((m) => m.labels.status)).toEqual([
      "success",
    ]);
  });
});

describe("storeSetMetric", () => {
  it("logs a failed write instead of throwing", async () => {
    const store = new FakeStore();
    vi.spyOn(store, "setMetric").mockRejectedValueOnce(new Error("disk full"));
    const error = vi.fn();
    const logger = { error } as unknown as Logger;

    await expect(
      storeSetMetric(
        { store, logger },
        { kind: MetricKind.Coverage, labels, value: 87.5 }
      )
    ).resolves.toBeUndefined();

    expect(error).toHaveBeenCalledTimes(1);
    expect(error.mock.calls[0]?.[1]).toBe("writing metric to the store");
  });
});
