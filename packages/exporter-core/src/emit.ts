// SPDX-License-Identifier: LicenseRef-PolyForm-Shield-1.0.0
// SPDX-FileCopyrightText: 2025 Cogni-DAO

/**
 * Module: `@pipex/exporter-core/emit`
 * Purpose: Metric emission helpers: logged store writes/reads and one-hot status expansion.
 * Scope: Writes metrics into the store. Store failures are logged here and never propagated.
 * Invariants:
 * - Non-sparse status expansion writes exactly one metric per enumerated status (1 for the current one, 0 otherwise).
 * - Sparse status expansion writes only the current status and deletes the others.
 * Side-effects: IO (store)
 * @public
 */

import type { Logger } from "pino";

import type { Labels, Metric, MetricKind } from "./metrics";
import type { ExporterStore } from "./ports";

export interface EmitDeps {
  readonly store: ExporterStore;
  readonly logger: Logger;
}

export async function storeSetMetric(
  deps: EmitDeps,
  metric: Metric,
  signal?: AbortSignal
): Promise<void> {
  try {
    await deps.store.setMetric(metric, signal);
  } catch (err) {
    deps.logger.error(
      { err, metricKind: metric.kind, metricLabels: metric.labels },
      "writing metric to the store"
    );
  }
}

export async function storeDelMetric(
  deps: EmitDeps,
  kind: MetricKind,
  labels: Labels,
  signal?: AbortSignal
): Promise<void> {
  try {
    await deps.store.delMetric(kind, labels, signal);
  } catch (err) {
    deps.logger.error(
      { err, metricKind: kind, metricLabels: labels },
      "deleting metric from the store"
    );
  }
}

/**
 * Reads a metric; a failed read is logged and treated as absent.
 */
export async function storeGetMetric(
  deps: EmitDeps,
  kind: MetricKind,
  labels: Labels,
  signal?: AbortSignal
): Promise<Metric | undefined> {
  try {
    return await deps.store.getMetric(kind, labels, signal);
  } catch (err) {
    deps.logger.error(
      { err, metricKind: kind, metricLabels: labels },
      "reading metric from the store"
    );
    return undefined;
  }
}

/**
 * Expands `status` into one boolean metric per entry of `statuses`,
 * each labelled with its own `status`.
 */
export async function emitStatusMetric(
  deps: EmitDeps,
  kind: MetricKind,
  labels: Labels,
  statuses: readonly string[],
  status: string,
  sparse: boolean,
  signal?: AbortSignal
): Promise<void> {
  for (const current of statuses) {
    const statusLabels = { ...labels, status: current };

    if (current === status) {
      await storeSetMetric(
        deps,
        { kind, labels: statusLabels, value: 1 },
        signal
      );
    } else if (sparse) {
      await storeDelMetric(deps, kind, statusLabels, signal);
    } else {
      await storeSetMetric(
        deps,
        { kind, labels: statusLabels, value: 0 },
        signal
      );
    }
  }
}
