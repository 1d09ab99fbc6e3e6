// SPDX-License-Identifier: LicenseRef-PolyForm-Shield-1.0.0
// SPDX-FileCopyrightText: 2025 Cogni-DAO

/**
 * Module: `exporter-worker/adapters/store/memory-store`
 * Purpose: Process-local ExporterStore backed by Maps.
 * Scope: Single-process deployments and tests. State is lost on restart.
 * Invariants:
 * - Metric identity is metricKey(kind, labels); last write wins.
 * - Every call rejects once the caller's signal has fired.
 * Side-effects: none (in-memory)
 * @internal
 */

import type {
  ExporterStore,
  Labels,
  Metric,
  MetricKind,
  Pipeline,
  Ref,
} from "@pipex/exporter-core";
import { metricKey, refKey } from "@pipex/exporter-core";

export class MemoryStore implements ExporterStore {
  private readonly refs = new Map<string, Ref>();
  private readonly metrics = new Map<string, Metric>();
  private readonly pipelineVariables = new Map<number, string>();

  async getRef(key: string, signal?: AbortSignal): Promise<Ref | undefined> {
    signal?.throwIfAborted();
    return this.refs.get(key);
  }

  async setRef(ref: Ref, signal?: AbortSignal): Promise<void> {
    signal?.throwIfAborted();
    this.refs.set(refKey(ref), ref);
  }

  async getMetric(
    kind: MetricKind,
    labels: Labels,
    signal?: AbortSignal
  ): Promise<Metric | undefined> {
    signal?.throwIfAborted();
    return this.metrics.get(metricKey(kind, labels));
  }

  async setMetric(metric: Metric, signal?: AbortSignal): Promise<void> {
    signal?.throwIfAborted();
    this.metrics.set(metricKey(metric.kind, metric.labels), {
      kind: metric.kind,
      labels: { ...metric.labels },
      value: metric.value,
    });
  }

  async delMetric(
    kind: MetricKind,
    labels: Labels,
    signal?: AbortSignal
  ): Promise<void> {
    signal?.throwIfAborted();
    this.metrics.delete(metricKey(kind, labels));
  }

  async listMetrics(signal?: AbortSignal): Promise<Metric[]> {
    signal?.throwIfAborted();
    return [...this.metrics.values()];
  }

  async pipelineVariablesExist(
    pipeline: Pipeline,
    signal?: AbortSignal
  ): Promise<boolean> {
    signal?.throwIfAborted();
    return this.pipelineVariables.has(pipeline.id);
  }

  async getPipelineVariables(
    pipeline: Pipeline,
    signal?: AbortSignal
  ): Promise<string> {
    signal?.throwIfAborted();
    return this.pipelineVariables.get(pipeline.id) ?? "";
  }

  async setPipelineVariables(
    pipeline: Pipeline,
    variables: string,
    signal?: AbortSignal
  ): Promise<void> {
    signal?.throwIfAborted();
    this.pipelineVariables.set(pipeline.id, variables);
  }
}
