// SPDX-License-Identifier: LicenseRef-PolyForm-Shield-1.0.0
// SPDX-FileCopyrightText: 2025 Cogni-DAO

/**
 * Module: `@pipex/exporter-core/ports`
 * Purpose: Port interfaces for the collaborators the reconciler depends on: state store, CI client and job-metrics puller.
 * Scope: Pure interfaces. Implementations live in services/exporter-worker/src/adapters/.
 * Invariants:
 * - ADAPTERS_NOT_IN_CORE: no HTTP or storage deps here.
 * - CANCELLATION_THREADED: every call accepts the caller's AbortSignal and may reject once it fires.
 * - Store access is plain get/set; no multi-key transactions, no compare-and-swap.
 * Side-effects: none
 * @public
 */

import type { Labels, Metric, MetricKind } from "./metrics";
import type {
  Job,
  Pipeline,
  PipelineSummary,
  Ref,
  TestReport,
} from "./model";

/**
 * Durable keyed state for refs, metrics and per-pipeline variables.
 * Absent records resolve to `undefined`; only I/O failures reject.
 */
export interface ExporterStore {
  getRef(key: string, signal?: AbortSignal): Promise<Ref | undefined>;
  setRef(ref: Ref, signal?: AbortSignal): Promise<void>;

  getMetric(
    kind: MetricKind,
    labels: Labels,
    signal?: AbortSignal
  ): Promise<Metric | undefined>;
  setMetric(metric: Metric, signal?: AbortSignal): Promise<void>;
  delMetric(
    kind: MetricKind,
    labels: Labels,
    signal?: AbortSignal
  ): Promise<void>;
  listMetrics(signal?: AbortSignal): Promise<Metric[]>;

  pipelineVariablesExist(
    pipeline: Pipeline,
    signal?: AbortSignal
  ): Promise<boolean>;
  getPipelineVariables(
    pipeline: Pipeline,
    signal?: AbortSignal
  ): Promise<string>;
  setPipelineVariables(
    pipeline: Pipeline,
    variables: string,
    signal?: AbortSignal
  ): Promise<void>;
}

/**
 * Remote CI API. Pagination, auth and retries are the adapter's concern.
 */
export interface CiClient {
  /** Newest-first, single page of at most `perPage` entries */
  listProjectPipelines(
    projectName: string,
    refName: string,
    perPage: number,
    signal?: AbortSignal
  ): Promise<PipelineSummary[]>;
  getPipeline(
    projectName: string,
    pipelineId: number,
    signal?: AbortSignal
  ): Promise<Pipeline>;
  /** Variables filtered by the ref's project regexp, concatenated as `key:value,...` */
  getPipelineVariables(
    ref: Ref,
    pipeline: Pipeline,
    signal?: AbortSignal
  ): Promise<string>;
  getPipelineTestReport(
    projectName: string,
    pipelineId: number,
    signal?: AbortSignal
  ): Promise<TestReport>;
  listPipelineJobs(
    projectName: string,
    pipelineId: number,
    signal?: AbortSignal
  ): Promise<Job[]>;
}

export interface JobMetricsPuller {
  /** Every job of the ref's latest pipeline */
  pullRefPipelineJobsMetrics(ref: Ref, signal?: AbortSignal): Promise<void>;
  /** Only jobs that changed since the ref's last recorded jobs */
  pullRefMostRecentJobsMetrics(ref: Ref, signal?: AbortSignal): Promise<void>;
}
