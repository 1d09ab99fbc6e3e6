// SPDX-License-Identifier: LicenseRef-PolyForm-Shield-1.0.0
// SPDX-FileCopyrightText: 2025 Cogni-DAO

/**
 * Module: `@pipex/exporter-core`
 * Purpose: Domain types, port interfaces and reconciliation logic for CI pipeline metrics.
 * Scope: Does not contain adapter deps, HTTP or storage implementations.
 * Invariants:
 * - ADAPTERS_NOT_IN_CORE: only types, pure helpers and port-driven logic here.
 * - No imports from services/.
 * Side-effects: none
 * @public
 */

export {
  emitStatusMetric,
  storeDelMetric,
  storeGetMetric,
  storeSetMetric,
} from "./emit";
export type { EmitDeps } from "./emit";
export {
  isPipelineListError,
  isPipelineVariablesError,
  PipelineListError,
  PipelineVariablesError,
} from "./errors";
export {
  buildRefKey,
  canonicalJson,
  concatenatePipelineVariables,
  remoteRefName,
} from "./helpers";
export type { PipelineVariable } from "./helpers";
export { createJobMetricsPuller } from "./jobs";
export type { JobMetricsDeps } from "./jobs";
export {
  defaultLabelsValues,
  jobLabels,
  REF_LABEL_NAMES,
  refKey,
  testCaseLabels,
  testSuiteLabels,
} from "./labels";
export { METRIC_KINDS, MetricKind, metricKey } from "./metrics";
export type { Labels, Metric } from "./metrics";
export { DEFAULT_PULL_CONFIG, EMPTY_PIPELINE, newRef } from "./model";
export type {
  Job,
  Pipeline,
  PipelineSummary,
  Project,
  ProjectPullConfig,
  Ref,
  RefKind,
  TestCase,
  TestReport,
  TestSuite,
} from "./model";
export { createPipelineController } from "./pipelines";
export type { PipelineController, PipelineControllerDeps } from "./pipelines";
export type { CiClient, ExporterStore, JobMetricsPuller } from "./ports";
export {
  isTerminalPipelineStatus,
  PIPELINE_STATUSES,
  TEST_CASE_STATUSES,
  TERMINAL_PIPELINE_STATUSES,
} from "./statuses";
export { createTestReportEmitters } from "./test-reports";
export type { TestReportEmitters } from "./test-reports";
