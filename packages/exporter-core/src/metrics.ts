// SPDX-License-Identifier: LicenseRef-PolyForm-Shield-1.0.0
// SPDX-FileCopyrightText: 2025 Cogni-DAO

/**
 * Module: `@pipex/exporter-core/metrics`
 * Purpose: Metric kinds, metric records and deterministic metric identity.
 * Scope: Pure types and helpers. Does not write to any store.
 * Invariants:
 * - METRIC_IDENTITY: (kind, labels) identifies a metric; label key order never affects identity.
 * - Last write wins per identity.
 * Side-effects: none
 * @public
 */

import { canonicalJson } from "./helpers";

export const MetricKind = {
  Coverage: "coverage",
  DurationSeconds: "duration_seconds",
  ID: "id",
  QueuedDurationSeconds: "queued_duration_seconds",
  RunCount: "run_count",
  Status: "status",
  Timestamp: "timestamp",
  TestReportErrorCount: "test_report_error_count",
  TestReportFailedCount: "test_report_failed_count",
  TestReportSkippedCount: "test_report_skipped_count",
  TestReportSuccessCount: "test_report_success_count",
  TestReportTotalCount: "test_report_total_count",
  TestReportTotalTime: "test_report_total_time",
  TestSuiteErrorCount: "test_suite_error_count",
  TestSuiteFailedCount: "test_suite_failed_count",
  TestSuiteSkippedCount: "test_suite_skipped_count",
  TestSuiteSuccessCount: "test_suite_success_count",
  TestSuiteTotalCount: "test_suite_total_count",
  TestSuiteTotalTime: "test_suite_total_time",
  TestCaseExecutionTime: "test_case_execution_time",
  TestCaseStatus: "test_case_status",
  JobID: "job_id",
  JobRunCount: "job_run_count",
  JobStatus: "job_status",
  JobDurationSeconds: "job_duration_seconds",
  JobQueuedDurationSeconds: "job_queued_duration_seconds",
  JobTimestamp: "job_timestamp",
} as const;

export type MetricKind = (typeof MetricKind)[keyof typeof MetricKind];

export const METRIC_KINDS: readonly MetricKind[] = Object.values(MetricKind);

export type Labels = Readonly<Record<string, string>>;

export interface Metric {
  readonly kind: MetricKind;
  readonly labels: Labels;
  readonly value: number;
}

/**
 * Stable key for a metric identity.
 *
 * @example
 * metricKey("coverage", { ref: "main", project: "g1" })
 * // => 'coverage:{"project":"g1","ref":"main"}'
 */
export function metricKey(kind: MetricKind, labels: Labels): string {
  return `${kind}:${canonicalJson(labels)}`;
}
