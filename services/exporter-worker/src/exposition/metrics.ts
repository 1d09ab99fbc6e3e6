// SPDX-License-Identifier: LicenseRef-PolyForm-Shield-1.0.0
// SPDX-FileCopyrightText: 2025 Cogni-DAO

/**
 * Module: `@pipex/exporter-worker/exposition/metrics`
 * Purpose: Render stored metrics in the Prometheus text format.
 * Scope: Builds a fresh prom-client Registry per scrape from ExporterStore.listMetrics(). Does not define HTTP transport.
 * Invariants:
 * - One gauge per metric kind, named `gitlab_ci_pipeline_<kind>`.
 * - Only declared label names are exported; extra labels on a stored metric are dropped.
 * Side-effects: IO (store read)
 * @public
 */

import type { ExporterStore, MetricKind } from "@pipex/exporter-core";
import { METRIC_KINDS, REF_LABEL_NAMES } from "@pipex/exporter-core";
import { Gauge, Registry } from "prom-client";

export const METRIC_PREFIX = "gitlab_ci_pipeline";

const HELP: Record<MetricKind, string> = {
  coverage: "Coverage of the most recent pipeline",
  duration_seconds: "Duration in seconds of the most recent pipeline",
  id: "ID of the most recent pipeline",
  queued_duration_seconds:
    "Duration in seconds the most recent pipeline has been queued before starting",
  run_count: "Number of executions of a pipeline",
  status: "Status of the most recent pipeline",
  timestamp: "Timestamp of the last update of the most recent pipeline",
  test_report_error_count:
    "Number of errored tests in the most recent pipeline test report",
  test_report_failed_count:
    "Number of failed tests in the most recent pipeline test report",
  test_report_skipped_count:
    "Number of skipped tests in the most recent pipeline test report",
  test_report_success_count:
    "Number of successful tests in the most recent pipeline test report",
  test_report_total_count:
    "Number of total tests in the most recent pipeline test report",
  test_report_total_time:
    "Duration in seconds of all the tests in the most recent pipeline test report",
  test_suite_error_count: "Number of errors for the test suite",
  test_suite_failed_count: "Number of failures for the test suite",
  test_suite_skipped_count: "Number of skipped tests for the test suite",
  test_suite_success_count: "Number of successful tests for the test suite",
  test_suite_total_count: "Number of tests for the test suite",
  test_suite_total_time: "Duration in seconds for the test suite",
  test_case_execution_time: "Duration in seconds of the test case",
  test_case_status: "Status of the test case",
  job_id: "ID of the most recent job",
  job_run_count: "Number of executions of a job",
  job_status: "Status of the most recent job",
  job_duration_seconds: "Duration in seconds of the most recent job",
  job_queued_duration_seconds:
    "Duration in seconds the most recent job has been queued before starting",
  job_timestamp: "Creation timestamp of the most recent job",
};

/**
 * Label names declared for `kind`, in exposition order.
 */
export function labelNamesFor(kind: MetricKind): string[] {
  const names: string[] = [...REF_LABEL_NAMES];

  if (kind.startsWith("test_suite_") || kind.startsWith("test_case_")) {
    names.push("test_suite_name");
  }
  if (kind.startsWith("test_case_")) {
    names.push("test_case_name", "test_case_classname");
  }
  if (kind.startsWith("job_")) {
    names.push("stage", "job_name");
  }
  if (kind === "status" || kind === "test_case_status" || kind === "job_status") {
    names.push("status");
  }
  return names;
}

export interface RenderedMetrics {
  readonly contentType: string;
  readonly body: string;
}

export async function renderMetrics(
  store: ExporterStore,
  signal?: AbortSignal
): Promise<RenderedMetrics> {
  const registry = new Registry();
  const gauges = new Map<MetricKind, { gauge: Gauge; labelNames: string[] }>();

  for (const kind of METRIC_KINDS) {
    const labelNames = labelNamesFor(kind);
    gauges.set(kind, {
      gauge: new Gauge({
        name: `${METRIC_PREFIX}_${kind}`,
        help: HELP[kind],
        labelNames,
        registers: [registry],
      }),
      labelNames,
    });
  }

  for (const metric of await store.listMetrics(signal)) {
    const entry = gauges.get(metric.kind);
    if (!entry) continue;

    const labels: Record<string, string> = {};
    for (const name of entry.labelNames) {
      labels[name] = metric.labels[name] ?? "";
    }
    entry.gauge.set(labels, metric.value);
  }

  return {
    contentType: registry.contentType,
    body: await registry.metrics(),
  };
}
