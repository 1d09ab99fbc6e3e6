// SPDX-License-Identifier: LicenseRef-PolyForm-Shield-1.0.0
// SPDX-FileCopyrightText: 2025 Cogni-DAO

/**
 * Module: `@pipex/exporter-core/test-reports`
 * Purpose: Flatten a pipeline test report into report-, suite- and case-level metrics.
 * Scope: Emitters only. Fetching the report is the pipeline processor's job.
 * Invariants:
 * - Labels come from the ref passed in; the store refresh only gates emission.
 * - SOFT_REFRESH_FAILURE: a failed ref refresh is logged and the emitter returns without writing.
 * - Case status expansion honours the refreshed project's sparse flag.
 * Side-effects: IO (store)
 * @public
 */

import type { Logger } from "pino";

import { emitStatusMetric, storeSetMetric } from "./emit";
import {
  defaultLabelsValues,
  refKey,
  testCaseLabels,
  testSuiteLabels,
} from "./labels";
import { MetricKind } from "./metrics";
import type { Ref, TestCase, TestReport, TestSuite } from "./model";
import type { ExporterStore } from "./ports";
import { TEST_CASE_STATUSES } from "./statuses";

export interface TestReportEmitterDeps {
  readonly store: ExporterStore;
  readonly logger: Logger;
}

export function createTestReportEmitters(deps: TestReportEmitterDeps) {
  const { store, logger } = deps;

  /**
   * Returns the stored copy of `ref` (or `ref` itself when none is stored),
   * or null when the store read failed.
   */
  async function refreshRef(
    ref: Ref,
    logFields: Record<string, unknown>,
    signal?: AbortSignal
  ): Promise<Ref | null> {
    try {
      return (await store.getRef(refKey(ref), signal)) ?? ref;
    } catch (err) {
      logger.error({ ...logFields, err }, "getting ref from the store");
      return null;
    }
  }

  async function processTestReportMetrics(
    ref: Ref,
    report: TestReport,
    signal?: AbortSignal
  ): Promise<void> {
    const logFields = { projectName: ref.project.name, ref: ref.name };
    const labels = defaultLabelsValues(ref);

    if (!(await refreshRef(ref, logFields, signal))) return;

    logger.trace(logFields, "processing test report metrics");

    const values: ReadonlyArray<readonly [MetricKind, number]> = [
      [MetricKind.TestReportErrorCount, report.errorCount],
      [MetricKind.TestReportFailedCount, report.failedCount],
      [MetricKind.TestReportSkippedCount, report.skippedCount],
      [MetricKind.TestReportSuccessCount, report.successCount],
      [MetricKind.TestReportTotalCount, report.totalCount],
      [MetricKind.TestReportTotalTime, report.totalTime],
    ];
    for (const [kind, value] of values) {
      await storeSetMetric(deps, { kind, labels, value }, signal);
    }
  }

  async function processTestSuiteMetrics(
    ref: Ref,
    suite: TestSuite,
    signal?: AbortSignal
  ): Promise<void> {
    const logFields = {
      projectName: ref.project.name,
      ref: ref.name,
      testSuiteName: suite.name,
    };
    const labels = testSuiteLabels(ref, suite);

    if (!(await refreshRef(ref, logFields, signal))) return;

    logger.trace(logFields, "processing test suite metrics");

    const values: ReadonlyArray<readonly [MetricKind, number]> = [
      [MetricKind.TestSuiteErrorCount, suite.errorCount],
      [MetricKind.TestSuiteFailedCount, suite.failedCount],
      [MetricKind.TestSuiteSkippedCount, suite.skippedCount],
      [MetricKind.TestSuiteSuccessCount, suite.successCount],
      [MetricKind.TestSuiteTotalCount, suite.totalCount],
      [MetricKind.TestSuiteTotalTime, suite.totalTime],
    ];
    for (const [kind, value] of values) {
      await storeSetMetric(deps, { kind, labels, value }, signal);
    }
  }

  async function processTestCaseMetrics(
    ref: Ref,
    suite: TestSuite,
    testCase: TestCase,
    signal?: AbortSignal
  ): Promise<void> {
    const logFields = {
      projectName: ref.project.name,
      ref: ref.name,
      testSuiteName: suite.name,
      testCaseName: testCase.name,
      testCaseStatus: testCase.status,
    };
    const labels = testCaseLabels(ref, suite, testCase);

    const current = await refreshRef(ref, logFields, signal);
    if (!current) return;

    logger.trace(logFields, "processing test case metrics");

    await storeSetMetric(
      deps,
      {
        kind: MetricKind.TestCaseExecutionTime,
        labels,
        value: testCase.executionTime,
      },
      signal
    );

    await emitStatusMetric(
      deps,
      MetricKind.TestCaseStatus,
      labels,
      TEST_CASE_STATUSES,
      testCase.status,
      current.project.outputSparseStatusMetrics,
      signal
    );
  }

  return {
    processTestReportMetrics,
    processTestSuiteMetrics,
    processTestCaseMetrics,
  };
}

export type TestReportEmitters = ReturnType<typeof createTestReportEmitters>;
