// SPDX-License-Identifier: LicenseRef-PolyForm-Shield-1.0.0
// SPDX-FileCopyrightText: 2025 Cogni-DAO

/**
 * Module: `@pipex/exporter-core/pipelines`
 * Purpose: Reconcile a ref's pipeline history against the remote CI and emit pipeline-level metrics.
 * Scope: pullRefMetrics (entry point) and processPipelinesMetrics. Does not decide which refs to pull or when.
 * Invariants:
 * - STORE_REFRESH_FIRST: the caller's ref may be stale; it is re-read from the store before use.
 * - OLDEST_FIRST: the remote lists newest-first; pipelines are processed in reverse.
 * - PER_PIPELINE_ISOLATION: one failing pipeline is logged and does not stop the batch.
 * - ID_ONLY_CHANGE_DETECTION: only a new pipeline ID re-emits pipeline metrics; a status change on a
 *   known ID takes the most-recent-jobs path. Comparing the whole pipeline snapshot is a known gap.
 * - RUN_COUNT_STARTS_AT_ZERO: the first reconciliation of a ref never increments the run count.
 * - VARIABLES_FETCHED_ONCE: pipeline variables come from the store once cached for a pipeline ID.
 * - The caller's ref object is never mutated; working copies are spread.
 * Side-effects: IO (remote CI, store)
 * @public
 */

import type { Logger } from "pino";

import { emitStatusMetric, storeGetMetric, storeSetMetric } from "./emit";
import { PipelineListError, PipelineVariablesError } from "./errors";
import { remoteRefName } from "./helpers";
import { defaultLabelsValues, refKey } from "./labels";
import { MetricKind } from "./metrics";
import type { Pipeline, PipelineSummary, Ref } from "./model";
import type { CiClient, ExporterStore, JobMetricsPuller } from "./ports";
import { isTerminalPipelineStatus, PIPELINE_STATUSES } from "./statuses";
import { createTestReportEmitters } from "./test-reports";

export interface PipelineControllerDeps {
  readonly store: ExporterStore;
  readonly client: CiClient;
  readonly jobs: JobMetricsPuller;
  readonly logger: Logger;
}

function refLogFields(ref: Ref): Record<string, unknown> {
  return {
    projectName: ref.project.name,
    ref: ref.name,
    refKind: ref.kind,
  };
}

export function createPipelineController(deps: PipelineControllerDeps) {
  const { store, client, jobs, logger } = deps;
  const testReports = createTestReportEmitters(deps);

  /**
   * Lists the latest pipelines of `ref` and processes them oldest to newest.
   * @throws when the store refresh or the pipeline listing fails
   */
  async function pullRefMetrics(ref: Ref, signal?: AbortSignal): Promise<void> {
    const current = (await store.getRef(refKey(ref), signal)) ?? ref;
    const logFields = refLogFields(current);

    const refName = remoteRefName(current.kind, current.name);

    let pipelines: PipelineSummary[];
    try {
      pipelines = await client.listProjectPipelines(
        current.project.name,
        refName,
        current.project.pull.pipeline.perRef,
        signal
      );
    } catch (err) {
      throw new PipelineListError(current.project.name, refName, {
        cause: err,
      });
    }

    if (pipelines.length === 0) {
      logger.debug(logFields, "could not find any pipeline for the ref");
      return;
    }

    // Every pipeline is diffed against the same refreshed ref so that
    // latestPipeline ends on the newest one once the loop completes.
    for (const summary of [...pipelines].reverse()) {
      try {
        await processPipelinesMetrics(current, summary, signal);
      } catch (err) {
        logger.error(
          { ...logFields, pipelineId: summary.id, err },
          "processing pipeline metrics failed"
        );
      }
    }
  }

  /**
   * Fetched variables are stored before a fetch failure is raised, so a
   * pipeline ID is never queried for its variables twice. Store errors on
   * the variables cache are logged only; the remote failure is the one raised.
   */
  async function resolvePipelineVariables(
    ref: Ref,
    pipeline: Pipeline,
    signal?: AbortSignal
  ): Promise<string> {
    const logFields = { ...refLogFields(ref), pipelineId: pipeline.id };

    let cached = false;
    try {
      cached = await store.pipelineVariablesExist(pipeline, signal);
    } catch (err) {
      logger.error(
        { ...logFields, err },
        "checking pipeline variables in the store"
      );
    }

    if (cached) {
      try {
        return await store.getPipelineVariables(pipeline, signal);
      } catch (err) {
        logger.error(
          { ...logFields, err },
          "reading pipeline variables from the store"
        );
        return "";
      }
    }

    let variables = "";
    let fetchFailure: { readonly cause: unknown } | null = null;
    try {
      variables = await client.getPipelineVariables(ref, pipeline, signal);
    } catch (err) {
      fetchFailure = { cause: err };
    }

    try {
      await store.setPipelineVariables(pipeline, variables, signal);
    } catch (err) {
      logger.error(
        { ...logFields, err },
        "writing pipeline variables to the store"
      );
    }

    if (fetchFailure) {
      throw new PipelineVariablesError(
        ref.project.name,
        pipeline.id,
        fetchFailure
      );
    }
    return variables;
  }

  async function processPipelinesMetrics(
    ref: Ref,
    summary: PipelineSummary,
    signal?: AbortSignal
  ): Promise<void> {
    let pipeline = await client.getPipeline(
      ref.project.name,
      summary.id,
      signal
    );

    if (ref.project.pull.pipeline.variables.enabled) {
      const variables = await resolvePipelineVariables(ref, pipeline, signal);
      pipeline = { ...pipeline, variables };
    }

    // Absent ID metric reads as this pipeline's own ID
    const storedId = await storeGetMetric(
      deps,
      MetricKind.ID,
      defaultLabelsValues(ref, pipeline),
      signal
    );
    const previousId = storedId?.value ?? pipeline.id;

    let working: Ref = ref;

    if (ref.latestPipeline.id === 0 || previousId !== pipeline.id) {
      const formerPipeline = ref.latestPipeline;
      working = { ...ref, latestPipeline: pipeline };

      await store.setRef(working, signal);

      const labels = defaultLabelsValues(working);

      const runCount = await storeGetMetric(
        deps,
        MetricKind.RunCount,
        labels,
        signal
      );
      let runCountValue = runCount?.value ?? 0;
      if (formerPipeline.id !== 0 && formerPipeline.id !== pipeline.id) {
        runCountValue++;
      }

      await storeSetMetric(
        deps,
        { kind: MetricKind.RunCount, labels, value: runCountValue },
        signal
      );
      await storeSetMetric(
        deps,
        { kind: MetricKind.Coverage, labels, value: pipeline.coverage },
        signal
      );
      await storeSetMetric(
        deps,
        { kind: MetricKind.ID, labels, value: pipeline.id },
        signal
      );
      await emitStatusMetric(
        deps,
        MetricKind.Status,
        labels,
        PIPELINE_STATUSES,
        pipeline.status,
        working.project.outputSparseStatusMetrics,
        signal
      );
      await storeSetMetric(
        deps,
        {
          kind: MetricKind.DurationSeconds,
          labels,
          value: pipeline.durationSeconds,
        },
        signal
      );
      await storeSetMetric(
        deps,
        {
          kind: MetricKind.QueuedDurationSeconds,
          labels,
          value: pipeline.queuedDurationSeconds,
        },
        signal
      );
      await storeSetMetric(
        deps,
        { kind: MetricKind.Timestamp, labels, value: pipeline.timestamp },
        signal
      );

      if (working.project.pull.pipeline.jobs.enabled) {
        await jobs.pullRefPipelineJobsMetrics(working, signal);
      }
    } else {
      await jobs.pullRefMostRecentJobsMetrics(working, signal);
    }

    const testReportsConfig = working.project.pull.pipeline.testReports;
    if (
      testReportsConfig.enabled &&
      isTerminalPipelineStatus(working.latestPipeline.status)
    ) {
      const report = await client.getPipelineTestReport(
        working.project.name,
        working.latestPipeline.id,
        signal
      );
      working = {
        ...working,
        latestPipeline: { ...working.latestPipeline, testReport: report },
      };

      await testReports.processTestReportMetrics(working, report, signal);

      for (const suite of report.testSuites) {
        await testReports.processTestSuiteMetrics(working, suite, signal);
        if (testReportsConfig.testCases.enabled) {
          for (const testCase of suite.testCases) {
            await testReports.processTestCaseMetrics(
              working,
              suite,
              testCase,
              signal
            );
          }
        }
      }
    }
  }

  return {
    pullRefMetrics,
    processPipelinesMetrics,
    ...testReports,
  };
}

export type PipelineController = ReturnType<typeof createPipelineController>;
