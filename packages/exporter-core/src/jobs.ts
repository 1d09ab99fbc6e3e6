// SPDX-License-Identifier: LicenseRef-PolyForm-Shield-1.0.0
// SPDX-FileCopyrightText: 2025 Cogni-DAO

/**
 * Module: `@pipex/exporter-core/jobs`
 * Purpose: JobMetricsPuller implementation: job-level metrics for a ref's latest pipeline.
 * Scope: Lists jobs through the CiClient port, records the last job per name on the ref and emits job metrics.
 * Invariants:
 * - No-op unless job pulling is enabled for the ref's project.
 * - A job identical (ID and status) to the recorded one is not re-emitted.
 * - Job run count increments only when a job name gets a new job ID.
 * Side-effects: IO (remote CI, store)
 * @public
 */

import type { Logger } from "pino";

import { emitStatusMetric, storeGetMetric, storeSetMetric } from "./emit";
import { jobLabels } from "./labels";
import { MetricKind } from "./metrics";
import type { Job, Ref } from "./model";
import type { CiClient, ExporterStore, JobMetricsPuller } from "./ports";
import { PIPELINE_STATUSES } from "./statuses";

export interface JobMetricsDeps {
  readonly store: ExporterStore;
  readonly client: CiClient;
  readonly logger: Logger;
}

function isSameJob(former: Job | undefined, job: Job): boolean {
  return (
    former !== undefined &&
    former.id === job.id &&
    former.status === job.status
  );
}

export function createJobMetricsPuller(
  deps: JobMetricsDeps
): JobMetricsPuller & {
  processJobMetrics(ref: Ref, job: Job, signal?: AbortSignal): Promise<Ref>;
} {
  const { store, client, logger } = deps;

  /**
   * @returns the ref with `job` recorded, persisted when it changed
   */
  async function processJobMetrics(
    ref: Ref,
    job: Job,
    signal?: AbortSignal
  ): Promise<Ref> {
    const former: Job | undefined = ref.latestJobs[job.name];
    if (isSameJob(former, job)) return ref;

    const updated: Ref = {
      ...ref,
      latestJobs: { ...ref.latestJobs, [job.name]: job },
    };
    await store.setRef(updated, signal);

    const labels = jobLabels(updated, job);

    const runCount = await storeGetMetric(
      deps,
      MetricKind.JobRunCount,
      labels,
      signal
    );
    let runCountValue = runCount?.value ?? 0;
    if (former !== undefined && former.id !== job.id) {
      runCountValue++;
    }

    await storeSetMetric(
      deps,
      { kind: MetricKind.JobRunCount, labels, value: runCountValue },
      signal
    );
    await storeSetMetric(
      deps,
      { kind: MetricKind.JobID, labels, value: job.id },
      signal
    );
    await storeSetMetric(
      deps,
      {
        kind: MetricKind.JobDurationSeconds,
        labels,
        value: job.durationSeconds,
      },
      signal
    );
    await storeSetMetric(
      deps,
      {
        kind: MetricKind.JobQueuedDurationSeconds,
        labels,
        value: job.queuedDurationSeconds,
      },
      signal
    );
    await storeSetMetric(
      deps,
      { kind: MetricKind.JobTimestamp, labels, value: job.timestamp },
      signal
    );
    await emitStatusMetric(
      deps,
      MetricKind.JobStatus,
      labels,
      PIPELINE_STATUSES,
      job.status,
      updated.project.outputSparseStatusMetrics,
      signal
    );

    return updated;
  }

  async function processJobs(
    ref: Ref,
    jobs: readonly Job[],
    signal?: AbortSignal
  ): Promise<void> {
    let current = ref;
    for (const job of jobs) {
      current = await processJobMetrics(current, job, signal);
    }
  }

  async function pullRefPipelineJobsMetrics(
    ref: Ref,
    signal?: AbortSignal
  ): Promise<void> {
    if (!ref.project.pull.pipeline.jobs.enabled) return;
    if (ref.latestPipeline.id === 0) return;

    const jobs = await client.listPipelineJobs(
      ref.project.name,
      ref.latestPipeline.id,
      signal
    );
    logger.debug(
      {
        projectName: ref.project.name,
        ref: ref.name,
        pipelineId: ref.latestPipeline.id,
        jobCount: jobs.length,
      },
      "pulling pipeline jobs metrics"
    );
    await processJobs(ref, jobs, signal);
  }

  async function pullRefMostRecentJobsMetrics(
    ref: Ref,
    signal?: AbortSignal
  ): Promise<void> {
    if (!ref.project.pull.pipeline.jobs.enabled) return;

    if (Object.keys(ref.latestJobs).length === 0) {
      await pullRefPipelineJobsMetrics(ref, signal);
      return;
    }

    const jobs = await client.listPipelineJobs(
      ref.project.name,
      ref.latestPipeline.id,
      signal
    );
    const changed = jobs.filter(
      (job) => !isSameJob(ref.latestJobs[job.name], job)
    );
    logger.debug(
      {
        projectName: ref.project.name,
        ref: ref.name,
        pipelineId: ref.latestPipeline.id,
        jobCount: changed.length,
      },
      "pulling most recent jobs metrics"
    );
    await processJobs(ref, changed, signal);
  }

  return {
    pullRefPipelineJobsMetrics,
    pullRefMostRecentJobsMetrics,
    processJobMetrics,
  };
}
