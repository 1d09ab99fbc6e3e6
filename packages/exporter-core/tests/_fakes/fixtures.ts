// SPDX-License-Identifier: LicenseRef-PolyForm-Shield-1.0.0
// SPDX-FileCopyrightText: 2025 Cogni-DAO

/**
 * Module: `@pipex/exporter-core/tests/_fakes/fixtures`
 * Purpose: Reusable builders for projects, refs, pipelines, jobs and test reports.
 * Scope: Test-only. Pure functions.
 * Side-effects: none
 * @internal
 */

import pino from "pino";
import { vi } from "vitest";

import type {
  CiClient,
  Job,
  JobMetricsPuller,
  Pipeline,
  Project,
  Ref,
  TestReport,
} from "../../src/index";
import { DEFAULT_PULL_CONFIG, EMPTY_PIPELINE, newRef } from "../../src/index";

export const PROJECT_NAME = "g1/app";

export function makeProject(overrides?: {
  perRef?: number;
  jobs?: boolean;
  variables?: boolean;
  variablesRegexp?: string;
  testReports?: boolean;
  testCases?: boolean;
  sparse?: boolean;
}): Project {
  const base = DEFAULT_PULL_CONFIG.pipeline;
  return {
    name: PROJECT_NAME,
    topics: "",
    outputSparseStatusMetrics: overrides?.sparse ?? false,
    pull: {
      pipeline: {
        perRef: overrides?.perRef ?? base.perRef,
        jobs: { enabled: overrides?.jobs ?? false },
        variables: {
          enabled: overrides?.variables ?? false,
          regexp: overrides?.variablesRegexp ?? base.variables.regexp,
        },
        testReports: {
          enabled: overrides?.testReports ?? false,
          testCases: { enabled: overrides?.testCases ?? false },
        },
      },
    },
  };
}

export function makeRef(
  project: Project = makeProject(),
  name = "main"
): Ref {
  return newRef(project, "branch", name);
}

export function makePipeline(overrides?: Partial<Pipeline>): Pipeline {
  return {
    ...EMPTY_PIPELINE,
    id: 42,
    status: "running",
    source: "push",
    coverage: 87.5,
    durationSeconds: 120,
    queuedDurationSeconds: 3,
    timestamp: 1700000000,
    ...overrides,
  };
}

export function makeJob(overrides?: Partial<Job>): Job {
  return {
    id: 1001,
    name: "unit",
    stage: "test",
    status: "success",
    durationSeconds: 30,
    queuedDurationSeconds: 1,
    timestamp: 1700000100,
    ...overrides,
  };
}

export function makeTestReport(): TestReport {
  return {
    totalTime: 4.5,
    totalCount: 3,
    successCount: 2,
    failedCount: 1,
    skippedCount: 0,
    errorCount: 0,
    testSuites: [
      {
        name: "unit",
        totalTime: 4.5,
        totalCount: 3,
        successCount: 2,
        failedCount: 1,
        skippedCount: 0,
        errorCount: 0,
        testCases: [
          {
            name: "adds",
            classname: "MathTest",
            status: "success",
            executionTime: 1.5,
          },
          {
            name: "divides",
            classname: "MathTest",
            status: "failed",
            executionTime: 3,
          },
        ],
      },
    ],
  };
}

/**
 * CiClient whose pipelines are served from a map keyed by ID.
 * Listing returns `listed` IDs in the given (newest-first) order.
 */
export function makeCiClient(
  pipelines: readonly Pipeline[],
  listed: readonly number[] = pipelines.map((p) => p.id)
) {
  const byId = new Map(pipelines.map((p) => [p.id, p]));
  return {
    listProjectPipelines: vi.fn<CiClient["listProjectPipelines"]>(
      async () =>
        listed.map((id) => ({ id, status: byId.get(id)?.status ?? "" }))
    ),
    getPipeline: vi.fn<CiClient["getPipeline"]>(async (_project, id) => {
      const pipeline = byId.get(id);
      if (!pipeline) throw new Error(`pipeline ${id} not found`);
      return pipeline;
    }),
    getPipelineVariables: vi.fn<CiClient["getPipelineVariables"]>(
      async () => "DEPLOY:true"
    ),
    getPipelineTestReport: vi.fn<CiClient["getPipelineTestReport"]>(
      async () => makeTestReport()
    ),
    listPipelineJobs: vi.fn<CiClient["listPipelineJobs"]>(async () => []),
  } satisfies CiClient;
}

export function makeJobsPuller() {
  return {
    pullRefPipelineJobsMetrics: vi.fn<
      JobMetricsPuller["pullRefPipelineJobsMetrics"]
    >(async () => undefined),
    pullRefMostRecentJobsMetrics: vi.fn<
      JobMetricsPuller["pullRefMostRecentJobsMetrics"]
    >(async () => undefined),
  } satisfies JobMetricsPuller;
}

export const noopLogger = pino({ enabled: false });
