// SPDX-License-Identifier: LicenseRef-PolyForm-Shield-1.0.0
// SPDX-FileCopyrightText: 2025 Cogni-DAO

/**
 * Module: `@pipex/exporter-core/model`
 * Purpose: Domain types for pipeline reconciliation: refs, projects, pipelines, jobs and test reports.
 * Scope: Pure types and zero-value constructors. Does not contain I/O or adapter deps.
 * Invariants:
 * - NEVER_RECONCILED: `Ref.latestPipeline.id === 0` means the ref has never been reconciled.
 * - Pipeline IDs are assigned by the remote and never reused.
 * - All values are plain data; working copies are produced by spreading, never by mutation.
 * Side-effects: none
 * @public
 */

export type RefKind = "branch" | "tag" | "merge-request";

export interface TestCase {
  readonly name: string;
  readonly classname: string;
  readonly status: string;
  /** Seconds */
  readonly executionTime: number;
}

export interface TestSuite {
  readonly name: string;
  readonly totalTime: number;
  readonly totalCount: number;
  readonly successCount: number;
  readonly failedCount: number;
  readonly skippedCount: number;
  readonly errorCount: number;
  readonly testCases: readonly TestCase[];
}

export interface TestReport {
  readonly totalTime: number;
  readonly totalCount: number;
  readonly successCount: number;
  readonly failedCount: number;
  readonly skippedCount: number;
  readonly errorCount: number;
  readonly testSuites: readonly TestSuite[];
}

export interface Pipeline {
  readonly id: number;
  readonly status: string;
  /** Trigger source reported by the remote: "push", "schedule", "merge_request_event" */
  readonly source: string;
  readonly coverage: number;
  readonly durationSeconds: number;
  readonly queuedDurationSeconds: number;
  /** Unix seconds of the last remote update */
  readonly timestamp: number;
  /** Filtered, concatenated `key:value` pairs; empty unless variable pulling is enabled */
  readonly variables: string;
  readonly testReport?: TestReport;
}

/** Listing entry as returned by the remote before the detail fetch. */
export interface PipelineSummary {
  readonly id: number;
  readonly status: string;
}

export interface Job {
  readonly id: number;
  readonly name: string;
  readonly stage: string;
  readonly status: string;
  readonly durationSeconds: number;
  readonly queuedDurationSeconds: number;
  readonly timestamp: number;
}

export interface ProjectPullConfig {
  readonly pipeline: {
    /** Page size of the single pipeline listing page per pull */
    readonly perRef: number;
    readonly jobs: { readonly enabled: boolean };
    readonly variables: { readonly enabled: boolean; readonly regexp: string };
    readonly testReports: {
      readonly enabled: boolean;
      readonly testCases: { readonly enabled: boolean };
    };
  };
}

export interface Project {
  /** Full path on the remote, e.g. "group/app" */
  readonly name: string;
  /** Comma-separated topics, exposed as a label */
  readonly topics: string;
  /** Emit only the current status metric instead of a full one-hot set */
  readonly outputSparseStatusMetrics: boolean;
  readonly pull: ProjectPullConfig;
}

export interface Ref {
  readonly kind: RefKind;
  readonly name: string;
  readonly project: Project;
  readonly latestPipeline: Pipeline;
  /** Last processed job per job name */
  readonly latestJobs: Readonly<Record<string, Job>>;
}

export const EMPTY_PIPELINE: Pipeline = {
  id: 0,
  status: "",
  source: "",
  coverage: 0,
  durationSeconds: 0,
  queuedDurationSeconds: 0,
  timestamp: 0,
  variables: "",
};

export const DEFAULT_PULL_CONFIG: ProjectPullConfig = {
  pipeline: {
    perRef: 1,
    jobs: { enabled: false },
    variables: { enabled: false, regexp: ".*" },
    testReports: { enabled: false, testCases: { enabled: false } },
  },
};

/**
 * Builds a never-reconciled ref.
 */
export function newRef(
  project: Project,
  kind: RefKind,
  name: string
): Ref {
  return {
    kind,
    name,
    project,
    latestPipeline: EMPTY_PIPELINE,
    latestJobs: {},
  };
}
