// SPDX-License-Identifier: LicenseRef-PolyForm-Shield-1.0.0
// SPDX-FileCopyrightText: 2025 Cogni-DAO

/**
 * Module: `exporter-worker/adapters/gitlab/schemas`
 * Purpose: Zod schemas for the GitLab REST v4 payloads the adapter reads, and their mapping to core types.
 * Scope: Only the fields the exporter uses; unknown fields are stripped.
 * Invariants:
 * - Null durations map to 0; unparseable coverage maps to 0.
 * - Timestamps are whole unix seconds.
 * Side-effects: none
 * @internal
 */

import type {
  Job,
  Pipeline,
  PipelineSummary,
  TestReport,
} from "@pipex/exporter-core";
import { EMPTY_PIPELINE } from "@pipex/exporter-core";
import { z } from "zod";

function unixSeconds(iso: string | null | undefined): number {
  if (!iso) return 0;
  const ms = Date.parse(iso);
  return Number.isNaN(ms) ? 0 : Math.floor(ms / 1000);
}

export const PipelineSummarySchema = z.object({
  id: z.number().int(),
  status: z.string(),
});

export const PipelineListSchema = z.array(PipelineSummarySchema);

export const PipelineDetailSchema = z.object({
  id: z.number().int(),
  status: z.string(),
  source: z.string().nullish(),
  coverage: z.string().nullish(),
  duration: z.number().nullish(),
  queued_duration: z.number().nullish(),
  updated_at: z.string().nullish(),
});

export const PipelineVariablesSchema = z.array(
  z.object({
    key: z.string(),
    value: z.string(),
  })
);

const countsShape = {
  total_time: z.number().default(0),
  total_count: z.number().int().default(0),
  success_count: z.number().int().default(0),
  failed_count: z.number().int().default(0),
  skipped_count: z.number().int().default(0),
  error_count: z.number().int().default(0),
};

const TestCaseSchema = z.object({
  name: z.string(),
  classname: z.string().nullish(),
  status: z.string(),
  execution_time: z.number().nullish(),
});

const TestSuiteSchema = z.object({
  name: z.string(),
  ...countsShape,
  test_cases: z.array(TestCaseSchema).default([]),
});

export const TestReportSchema = z.object({
  ...countsShape,
  test_suites: z.array(TestSuiteSchema).default([]),
});

export const JobSchema = z.object({
  id: z.number().int(),
  name: z.string(),
  stage: z.string(),
  status: z.string(),
  duration: z.number().nullish(),
  queued_duration: z.number().nullish(),
  created_at: z.string().nullish(),
});

export const JobListSchema = z.array(JobSchema);

export function toPipelineSummary(
  raw: z.infer<typeof PipelineSummarySchema>
): PipelineSummary {
  return { id: raw.id, status: raw.status };
}

export function toPipeline(raw: z.infer<typeof PipelineDetailSchema>): Pipeline {
  const coverage = raw.coverage ? Number.parseFloat(raw.coverage) : 0;
  return {
    ...EMPTY_PIPELINE,
    id: raw.id,
    status: raw.status,
    source: raw.source ?? "",
    coverage: Number.isNaN(coverage) ? 0 : coverage,
    durationSeconds: raw.duration ?? 0,
    queuedDurationSeconds: raw.queued_duration ?? 0,
    timestamp: unixSeconds(raw.updated_at),
  };
}

export function toTestReport(raw: z.infer<typeof TestReportSchema>): TestReport {
  return {
    totalTime: raw.total_time,
    totalCount: raw.total_count,
    successCount: raw.success_count,
    failedCount: raw.failed_count,
    skippedCount: raw.skipped_count,
    errorCount: raw.error_count,
    testSuites: raw.test_suites.map((suite) => ({
      name: suite.name,
      totalTime: suite.total_time,
      totalCount: suite.total_count,
      successCount: suite.success_count,
      failedCount: suite.failed_count,
      skippedCount: suite.skipped_count,
      errorCount: suite.error_count,
      testCases: suite.test_cases.map((tc) => ({
        name: tc.name,
        classname: tc.classname ?? "",
        status: tc.status,
        executionTime: tc.execution_time ?? 0,
      })),
    })),
  };
}

export function toJob(raw: z.infer<typeof JobSchema>): Job {
  return {
    id: raw.id,
    name: raw.name,
    stage: raw.stage,
    status: raw.status,
    durationSeconds: raw.duration ?? 0,
    queuedDurationSeconds: raw.queued_duration ?? 0,
    timestamp: unixSeconds(raw.created_at),
  };
}
