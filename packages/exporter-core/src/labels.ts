// SPDX-License-Identifier: LicenseRef-PolyForm-Shield-1.0.0
// SPDX-FileCopyrightText: 2025 Cogni-DAO

/**
 * Module: `@pipex/exporter-core/labels`
 * Purpose: Deterministic label sets for refs, test suites, test cases and jobs.
 * Scope: Pure functions. Does not read stores.
 * Invariants: Same logical entity always yields the same label set.
 * Side-effects: none
 * @public
 */

import { buildRefKey } from "./helpers";
import type { Labels } from "./metrics";
import type { Job, Pipeline, Ref, TestCase, TestSuite } from "./model";

/** Label names shared by every ref-scoped metric. */
export const REF_LABEL_NAMES = [
  "project",
  "topics",
  "ref",
  "kind",
  "source",
  "variables",
] as const;

export function refKey(ref: Ref): string {
  return buildRefKey(ref.project.name, ref.kind, ref.name);
}

/**
 * Default labels for a ref. `source` and `variables` are taken from
 * `pipeline` when given, otherwise from the ref's latest pipeline.
 */
export function defaultLabelsValues(
  ref: Ref,
  pipeline?: Pipeline
): Record<string, string> {
  const p = pipeline ?? ref.latestPipeline;
  return {
    project: ref.project.name,
    topics: ref.project.topics,
    ref: ref.name,
    kind: ref.kind,
    source: p.source,
    variables: p.variables,
  };
}

export function testSuiteLabels(ref: Ref, suite: TestSuite): Labels {
  return { ...defaultLabelsValues(ref), test_suite_name: suite.name };
}

export function testCaseLabels(
  ref: Ref,
  suite: TestSuite,
  testCase: TestCase
): Labels {
  return {
    ...testSuiteLabels(ref, suite),
    test_case_name: testCase.name,
    test_case_classname: testCase.classname,
  };
}

export function jobLabels(ref: Ref, job: Job): Labels {
  return { ...defaultLabelsValues(ref), stage: job.stage, job_name: job.name };
}
