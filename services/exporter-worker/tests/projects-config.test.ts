// SPDX-License-Identifier: LicenseRef-PolyForm-Shield-1.0.0
// SPDX-FileCopyrightText: 2025 Cogni-DAO

import { DEFAULT_PULL_CONFIG, EMPTY_PIPELINE } from "@pipex/exporter-core";
import { describe, expect, it } from "vitest";

import {
  loadProjectsConfig,
  parseProjectsConfig,
} from "../src/config/projects";

describe("parseProjectsConfig()", () => {
  it("expands each project into never-reconciled refs", () => {
    const refs = parseProjectsConfig(`
projects:
  - name: g1/app
    topics: backend,api
    refs:
      - name: main
      - kind: merge-request
        name: "7"
`);

    expect(refs).toHaveLength(2);
    expect(refs[0]).toEqual({
      kind: "branch",
      name: "main",
      project: {
        name: "g1/app",
        topics: "backend,api",
        outputSparseStatusMetrics: false,
        pull: DEFAULT_PULL_CONFIG,
      },
      latestPipeline: EMPTY_PIPELINE,
      latestJobs: {},
    });
    expect(refs[1]?.kind).toBe("merge-request");
    expect(refs[1]?.name).toBe("7");
  });

  it("layers project options over project_defaults", () => {
    const [ref] = parseProjectsConfig(`
project_defaults:
  output_sparse_status_metrics: true
  pull:
    pipeline:
      per_ref: 5
      jobs:
        enabled: true
      variables:
        enabled: true
        regexp: "^CI_"
projects:
  - name: g1/app
    output_sparse_status_metrics: false
    pull:
      pipeline:
        variables:
          regexp: "^DEPLOY_"
        test_reports:
          enabled: true
    refs:
      - kind: tag
        name: v1.0.0
`);

    expect(ref?.project.outputSparseStatusMetrics).toBe(false);
    expect(ref?.project.pull).toEqual({
      pipeline: {
        perRef: 5,
        jobs: { enabled: true },
        variables: { enabled: true, regexp: "^DEPLOY_" },
        testReports: { enabled: true, testCases: { enabled: false } },
      },
    });
  });

  it("takes the sparse flag from project_defaults when the project omits it", () => {
    const [ref] = parseProjectsConfig(`
project_defaults:
  output_sparse_status_metrics: true
projects:
  - name: g1/app
    refs:
      - name: main
`);

    expect(ref?.project.outputSparseStatusMetrics).toBe(true);
  });

  it("rejects a variables regexp that does not compile", () => {
    expect(() =>
      parseProjectsConfig(`
projects:
  - name: g1/app
    pull:
      pipeline:
        variables:
          regexp: "("
    refs:
      - name: main
`)
    ).toThrow(/must be a valid regular expression/);
  });

  it("rejects a project without refs", () => {
    expect(() =>
      parseProjectsConfig(`
projects:
  - name: g1/app
    refs: []
`)
    ).toThrow(/projects\.0\.refs: at least one ref is required/);
  });

  it("rejects an unknown ref kind", () => {
    expect(() =>
      parseProjectsConfig(`
projects:
  - name: g1/app
    refs:
      - kind: environment
        name: production
`)
    ).toThrow(/projects\.0\.refs\.0\.kind/);
  });
});

describe("loadProjectsConfig()", () => {
  it("fails on a missing file", () => {
    expect(() => loadProjectsConfig("/nonexistent/exporter.yaml")).toThrow(
      "[projects] Missing configuration at /nonexistent/exporter.yaml"
    );
  });
});
