// SPDX-License-Identifier: LicenseRef-PolyForm-Shield-1.0.0
// SPDX-FileCopyrightText: 2025 Cogni-DAO

import {
  DEFAULT_PULL_CONFIG,
  EMPTY_PIPELINE,
  newRef,
  type Project,
} from "@pipex/exporter-core";
import { afterEach, beforeEach, describe, expect, it, vi } from "vitest";

import {
  type GitLabClientConfig,
  GitLabApiError,
  GitLabClient,
} from "../src/adapters/gitlab/client";
import { makeNoopLogger } from "../src/observability/logger";
import {
  jsonResponse,
  makeJobPayload,
  makePipelineDetailPayload,
  TEST_REPORT_PAYLOAD,
} from "./fixtures/gitlab-rest.fixtures";

// ---------------------------------------------------------------------------
// Mock fetch
// ---------------------------------------------------------------------------

const fetchMock = vi.fn<typeof fetch>();

// ---------------------------------------------------------------------------
// Helpers
// ---------------------------------------------------------------------------

function makeClient(overrides?: Partial<GitLabClientConfig>): GitLabClient {
  return new GitLabClient(
    {
      baseUrl: "https://gitlab.example.com/",
      token: "test-secret",
      ...overrides,
    },
    makeNoopLogger()
  );
}

function calledUrl(index: number): string {
  const input = fetchMock.mock.calls[index]?.[0];
  return typeof input === "string" ? input : String(input);
}

const API = "https://gitlab.example.com/api/v4/projects/g1%2Fapp";

// ---------------------------------------------------------------------------
// Tests
// ---------------------------------------------------------------------------

describe("GitLabClient", () => {
  beforeEach(() => {
    fetchMock.mockReset();
    vi.stubGlobal("fetch", fetchMock);
  });

  afterEach(() => {
    vi.unstubAllGlobals();
  });

  describe("listProjectPipelines()", () => {
    it("requests a single page of the ref with the token header", async () => {
      fetchMock.mockResolvedValueOnce(
        jsonResponse([
          { id: 43, status: "running", ref: "main" },
          { id: 42, status: "success", ref: "main" },
        ])
      );

      const pipelines = await makeClient().listProjectPipelines(
        "g1/app",
        "main",
        2
      );

      expect(pipelines).toEqual([
        { id: 43, status: "running" },
        { id: 42, status: "success" },
      ]);
      expect(calledUrl(0)).toBe(
        `${API}/pipelines?ref=main&per_page=2&page=1`
      );
      expect(fetchMock.mock.calls[0]?.[1]?.headers).toEqual({
        "PRIVATE-TOKEN": "test-secret",
        Accept: "application/json",
      });
    });

    it("encodes merge-request head refs in the query", async () => {
      fetchMock.mockResolvedValueOnce(jsonResponse([]));

      await makeClient().listProjectPipelines(
        "g1/app",
        "refs/merge-requests/7/head",
        1
      );

      expect(calledUrl(0)).toBe(
        `${API}/pipelines?ref=refs%2Fmerge-requests%2F7%2Fhead&per_page=1&page=1`
      );
    });

    it("ignores x-next-page on pipeline listings", async () => {
      fetchMock.mockResolvedValueOnce(
        jsonResponse([{ id: 42, status: "success" }], {
          headers: { "x-next-page": "2" },
        })
      );

      await makeClient().listProjectPipelines("g1/app", "main", 1);

      expect(fetchMock).toHaveBeenCalledTimes(1);
    });

    it("passes the caller's signal to fetch", async () => {
      fetchMock.mockResolvedValueOnce(jsonResponse([]));
      const controller = new AbortController();

      await makeClient().listProjectPipelines(
        "g1/app",
        "main",
        1,
        controller.signal
      );

      expect(fetchMock.mock.calls[0]?.[1]?.signal).toBe(controller.signal);
    });

    it("throws GitLabApiError on a non-2xx response", async () => {
      fetchMock.mockResolvedValueOnce(
        new Response('{"message":"404 Project Not Found"}', { status: 404 })
      );

      const error = await makeClient()
        .listProjectPipelines("g1/app", "main", 1)
        .catch((err: unknown) => err);

      expect(error).toBeInstanceOf(GitLabApiError);
      expect(error).toMatchObject({
        status: 404,
        endpoint: "/projects/g1%2Fapp/pipelines",
      });
    });
  });

  describe("getPipeline()", () => {
    it("maps the detail payload to a pipeline", async () => {
      fetchMock.mockResolvedValueOnce(
        jsonResponse(makePipelineDetailPayload())
      );

      const pipeline = await makeClient().getPipeline("g1/app", 42);

      expect(calledUrl(0)).toBe(`${API}/pipelines/42`);
      expect(pipeline).toEqual({
        ...EMPTY_PIPELINE,
        id: 42,
        status: "success",
        source: "push",
        coverage: 87.5,
        durationSeconds: 120,
        queuedDurationSeconds: 3,
        timestamp: 1700000000,
      });
    });

    it("truncates update timestamps to whole seconds", async () => {
      fetchMock.mockResolvedValueOnce(
        jsonResponse(
          makePipelineDetailPayload({ updated_at: "2023-11-14T22:13:20.750Z" })
        )
      );

      const pipeline = await makeClient().getPipeline("g1/app", 42);

      expect(pipeline.timestamp).toBe(1700000000);
    });

    it("reads missing coverage and durations as zero", async () => {
      fetchMock.mockResolvedValueOnce(
        jsonResponse(
          makePipelineDetailPayload({
            coverage: null,
            duration: null,
            queued_duration: null,
          })
        )
      );

      const pipeline = await makeClient().getPipeline("g1/app", 42);

      expect(pipeline.coverage).toBe(0);
      expect(pipeline.durationSeconds).toBe(0);
      expect(pipeline.queuedDurationSeconds).toBe(0);
    });
  });

  describe("getPipelineVariables()", () => {
    it("keeps variables matching the project regexp", async () => {
      const project: Project = {
        name: "g1/app",
        topics: "",
        outputSparseStatusMetrics: false,
        pull: {
          pipeline: {
            ...DEFAULT_PULL_CONFIG.pipeline,
            variables: { enabled: true, regexp: "^DEPLOY_" },
          },
        },
      };
      fetchMock.mockResolvedValueOnce(
        jsonResponse([
          { key: "DEPLOY_ENV", value: "prod", variable_type: "env_var" },
          { key: "SECRET", value: "test-secret", variable_type: "env_var" },
          { key: "DEPLOY_REGION", value: "eu", variable_type: "env_var" },
        ])
      );

      const variables = await makeClient().getPipelineVariables(
        newRef(project, "branch", "main"),
        { ...EMPTY_PIPELINE, id: 42 }
      );

      expect(calledUrl(0)).toBe(`${API}/pipelines/42/variables`);
      expect(variables).toBe("DEPLOY_ENV:prod,DEPLOY_REGION:eu");
    });
  });

  describe("getPipelineTestReport()", () => {
    it("maps suites and cases with null fields defaulted", async () => {
      fetchMock.mockResolvedValueOnce(jsonResponse(TEST_REPORT_PAYLOAD));

      const report = await makeClient().getPipelineTestReport("g1/app", 42);

      expect(calledUrl(0)).toBe(`${API}/pipelines/42/test_report`);
      expect(report.totalCount).toBe(3);
      expect(report.testSuites[0]?.testCases).toEqual([
        {
          name: "adds",
          classname: "MathTest",
          status: "success",
          executionTime: 1.5,
        },
        { name: "divides", classname: "", status: "failed", executionTime: 0 },
      ]);
    });
  });

  describe("listPipelineJobs()", () => {
    it("follows x-next-page until it is empty", async () => {
      fetchMock
        .mockResolvedValueOnce(
          jsonResponse([makeJobPayload()], { headers: { "x-next-page": "2" } })
        )
        .mockResolvedValueOnce(
          jsonResponse(
            [makeJobPayload({ id: 1002, name: "lint", stage: "build" })],
            { headers: { "x-next-page": "" } }
          )
        );

      const jobs = await makeClient({ jobsPerPage: 1 }).listPipelineJobs(
        "g1/app",
        42
      );

      expect(calledUrl(0)).toBe(`${API}/pipelines/42/jobs?per_page=1&page=1`);
      expect(calledUrl(1)).toBe(`${API}/pipelines/42/jobs?per_page=1&page=2`);
      expect(jobs).toEqual([
        {
          id: 1001,
          name: "unit",
          stage: "test",
          status: "success",
          durationSeconds: 30.5,
          queuedDurationSeconds: 1.25,
          timestamp: 1700000100,
        },
        {
          id: 1002,
          name: "lint",
          stage: "build",
          status: "success",
          durationSeconds: 30.5,
          queuedDurationSeconds: 1.25,
          timestamp: 1700000100,
        },
      ]);
    });

    it("rejects payloads missing required fields", async () => {
      fetchMock.mockResolvedValueOnce(jsonResponse([{ id: 1001 }]));

      await expect(
        makeClient().listPipelineJobs("g1/app", 42)
      ).rejects.toThrow();
    });
  });
});
