// SPDX-License-Identifier: LicenseRef-PolyForm-Shield-1.0.0
// SPDX-FileCopyrightText: 2025 Cogni-DAO

/**
 * Module: `exporter-worker/adapters/gitlab/client`
 * Purpose: GitLab REST v4 adapter implementing the CiClient port.
 * Scope: HTTP calls, payload validation and mapping. Lives in the worker per ADAPTERS_NOT_IN_CORE.
 * Invariants:
 * - Every request carries the caller's AbortSignal.
 * - Payloads are validated with zod before they reach the core.
 * - Pipeline listing fetches exactly one page; job listing follows x-next-page.
 * - No retries: a non-2xx response raises GitLabApiError.
 * Side-effects: HTTP (GitLab REST API)
 * @internal
 */

import type {
  CiClient,
  Job,
  Pipeline,
  PipelineSummary,
  Ref,
  TestReport,
} from "@pipex/exporter-core";
import { concatenatePipelineVariables } from "@pipex/exporter-core";
import type { Logger } from "pino";
import type { z } from "zod";

import {
  JobListSchema,
  PipelineDetailSchema,
  PipelineListSchema,
  PipelineVariablesSchema,
  TestReportSchema,
  toJob,
  toPipeline,
  toPipelineSummary,
  toTestReport,
} from "./schemas.js";

// ---------------------------------------------------------------------------
// Config
// ---------------------------------------------------------------------------

export interface GitLabClientConfig {
  /** Instance base URL, e.g. "https://gitlab.com" */
  readonly baseUrl: string;
  /** Personal, project or group access token */
  readonly token: string;
  /** Page size used when following job pages (default: 100) */
  readonly jobsPerPage?: number;
}

// ---------------------------------------------------------------------------
// Error types
// ---------------------------------------------------------------------------

export class GitLabApiError extends Error {
  override readonly name = "GitLabApiError" as const;

  constructor(
    public readonly status: number,
    public readonly endpoint: string,
    detail: string
  ) {
    super(`GitLab API ${endpoint} returned ${status}: ${detail}`);
  }
}

// ---------------------------------------------------------------------------
// Adapter
// ---------------------------------------------------------------------------

interface Page<T> {
  readonly data: T;
  readonly nextPage: number | null;
}

export class GitLabClient implements CiClient {
  private readonly baseUrl: string;
  private readonly token: string;
  private readonly jobsPerPage: number;
  private readonly logger: Logger;

  constructor(config: GitLabClientConfig, logger: Logger) {
    this.baseUrl = config.baseUrl.replace(/\/+$/, "");
    this.token = config.token;
    this.jobsPerPage = config.jobsPerPage ?? 100;
    this.logger = logger;
  }

  async listProjectPipelines(
    projectName: string,
    refName: string,
    perPage: number,
    signal?: AbortSignal
  ): Promise<PipelineSummary[]> {
    const { data } = await this.request(
      `${projectPath(projectName)}/pipelines`,
      { ref: refName, per_page: String(perPage), page: "1" },
      PipelineListSchema,
      signal
    );
    return data.map(toPipelineSummary);
  }

  async getPipeline(
    projectName: string,
    pipelineId: number,
    signal?: AbortSignal
  ): Promise<Pipeline> {
    const { data } = await this.request(
      `${projectPath(projectName)}/pipelines/${pipelineId}`,
      {},
      PipelineDetailSchema,
      signal
    );
    return toPipeline(data);
  }

  async getPipelineVariables(
    ref: Ref,
    pipeline: Pipeline,
    signal?: AbortSignal
  ): Promise<string> {
    const { data } = await this.request(
      `${projectPath(ref.project.name)}/pipelines/${pipeline.id}/variables`,
      {},
      PipelineVariablesSchema,
      signal
    );
    return concatenatePipelineVariables(
      data,
      ref.project.pull.pipeline.variables.regexp
    );
  }

  async getPipelineTestReport(
    projectName: string,
    pipelineId: number,
    signal?: AbortSignal
  ): Promise<TestReport> {
    const { data } = await this.request(
      `${projectPath(projectName)}/pipelines/${pipelineId}/test_report`,
      {},
      TestReportSchema,
      signal
    );
    return toTestReport(data);
  }

  async listPipelineJobs(
    projectName: string,
    pipelineId: number,
    signal?: AbortSignal
  ): Promise<Job[]> {
    const jobs: Job[] = [];
    let page: number | null = 1;

    while (page !== null) {
      const result: Page<z.infer<typeof JobListSchema>> = await this.request(
        `${projectPath(projectName)}/pipelines/${pipelineId}/jobs`,
        { per_page: String(this.jobsPerPage), page: String(page) },
        JobListSchema,
        signal
      );
      jobs.push(...result.data.map(toJob));
      page = result.nextPage;
    }

    return jobs;
  }

  // -------------------------------------------------------------------------
  // Private: HTTP
  // -------------------------------------------------------------------------

  private async request<S extends z.ZodTypeAny>(
    path: string,
    query: Record<string, string>,
    schema: S,
    signal?: AbortSignal
  ): Promise<Page<z.output<S>>> {
    const search = new URLSearchParams(query).toString();
    const url = `${this.baseUrl}/api/v4${path}${search ? `?${search}` : ""}`;

    this.logger.debug({ endpoint: path, query }, "GitLab API request");

    const response = await fetch(url, {
      headers: {
        "PRIVATE-TOKEN": this.token,
        Accept: "application/json",
      },
      signal,
    });

    if (!response.ok) {
      throw new GitLabApiError(response.status, path, await response.text());
    }

    const body: unknown = await response.json();
    const next = response.headers.get("x-next-page");

    return {
      data: schema.parse(body),
      nextPage: next ? Number.parseInt(next, 10) : null,
    };
  }
}

function projectPath(projectName: string): string {
  return `/projects/${encodeURIComponent(projectName)}`;
}
