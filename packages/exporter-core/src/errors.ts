// SPDX-License-Identifier: LicenseRef-PolyForm-Shield-1.0.0
// SPDX-FileCopyrightText: 2025 Cogni-DAO

/**
 * Module: `@pipex/exporter-core/errors`
 * Purpose: Domain error classes for reconciliation failures.
 * Scope: Error definitions and type guards. Does not perform I/O or contain business logic.
 * Invariants: All errors have a readonly `code` discriminant and keep the underlying failure as `cause`.
 * Side-effects: none
 * @public
 */

export class PipelineListError extends Error {
  public readonly code = "PIPELINE_LIST_FAILED" as const;
  constructor(
    public readonly projectName: string,
    public readonly refName: string,
    options?: { cause?: unknown }
  ) {
    super(
      `error fetching project pipelines for ${projectName} (ref ${refName})`,
      options
    );
    this.name = "PipelineListError";
  }
}

export class PipelineVariablesError extends Error {
  public readonly code = "PIPELINE_VARIABLES_FAILED" as const;
  constructor(
    public readonly projectName: string,
    public readonly pipelineId: number,
    options?: { cause?: unknown }
  ) {
    super(
      `error fetching variables of pipeline ${pipelineId} for ${projectName}`,
      options
    );
    this.name = "PipelineVariablesError";
  }
}

// Type guards

export function isPipelineListError(
  error: unknown
): error is PipelineListError {
  return error instanceof Error && error.name === "PipelineListError";
}

export function isPipelineVariablesError(
  error: unknown
): error is PipelineVariablesError {
  return error instanceof Error && error.name === "PipelineVariablesError";
}
