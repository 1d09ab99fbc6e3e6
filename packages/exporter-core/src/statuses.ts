// SPDX-License-Identifier: LicenseRef-PolyForm-Shield-1.0.0
// SPDX-FileCopyrightText: 2025 Cogni-DAO

/**
 * Module: `@pipex/exporter-core/statuses`
 * Purpose: Ordered status enumerations used for one-hot status expansion.
 * Scope: Constants only. Passed explicitly to emitStatusMetric, never read as ambient state.
 * Side-effects: none
 * @public
 */

/** Pipeline and job statuses, in the remote's lifecycle order. */
export const PIPELINE_STATUSES = [
  "created",
  "waiting_for_resource",
  "preparing",
  "pending",
  "running",
  "success",
  "failed",
  "canceled",
  "skipped",
  "manual",
  "scheduled",
  "error",
] as const;

export const TEST_CASE_STATUSES = [
  "success",
  "failed",
  "skipped",
  "error",
] as const;

/**
 * Statuses after which a pipeline's test report is final.
 * Only the "cancelled" spelling is terminal; the remote's "canceled" is not.
 */
export const TERMINAL_PIPELINE_STATUSES: readonly string[] = [
  "success",
  "failed",
  "skipped",
  "cancelled",
];

export function isTerminalPipelineStatus(status: string): boolean {
  return TERMINAL_PIPELINE_STATUSES.includes(status);
}
