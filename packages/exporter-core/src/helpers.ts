// SPDX-License-Identifier: LicenseRef-PolyForm-Shield-1.0.0
// SPDX-FileCopyrightText: 2025 Cogni-DAO

/**
 * Module: `@pipex/exporter-core/helpers`
 * Purpose: Pure helpers for deterministic keys, remote ref addressing and pipeline variable formatting.
 * Scope: Zero deps. Does not perform network I/O or access stores.
 * Invariants:
 * - canonicalJson() produces identical output regardless of input key order.
 * - buildRefKey() output is deterministic for the same inputs.
 * Side-effects: none
 * @public
 */

import type { RefKind } from "./model";

/**
 * Produce canonical JSON with sorted keys for deterministic serialization.
 * Only sorts top-level keys; nested objects are serialized as-is.
 *
 * @example
 * canonicalJson({ b: "2", a: "1" })
 * // => '{"a":"1","b":"2"}'
 */
export function canonicalJson(obj: Readonly<Record<string, unknown>>): string {
  const sortedKeys = Object.keys(obj).sort();
  return JSON.stringify(obj, sortedKeys);
}

/**
 * @example
 * buildRefKey("group/app", "branch", "main")
 * // => "group/app:branch:main"
 */
export function buildRefKey(
  projectName: string,
  kind: RefKind,
  refName: string
): string {
  return `${projectName}:${kind}:${refName}`;
}

/**
 * Ref name as the remote expects it in pipeline listings.
 * Merge requests are addressed through their head ref.
 */
export function remoteRefName(kind: RefKind, name: string): string {
  if (kind === "merge-request") {
    return `refs/merge-requests/${name}/head`;
  }
  return name;
}

export interface PipelineVariable {
  readonly key: string;
  readonly value: string;
}

/**
 * Keeps variables whose key matches `pattern` and joins them as `key:value,...`.
 *
 * @example
 * concatenatePipelineVariables([{ key: "DEPLOY", value: "true" }, { key: "OTHER", value: "x" }], "^DEPLOY")
 * // => "DEPLOY:true"
 */
export function concatenatePipelineVariables(
  variables: readonly PipelineVariable[],
  pattern: string
): string {
  const re = new RegExp(pattern);
  return variables
    .filter((v) => re.test(v.key))
    .map((v) => `${v.key}:${v.value}`)
    .join(",");
}
