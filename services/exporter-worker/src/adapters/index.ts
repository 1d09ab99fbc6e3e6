// SPDX-License-Identifier: LicenseRef-PolyForm-Shield-1.0.0
// SPDX-FileCopyrightText: 2025 Cogni-DAO

/**
 * Module: `exporter-worker/adapters`
 * Purpose: Barrel export for CI client and store adapters.
 * Scope: Re-exports adapter implementations. New stores or CI backends are added here.
 * Side-effects: none
 * @internal
 */

export {
  GitLabApiError,
  GitLabClient,
  type GitLabClientConfig,
} from "./gitlab/client.js";

export { MemoryStore } from "./store/memory-store.js";
