// SPDX-License-Identifier: LicenseRef-PolyForm-Shield-1.0.0
// SPDX-FileCopyrightText: 2025 Cogni-DAO

/**
 * Module: `@pipex/exporter-worker/redact`
 * Purpose: Redaction paths for sensitive data in logs.
 * Scope: Define paths to redact from log output. Does not implement redaction logic.
 * Invariants: Only redact known secret-bearing keys (not generic "url").
 * Side-effects: none
 * Links: Imported by logger module; defines sensitive path patterns.
 * @internal
 */

export const REDACT_PATHS = [
  // Auth & secrets
  "password",
  "token",
  "access_token",
  "secret",
  "apiKey",
  "api_key",
  // Exporter-specific secrets
  "gitlabToken",
  "config.gitlabToken",
  "GITLAB_TOKEN",
  // HTTP headers
  "headers.authorization",
  'headers["private-token"]',
  'headers["PRIVATE-TOKEN"]',
];
