// SPDX-License-Identifier: LicenseRef-PolyForm-Shield-1.0.0
// SPDX-FileCopyrightText: 2025 Cogni-DAO

/**
 * Module: `@pipex/exporter-worker/bootstrap/env`
 * Purpose: Environment configuration with Zod validation and lazy singleton.
 * Scope: Config parsing only — no client construction, no side-effects beyond process.env read.
 * Invariants:
 * - GITLAB_TOKEN required (treat as secret - never log)
 * - Fails fast with clear errors on invalid config
 * Side-effects: Reads process.env
 * @internal
 */

import { z } from "zod";

const EnvSchema = z.object({
  /** Base URL of the GitLab instance (default: https://gitlab.com) */
  GITLAB_URL: z
    .string()
    .url("GITLAB_URL must be a valid URL")
    .default("https://gitlab.com"),

  /** GitLab API token (required, treat as secret - never log) */
  GITLAB_TOKEN: z.string().min(1, "GITLAB_TOKEN is required"),

  /** Path of the YAML file listing projects and refs to pull */
  CONFIG_PATH: z.string().min(1).default("exporter.yaml"),

  /** Seconds between two pulls of every configured ref (default: 30) */
  PULL_INTERVAL_SECONDS: z.coerce.number().int().min(1).default(30),

  /** Log level (default: info) */
  LOG_LEVEL: z
    .enum(["trace", "debug", "info", "warn", "error"])
    .default("info"),

  /** Service name for logging (default: exporter-worker) */
  SERVICE_NAME: z.string().default("exporter-worker"),

  /** Port serving /metrics, /livez and /readyz (default: 8080) */
  LISTEN_PORT: z.coerce.number().int().min(1).max(65535).default(8080),
});

export type Env = z.infer<typeof EnvSchema>;

/**
 * Validates an environment record. Throws on invalid config with one line per issue.
 */
export function parseEnv(source: NodeJS.ProcessEnv): Env {
  const result = EnvSchema.safeParse(source);
  if (!result.success) {
    const errors = result.error.errors
      .map((e) => `  ${e.path.join(".")}: ${e.message}`)
      .join("\n");
    throw new Error(`Invalid environment configuration:\n${errors}`);
  }
  return result.data;
}

let _env: Env | null = null;

/**
 * Returns validated environment singleton.
 * Parses process.env on first call, caches result.
 */
export function env(): Env {
  if (!_env) {
    _env = parseEnv(process.env);
  }
  return _env;
}
