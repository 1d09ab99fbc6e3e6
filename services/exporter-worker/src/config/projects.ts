// SPDX-License-Identifier: LicenseRef-PolyForm-Shield-1.0.0
// SPDX-FileCopyrightText: 2025 Cogni-DAO

/**
 * Module: `@pipex/exporter-worker/config/projects`
 * Purpose: Load the YAML list of projects and refs to pull, with per-project pull options.
 * Scope: Parses and validates the file, merges project options over `project_defaults`, returns never-reconciled refs.
 * Invariants:
 * - Every pull option resolves to a concrete value (project > project_defaults > built-in default).
 * - variables.regexp must compile.
 * Side-effects: IO (reads the config file) in loadProjectsConfig only
 * @internal
 */

import fs from "node:fs";

import type { Project, ProjectPullConfig, Ref } from "@pipex/exporter-core";
import { DEFAULT_PULL_CONFIG, newRef } from "@pipex/exporter-core";
import { parse } from "yaml";
import { z } from "zod";

function isValidRegexp(pattern: string): boolean {
  try {
    new RegExp(pattern);
    return true;
  } catch {
    return false;
  }
}

const PullSchema = z
  .object({
    pipeline: z
      .object({
        per_ref: z.number().int().min(1).max(100).optional(),
        jobs: z.object({ enabled: z.boolean().optional() }).optional(),
        variables: z
          .object({
            enabled: z.boolean().optional(),
            regexp: z
              .string()
              .refine(isValidRegexp, "must be a valid regular expression")
              .optional(),
          })
          .optional(),
        test_reports: z
          .object({
            enabled: z.boolean().optional(),
            test_cases: z
              .object({ enabled: z.boolean().optional() })
              .optional(),
          })
          .optional(),
      })
      .optional(),
  })
  .optional();

type PullOverrides = z.infer<typeof PullSchema>;

const RefSchema = z.object({
  kind: z.enum(["branch", "tag", "merge-request"]).default("branch"),
  name: z.string().min(1),
});

const ProjectSchema = z.object({
  name: z.string().min(1),
  topics: z.string().default(""),
  output_sparse_status_metrics: z.boolean().optional(),
  pull: PullSchema,
  refs: z.array(RefSchema).min(1, "at least one ref is required"),
});

const ConfigFileSchema = z.object({
  project_defaults: z
    .object({
      output_sparse_status_metrics: z.boolean().optional(),
      pull: PullSchema,
    })
    .optional(),
  projects: z.array(ProjectSchema).min(1, "at least one project is required"),
});

function resolvePull(
  base: ProjectPullConfig,
  overrides: PullOverrides
): ProjectPullConfig {
  const p = overrides?.pipeline;
  const b = base.pipeline;
  return {
    pipeline: {
      perRef: p?.per_ref ?? b.perRef,
      jobs: { enabled: p?.jobs?.enabled ?? b.jobs.enabled },
      variables: {
        enabled: p?.variables?.enabled ?? b.variables.enabled,
        regexp: p?.variables?.regexp ?? b.variables.regexp,
      },
      testReports: {
        enabled: p?.test_reports?.enabled ?? b.testReports.enabled,
        testCases: {
          enabled:
            p?.test_reports?.test_cases?.enabled ??
            b.testReports.testCases.enabled,
        },
      },
    },
  };
}

/**
 * Validates parsed config content and expands it into refs.
 * @throws Error listing every invalid path
 */
export function parseProjectsConfig(content: string): Ref[] {
  const result = ConfigFileSchema.safeParse(parse(content));
  if (!result.success) {
    const errors = result.error.errors
      .map((e) => `  ${e.path.join(".")}: ${e.message}`)
      .join("\n");
    throw new Error(`Invalid projects configuration:\n${errors}`);
  }

  const defaults = result.data.project_defaults;
  const defaultPull = resolvePull(DEFAULT_PULL_CONFIG, defaults?.pull);

  return result.data.projects.flatMap((p) => {
    const project: Project = {
      name: p.name,
      topics: p.topics,
      outputSparseStatusMetrics:
        p.output_sparse_status_metrics ??
        defaults?.output_sparse_status_metrics ??
        false,
      pull: resolvePull(defaultPull, p.pull),
    };
    return p.refs.map((r) => newRef(project, r.kind, r.name));
  });
}

export function loadProjectsConfig(path: string): Ref[] {
  if (!fs.existsSync(path)) {
    throw new Error(`[projects] Missing configuration at ${path}`);
  }
  return parseProjectsConfig(fs.readFileSync(path, "utf8"));
}
