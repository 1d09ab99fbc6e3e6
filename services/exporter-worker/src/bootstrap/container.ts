// SPDX-License-Identifier: LicenseRef-PolyForm-Shield-1.0.0
// SPDX-FileCopyrightText: 2025 Cogni-DAO

/**
 * Module: `@pipex/exporter-worker/bootstrap/container`
 * Purpose: Composition root — wires concrete adapters to port interfaces.
 * Scope: All adapter construction lives here. Returns typed container against port interfaces.
 * Invariants:
 * - Only file that imports concrete adapters (GitLabClient, MemoryStore)
 * - poller and health import ports only, never this module
 * Side-effects: none
 * @internal
 */

import {
  type CiClient,
  createJobMetricsPuller,
  createPipelineController,
  type ExporterStore,
  type PipelineController,
} from "@pipex/exporter-core";

import { GitLabClient, MemoryStore } from "../adapters/index.js";
import type { Logger } from "../observability/logger.js";
import type { Env } from "./env.js";

/**
 * Service container — all deps typed against port interfaces.
 */
export interface ServiceContainer {
  store: ExporterStore;
  client: CiClient;
  controller: PipelineController;
  logger: Logger;
}

/**
 * Build the service container from validated env and logger.
 * This is the only place that instantiates concrete adapters.
 */
export function createContainer(config: Env, logger: Logger): ServiceContainer {
  const store = new MemoryStore();
  const client = new GitLabClient(
    { baseUrl: config.GITLAB_URL, token: config.GITLAB_TOKEN },
    logger.child({ component: "gitlab-client" })
  );

  const jobs = createJobMetricsPuller({
    store,
    client,
    logger: logger.child({ component: "jobs" }),
  });

  const controller = createPipelineController({
    store,
    client,
    jobs,
    logger: logger.child({ component: "pipelines" }),
  });

  return { store, client, controller, logger };
}
