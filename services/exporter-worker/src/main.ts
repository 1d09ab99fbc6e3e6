// SPDX-License-Identifier: LicenseRef-PolyForm-Shield-1.0.0
// SPDX-FileCopyrightText: 2025 Cogni-DAO

/**
 * Module: `@pipex/exporter-worker/main`
 * Purpose: Service entry point with graceful shutdown.
 * Scope: Calls env(), loads the projects file, starts the HTTP server and the poller. Does not contain business logic.
 * Invariants:
 *   - Reads config from env and CONFIG_PATH (no hardcoded values)
 *   - Handles SIGTERM/SIGINT for graceful shutdown
 *   - ready=false as soon as shutdown starts
 *   - Configured refs are registered in the store before the first tick
 * Side-effects: IO (GitLab API, HTTP listener, process signals)
 * @public
 */

import { createContainer } from "./bootstrap/container.js";
import { env } from "./bootstrap/env.js";
import { loadProjectsConfig } from "./config/projects.js";
import { type HealthState, startHttpServer } from "./health.js";
import { flushLogger, makeLogger } from "./observability/logger.js";
import { createPoller } from "./poller.js";

async function main(): Promise<void> {
  // Load and validate env
  const config = env();

  // Create logger (composition root owns logger creation)
  const logger = makeLogger();

  logger.info(
    { logLevel: config.LOG_LEVEL, gitlabUrl: config.GITLAB_URL },
    "Starting CI pipeline exporter"
  );

  const refs = loadProjectsConfig(config.CONFIG_PATH);
  logger.info(
    { configPath: config.CONFIG_PATH, refs: refs.length },
    "Projects config loaded"
  );

  const container = createContainer(config, logger);
  for (const ref of refs) {
    await container.store.setRef(ref);
  }

  // Health state for readiness probes
  const healthState: HealthState = { ready: false };
  const server = startHttpServer(
    { state: healthState, store: container.store, logger },
    config.LISTEN_PORT
  );
  logger.info({ port: config.LISTEN_PORT }, "HTTP server started");

  const poller = createPoller({
    refs,
    controller: container.controller,
    intervalMs: config.PULL_INTERVAL_SECONDS * 1000,
    logger: logger.child({ component: "poller" }),
  });
  poller.start();

  healthState.ready = true;
  logger.info(
    { intervalSeconds: config.PULL_INTERVAL_SECONDS },
    "Poller started, ready for traffic"
  );

  // Graceful shutdown
  let shuttingDown = false;

  const shutdown = async (signal: string): Promise<void> => {
    if (shuttingDown) {
      logger.warn({ signal }, "Shutdown already in progress");
      return;
    }
    shuttingDown = true;
    healthState.ready = false;
    logger.info({ signal }, "Received signal, shutting down");

    try {
      await poller.stop();
      await new Promise<void>((resolve, reject) => {
        server.close((err) => (err ? reject(err) : resolve()));
      });
      logger.info({}, "Poller and HTTP server stopped");
      flushLogger();
      process.exit(0);
    } catch (err) {
      logger.error({ err }, "Error during shutdown");
      flushLogger();
      process.exit(1);
    }
  };

  process.on("SIGTERM", () => void shutdown("SIGTERM"));
  process.on("SIGINT", () => void shutdown("SIGINT"));
}

const bootLogger = makeLogger({ phase: "boot" });

main().catch((err: unknown) => {
  bootLogger.fatal({ err }, "Fatal error during startup");
  flushLogger();
  process.exit(1);
});
