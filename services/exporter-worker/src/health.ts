// SPDX-License-Identifier: LicenseRef-PolyForm-Shield-1.0.0
// SPDX-FileCopyrightText: 2025 Cogni-DAO

/**
 * Module: `@pipex/exporter-worker/health`
 * Purpose: HTTP server for orchestrator probes and Prometheus scrapes.
 * Scope: /livez (liveness), /readyz (readiness), /metrics (exposition).
 * Invariants:
 * - /livez always returns 200 (process alive)
 * - /readyz returns 200 only when ready=true, 503 otherwise
 * - /metrics renders the store on every request; a store failure returns 500
 * Side-effects: Binds HTTP server to LISTEN_PORT
 * @internal
 */

import { createServer, type RequestListener, type Server } from "node:http";

import type { ExporterStore } from "@pipex/exporter-core";

import { renderMetrics } from "./exposition/metrics.js";
import type { Logger } from "./observability/logger.js";

export interface HealthState {
  ready: boolean;
}

export interface HttpServerDeps {
  readonly state: HealthState;
  readonly store: ExporterStore;
  readonly logger: Logger;
}

export function createRequestListener(deps: HttpServerDeps): RequestListener {
  const { state, store, logger } = deps;

  return (req, res) => {
    const path = (req.url ?? "/").split("?")[0];

    if (path === "/livez") {
      res.writeHead(200, { "Content-Type": "text/plain" });
      res.end("ok");
    } else if (path === "/readyz") {
      if (state.ready) {
        res.writeHead(200, { "Content-Type": "text/plain" });
        res.end("ok");
      } else {
        res.writeHead(503, { "Content-Type": "text/plain" });
        res.end("not ready");
      }
    } else if (path === "/metrics") {
      renderMetrics(store).then(
        ({ contentType, body }) => {
          res.writeHead(200, { "Content-Type": contentType });
          res.end(body);
        },
        (err: unknown) => {
          logger.error({ err }, "rendering metrics failed");
          res.writeHead(500, { "Content-Type": "text/plain" });
          res.end("internal error");
        }
      );
    } else {
      res.writeHead(404, { "Content-Type": "text/plain" });
      res.end("not found");
    }
  };
}

export function startHttpServer(deps: HttpServerDeps, port: number): Server {
  const server = createServer(createRequestListener(deps));
  server.listen(port);
  return server;
}
