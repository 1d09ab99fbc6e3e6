// SPDX-License-Identifier: LicenseRef-PolyForm-Shield-1.0.0
// SPDX-FileCopyrightText: 2025 Cogni-DAO

/**
 * Module: `@pipex/exporter-worker/poller`
 * Purpose: Periodically reconcile every configured ref.
 * Scope: Scheduling only. Reconciliation semantics live in @pipex/exporter-core.
 * Invariants:
 * - Refs of one tick are pulled sequentially.
 * - A tick never overlaps the previous one; a late tick is skipped.
 * - A failing ref is logged and does not stop the tick.
 * - stop() aborts in-flight remote and store calls and waits for the running tick.
 * Side-effects: timers
 * @internal
 */

import type { PipelineController, Ref } from "@pipex/exporter-core";
import { isPipelineListError } from "@pipex/exporter-core";

import type { Logger } from "./observability/logger.js";

export interface PollerDeps {
  readonly refs: readonly Ref[];
  readonly controller: Pick<PipelineController, "pullRefMetrics">;
  readonly intervalMs: number;
  readonly logger: Logger;
}

export interface Poller {
  /** Runs a first tick immediately, then one every intervalMs. */
  start(): void;
  stop(): Promise<void>;
  /** Pulls every ref once. Never rejects. */
  runOnce(): Promise<void>;
}

export function createPoller(deps: PollerDeps): Poller {
  const { refs, controller, intervalMs, logger } = deps;

  const abort = new AbortController();
  let timer: ReturnType<typeof setInterval> | null = null;
  let running: Promise<void> | null = null;

  async function pullAll(): Promise<void> {
    for (const ref of refs) {
      if (abort.signal.aborted) return;
      try {
        await controller.pullRefMetrics(ref, abort.signal);
      } catch (err) {
        if (abort.signal.aborted) return;
        const fields = {
          err,
          projectName: ref.project.name,
          ref: ref.name,
          refKind: ref.kind,
        };
        if (isPipelineListError(err)) {
          logger.warn(fields, "listing pipelines for the ref failed");
        } else {
          logger.error(fields, "pulling ref metrics failed");
        }
      }
    }
  }

  function runOnce(): Promise<void> {
    if (running) {
      logger.debug({}, "previous pull still running, skipping tick");
      return running;
    }
    const startedAt = Date.now();
    running = pullAll().finally(() => {
      running = null;
      logger.debug(
        { refs: refs.length, durationMs: Date.now() - startedAt },
        "pull tick done"
      );
    });
    return running;
  }

  return {
    start(): void {
      if (timer) return;
      void runOnce();
      timer = setInterval(() => {
        void runOnce();
      }, intervalMs);
    },

    async stop(): Promise<void> {
      if (timer) {
        clearInterval(timer);
        timer = null;
      }
      abort.abort();
      if (running) await running;
    },

    runOnce,
  };
}
