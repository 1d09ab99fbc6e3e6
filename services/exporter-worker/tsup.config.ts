// SPDX-License-Identifier: LicenseRef-PolyForm-Shield-1.0.0
// SPDX-FileCopyrightText: 2025 Cogni-DAO

/**
 * Module: `@pipex/exporter-worker/tsup.config`
 * Purpose: Build configuration for the exporter-worker service.
 * Scope: Defines tsup bundler settings for the deployable service. Does not contain runtime code.
 * Invariants: ESM format only; the workspace core package is inlined, npm deps stay external.
 * Side-effects: none
 * @internal
 */

import { defineConfig } from "tsup";

export default defineConfig({
  entry: ["src/main.ts"],
  format: ["esm"],
  bundle: true,
  noExternal: ["@pipex/exporter-core"],
  splitting: false,
  dts: false,
  clean: true,
  sourcemap: true,
  platform: "node",
  target: "node20",
});
