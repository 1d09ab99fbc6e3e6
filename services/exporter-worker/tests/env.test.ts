// SPDX-License-Identifier: LicenseRef-PolyForm-Shield-1.0.0
// SPDX-FileCopyrightText: 2025 Cogni-DAO

import { describe, expect, it } from "vitest";

import { parseEnv } from "../src/bootstrap/env";

describe("parseEnv()", () => {
  it("applies defaults when only the token is set", () => {
    expect(parseEnv({ GITLAB_TOKEN: "test-secret" })).toEqual({
      GITLAB_URL: "https://gitlab.com",
      GITLAB_TOKEN: "test-secret",
      CONFIG_PATH: "exporter.yaml",
      PULL_INTERVAL_SECONDS: 30,
      LOG_LEVEL: "info",
      SERVICE_NAME: "exporter-worker",
      LISTEN_PORT: 8080,
    });
  });

  it("coerces numeric variables", () => {
    const config = parseEnv({
      GITLAB_TOKEN: "test-secret",
      PULL_INTERVAL_SECONDS: "15",
      LISTEN_PORT: "9252",
    });

    expect(config.PULL_INTERVAL_SECONDS).toBe(15);
    expect(config.LISTEN_PORT).toBe(9252);
  });

  it("fails without a token", () => {
    expect(() => parseEnv({})).toThrow(/GITLAB_TOKEN/);
  });

  it("lists every invalid variable", () => {
    expect(() =>
      parseEnv({
        GITLAB_TOKEN: "test-secret",
        GITLAB_URL: "not a url",
        LOG_LEVEL: "verbose",
      })
    ).toThrow(/GITLAB_URL: GITLAB_URL must be a valid URL[\s\S]*LOG_LEVEL/);
  });

  it("ignores unrelated variables", () => {
    const config = parseEnv({ GITLAB_TOKEN: "test-secret", HOME: "/root" });
    expect(config).not.toHaveProperty("HOME");
  });
});
