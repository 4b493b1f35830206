import { describe, it, expect, beforeEach, afterEach } from "vitest";
import { mkdtempSync, readFileSync, rmSync, statSync, writeFileSync } from "node:fs";
import { join } from "node:path";
import { tmpdir } from "node:os";
import {
  generateDefaultConfig,
  loadConfig,
  relayPaths,
  resetConfigCache,
  resolveAuthToken,
} from "../../src/config.js";

describe("config", () => {
  let home: string;
  let env: NodeJS.ProcessEnv;

  beforeEach(() => {
    home = mkdtempSync(join(tmpdir(), "pkgrelay-config-"));
    env = { PKGRELAY_HOME: home, PROJECT_DIR: home };
    resetConfigCache();
  });

  afterEach(() => {
    resetConfigCache();
    rmSync(home, { recursive: true, force: true });
  });

  it("applies defaults", () => {
    const config = loadConfig({ env });
    expect(config.port).toBe(7420);
    expect(config.project_dir).toBe(home);
    expect(config.allowed_packages).toBeNull();
    expect(config.max_install_size).toBe(50_000_000);
    expect(config.timeouts).toEqual({ install: 300_000, uninstall: 60_000, init: 30_000, venv: 120_000 });
    expect(config.venv_name).toBe(".venv");
    expect(config.use_uv).toBe(true);
    expect(config.max_concurrent_tasks).toBe(4);
  });

  it("reads environment variables", () => {
    const config = loadConfig({
      env: {
        ...env,
        ALLOWED_PACKAGES: "requests, pandas,,react",
        INSTALL_TIMEOUT: "1000",
        USE_UV: "false",
        VENV_NAME: "env",
        UV_PATH: "/opt/uv/bin/uv",
        LOG_LEVEL: "DEBUG",
      },
    });
    expect(config.allowed_packages).toEqual(["requests", "pandas", "react"]);
    expect(config.timeouts.install).toBe(1000);
    expect(config.timeouts.uninstall).toBe(60_000);
    expect(config.use_uv).toBe(false);
    expect(config.venv_name).toBe("env");
    expect(config.uv_path).toBe("/opt/uv/bin/uv");
    expect(config.log_level).toBe("debug");
  });

  it("treats '*' as unrestricted", () => {
    expect(loadConfig({ env: { ...env, ALLOWED_PACKAGES: "requests,*" } }).allowed_packages).toBeNull();
  });

  it("treats a blank whitelist as unrestricted", () => {
    expect(loadConfig({ env: { ...env, ALLOWED_PACKAGES: " " } }).allowed_packages).toBeNull();
  });

  it("layers environment variables over config.yaml", () => {
    writeFileSync(join(home, "config.yaml"), "port: 9000\ntimeouts:\n  init: 5000\nallowed_packages: [requests]\n");
    const config = loadConfig({ env: { ...env, INSTALL_TIMEOUT: "1000" } });
    expect(config.port).toBe(9000);
    expect(config.timeouts).toEqual({ install: 1000, uninstall: 60_000, init: 5000, venv: 120_000 });
    expect(config.allowed_packages).toEqual(["requests"]);
  });

  it("rejects invalid values", () => {
    expect(() => loadConfig({ env: { ...env, PKGRELAY_PORT: "not-a-port" } })).toThrow();
  });

  it("rejects an unrecognized USE_UV value", () => {
    expect(() => loadConfig({ env: { ...env, USE_UV: "off" } })).toThrow();
  });

  it("accepts yes and 0 for USE_UV", () => {
    expect(loadConfig({ env: { ...env, USE_UV: "yes" } }).use_uv).toBe(true);
    resetConfigCache();
    expect(loadConfig({ env: { ...env, USE_UV: "0" } }).use_uv).toBe(false);
  });

  it("rejects a config file that is not a mapping", () => {
    writeFileSync(join(home, "config.yaml"), "- just\n- a list\n");
    expect(() => loadConfig({ env })).toThrow("must contain a mapping");
  });

  it("freezes and caches the result", () => {
    const config = loadConfig({ env });
    expect(Object.isFrozen(config)).toBe(true);
    expect(Object.isFrozen(config.timeouts)).toBe(true);
    expect(loadConfig({ env: { ...env, PKGRELAY_PORT: "1" } })).toBe(config);
  });

  it("parses the generated default config", () => {
    writeFileSync(relayPaths(env).config, generateDefaultConfig(home, "test-secret"));
    const config = loadConfig({ env: { PKGRELAY_HOME: home } });
    expect(config.auth_token).toBe("test-secret");
    expect(config.project_dir).toBe(home);
    expect(config.allowed_packages).toBeNull();
  });

  describe("resolveAuthToken", () => {
    it("prefers an explicit token", () => {
      const config = loadConfig({ env: { ...env, PKGRELAY_AUTH_TOKEN: "test-secret" } });
      expect(resolveAuthToken(config, env)).toBe("test-secret");
    });

    it("generates a token once and persists it", () => {
      const config = loadConfig({ env });
      const first = resolveAuthToken(config, env);
      const file = relayPaths(env).authToken;

      expect(first).toMatch(/^[0-9a-f-]{36}$/);
      expect(readFileSync(file, "utf-8")).toBe(first);
      if (process.platform !== "win32") expect(statSync(file).mode & 0o777).toBe(0o600);
      expect(resolveAuthToken(config, env)).toBe(first);
    });
  });
});
