import { describe, it, expect, vi, beforeEach, afterEach } from "vitest";
import type { Mock } from "vitest";
import { existsSync, mkdirSync, mkdtempSync, realpathSync, rmSync, symlinkSync, writeFileSync } from "node:fs";
import { join } from "node:path";
import { tmpdir } from "node:os";
import { ToolDispatcher } from "../../src/devkit/dispatcher.js";
import { PkgRelayConfigSchema } from "../../src/config.js";
import type { PkgRelayConfig } from "../../src/config.js";
import type { ShellRunOptions } from "../../src/devkit/adapters/shell.js";
import { ToolError } from "../../src/devkit/errors.js";
import type { ExecutionResult, ManagerExecutable, ManagerId } from "../../src/devkit/types.js";

function exec(partial: Partial<ExecutionResult> = {}): ExecutionResult {
  return {
    exitCode: 0,
    stdout: "",
    stderr: "",
    durationMs: 5,
    timedOut: false,
    cancelled: false,
    truncated: { stdout: false, stderr: false },
    ...partial,
  };
}

function deferred<T>() {
  let settle: (value: T) => void = () => {};
  const promise = new Promise<T>((resolve) => {
    settle = resolve;
  });
  return { promise, resolve: (value: T) => settle(value) };
}

type RunFn = (file: string, args: readonly string[], options: ShellRunOptions) => Promise<ExecutionResult>;
type ResolveFn = (manager: ManagerId) => Promise<ManagerExecutable>;

describe("ToolDispatcher", () => {
  let root: string;
  let run: Mock<RunFn>;
  let resolve: Mock<ResolveFn>;

  function dispatcher(overrides: Record<string, unknown> = {}): ToolDispatcher {
    const config: PkgRelayConfig = PkgRelayConfigSchema.parse({ project_dir: root, ...overrides });
    return new ToolDispatcher({
      config,
      shell: { run, which: vi.fn(async () => null) },
      resolver: { resolve },
    });
  }

  beforeEach(() => {
    root = realpathSync(mkdtempSync(join(tmpdir(), "pkgrelay-dispatch-")));
    writeFileSync(join(root, "pyproject.toml"), "[project]\nname = \"demo\"\n");
    writeFileSync(join(root, "package.json"), "{}\n");
    run = vi.fn<RunFn>(async () => exec({ stdout: "done" }));
    resolve = vi.fn<ResolveFn>(async (manager) => ({ manager, file: `/usr/bin/${manager}`, prefixArgs: [] }));
  });

  afterEach(() => {
    rmSync(root, { recursive: true, force: true });
  });

  it("installs a package with uv add in the project directory", async () => {
    const response = await dispatcher().dispatch("install", { path: ".", manager: "uv", package: "requests" });

    expect(response).toEqual({
      status: "ok",
      tool: "install",
      exit_code: 0,
      stdout: "done",
      stderr: "",
      duration_ms: 5,
      truncated: false,
    });
    expect(run).toHaveBeenCalledTimes(1);
    expect(run).toHaveBeenCalledWith(
      "/usr/bin/uv",
      ["add", "requests"],
      expect.objectContaining({ cwd: root, timeout_ms: 300_000, env: { UV_NO_PROGRESS: "1" } }),
    );
  });

  it("rejects a package outside the whitelist without spawning", async () => {
    const response = await dispatcher({ allowed_packages: ["requests"] })
      .dispatch("install", { path: ".", manager: "uv", package: "malware" });

    expect(response).toEqual({
      status: "error",
      kind: "WhitelistViolation",
      message: "Package 'malware' is not in the allowed packages list",
    });
    expect(run).not.toHaveBeenCalled();
    expect(resolve).not.toHaveBeenCalled();
  });

  it("applies the whitelist to uninstall", async () => {
    const response = await dispatcher({ allowed_packages: ["requests"] })
      .dispatch("uninstall", { path: ".", manager: "pip", package: "pandas" });
    expect(response).toMatchObject({ status: "error", kind: "WhitelistViolation" });
  });

  it("rejects a requirements file with a disallowed entry", async () => {
    writeFileSync(join(root, "requirements.txt"), "requests\nmalware\n");
    const response = await dispatcher({ allowed_packages: ["requests"] })
      .dispatch("add", { path: ".", manager: "uv", args: ["-r", "requirements.txt"] });
    expect(response).toMatchObject({ status: "error", kind: "WhitelistViolation" });
    expect(run).not.toHaveBeenCalled();
  });

  it("rejects path traversal", async () => {
    const response = await dispatcher().dispatch("install", { path: "../elsewhere", manager: "npm", package: "react" });
    expect(response).toMatchObject({ status: "error", kind: "PathTraversal" });
    expect(run).not.toHaveBeenCalled();
  });

  it("reports a missing project directory", async () => {
    const response = await dispatcher().dispatch("install", { path: "missing", manager: "npm", package: "react" });
    expect(response).toMatchObject({ status: "error", kind: "PathNotFound" });
  });

  it("rejects an unknown tool", async () => {
    const response = await dispatcher().dispatch("publish", { path: "." });
    expect(response).toEqual({
      status: "error",
      kind: "CommandBuildError",
      message: "Unknown tool: 'publish'. Available: [install, uninstall, init, create_venv, add]",
    });
  });

  it("rejects malformed parameters", async () => {
    const response = await dispatcher().dispatch("install", { path: ".", manager: "cargo", package: "serde" });
    expect(response).toMatchObject({ status: "error", kind: "CommandBuildError" });
  });

  it("creates a venv and checks that it exists", async () => {
    run.mockImplementation(async (_file, args, options) => {
      mkdirSync(join(options.cwd, args[1] ?? ""));
      return exec();
    });

    const response = await dispatcher().dispatch("create_venv", { path: "." });

    expect(run).toHaveBeenCalledWith("/usr/bin/uv", ["venv", ".venv"], expect.objectContaining({ timeout_ms: 120_000 }));
    expect(response).toMatchObject({ status: "ok", tool: "create_venv", stderr: "" });
  });

  it("fails create_venv when the directory was not created", async () => {
    const response = await dispatcher().dispatch("create_venv", { path: ".", venv_name: "env" });
    expect(response).toMatchObject({
      status: "error",
      kind: "ExecutionFailed",
      message: `uv venv exited 0 but ${join(root, "env")} was not created`,
    });
  });

  it("refuses a venv name that leaves the target directory", async () => {
    const response = await dispatcher().dispatch("create_venv", { path: ".", venv_name: "../escape" });
    expect(response).toMatchObject({ status: "error", kind: "PathTraversal" });
  });

  it("creates the target directory for init", async () => {
    const response = await dispatcher().dispatch("init", { path: "web", manager: "npm" });

    expect(response).toMatchObject({ status: "ok", tool: "init" });
    expect(existsSync(join(root, "web"))).toBe(true);
    expect(run).toHaveBeenCalledWith("/usr/bin/npm", ["init", "-y"], expect.objectContaining({ cwd: join(root, "web") }));
  });

  it("initializes a project before installing when its manifest is missing", async () => {
    mkdirSync(join(root, "fresh"));
    const response = await dispatcher().dispatch("install", { path: "fresh", manager: "uv", package: "requests" });

    expect(response).toMatchObject({ status: "ok" });
    expect(run.mock.calls.map(([, args]) => args)).toEqual([["init"], ["add", "requests"]]);
  });

  it("reports a failed bootstrap", async () => {
    mkdirSync(join(root, "fresh"));
    run.mockResolvedValueOnce(exec({ exitCode: 2, stderr: "boom\n" }));
    const response = await dispatcher().dispatch("install", { path: "fresh", manager: "npm", package: "react" });

    expect(response).toEqual({ status: "error", kind: "ExecutionFailed", message: "Failed to initialize project: boom" });
    expect(run).toHaveBeenCalledTimes(1);
  });

  it("maps a timeout to ExecutionTimeout", async () => {
    run.mockResolvedValueOnce(exec({ exitCode: 1, timedOut: true, stdout: "partial" }));
    const response = await dispatcher().dispatch("install", { path: ".", manager: "uv", package: "requests" });

    expect(response).toMatchObject({
      status: "error",
      kind: "ExecutionTimeout",
      message: "uv install timed out after 300000ms",
      stdout: "partial",
    });
  });

  it("maps a non-zero exit to ExecutionFailed with the output", async () => {
    run.mockResolvedValueOnce(exec({ exitCode: 2, stderr: "No matching distribution" }));
    const response = await dispatcher().dispatch("install", { path: ".", manager: "pip", package: "requests" });

    expect(response).toEqual({
      status: "error",
      kind: "ExecutionFailed",
      message: "pip install failed with exit code 2",
      exit_code: 2,
      stdout: "",
      stderr: "No matching distribution",
      duration_ms: 5,
    });
  });

  it("reports a cancelled run", async () => {
    run.mockResolvedValueOnce(exec({ exitCode: 1, cancelled: true }));
    const response = await dispatcher().dispatch("uninstall", { path: ".", manager: "npm", package: "react" });
    expect(response).toMatchObject({ status: "error", kind: "ExecutionFailed", message: "npm uninstall was cancelled" });
  });

  it("flags truncated output on success", async () => {
    run.mockResolvedValueOnce(exec({ truncated: { stdout: true, stderr: false } }));
    const response = await dispatcher().dispatch("install", { path: ".", manager: "npm", package: "react" });
    expect(response).toMatchObject({ status: "ok", truncated: true });
  });

  it("defaults to pip when use_uv is off", async () => {
    await dispatcher({ use_uv: false }).dispatch("install", { path: ".", package: "requests" });
    expect(resolve).toHaveBeenCalledWith("pip");
    expect(run).toHaveBeenCalledWith("/usr/bin/pip", ["install", "requests"], expect.anything());
  });

  it("surfaces ManagerNotFound from the resolver", async () => {
    resolve.mockRejectedValueOnce(new ToolError("ManagerNotFound", "No uv executable found (posix); set UV_PATH to override"));
    const response = await dispatcher().dispatch("install", { path: ".", manager: "uv", package: "requests" });
    expect(response).toEqual({
      status: "error",
      kind: "ManagerNotFound",
      message: "No uv executable found (posix); set UV_PATH to override",
    });
  });

  it("wraps unexpected failures as InternalError", async () => {
    run.mockRejectedValueOnce(new Error("spawn exploded"));
    const response = await dispatcher().dispatch("install", { path: ".", manager: "uv", package: "requests" });
    expect(response).toEqual({ status: "error", kind: "InternalError", message: "spawn exploded" });
  });

  describe("add arguments", () => {
    let outside: string;

    beforeEach(() => {
      outside = realpathSync(mkdtempSync(join(tmpdir(), "pkgrelay-outside-")));
    });

    afterEach(() => {
      rmSync(outside, { recursive: true, force: true });
    });

    it("refuses an option that moves uv to another project", async () => {
      const relay = dispatcher({ allowed_packages: ["requests"] });

      for (const args of [["--directory", outside, "requests"], [`--project=${outside}`, "requests"]]) {
        const response = await relay.dispatch("add", { path: ".", manager: "uv", args });
        expect(response).toMatchObject({ status: "error", kind: "CommandBuildError" });
      }
      expect(run).not.toHaveBeenCalled();
    });

    it("refuses an npm prefix outside the project", async () => {
      const response = await dispatcher().dispatch("add", { path: ".", manager: "npm", args: ["--prefix", outside, "react"] });
      expect(response).toMatchObject({ status: "error", kind: "CommandBuildError" });
      expect(run).not.toHaveBeenCalled();
    });

    it("confines constraint files", async () => {
      writeFileSync(join(outside, "constraints.txt"), "requests==2.31.0\n");
      const response = await dispatcher().dispatch("add", {
        path: ".",
        manager: "uv",
        args: ["-c", join(outside, "constraints.txt"), "requests"],
      });
      expect(response).toMatchObject({ status: "error", kind: "PathTraversal" });
      expect(run).not.toHaveBeenCalled();
    });

    it("refuses a requirements file for npm add", async () => {
      writeFileSync(join(root, "requirements.txt"), "react\n");
      const response = await dispatcher().dispatch("add", { path: ".", manager: "npm", args: ["-r", "requirements.txt"] });
      expect(response).toEqual({
        status: "error",
        kind: "CommandBuildError",
        message: "'add' is not supported for npm: requirements files are Python-only",
      });
      expect(run).not.toHaveBeenCalled();
    });
  });

  it("rejects an npm alias of an allowed package", async () => {
    const response = await dispatcher({ allowed_packages: ["lodash"] })
      .dispatch("install", { path: ".", manager: "npm", package: "lodash@npm:malware" });
    expect(response).toMatchObject({ status: "error", kind: "WhitelistViolation" });
    expect(run).not.toHaveBeenCalled();
  });

  it("rejects a direct reference behind an allowed name", async () => {
    const response = await dispatcher({ allowed_packages: ["requests"] })
      .dispatch("install", { path: ".", manager: "uv", package: "requests @ https://evil.example/malware-1.0.whl" });
    expect(response).toMatchObject({ status: "error", kind: "WhitelistViolation" });
    expect(run).not.toHaveBeenCalled();
  });

  it("rejects a venv name that escapes through a symlink", async () => {
    const outside = realpathSync(mkdtempSync(join(tmpdir(), "pkgrelay-outside-")));
    try {
      symlinkSync(outside, join(root, "link"), "dir");
      const response = await dispatcher().dispatch("create_venv", { path: ".", venv_name: "link/venv" });
      expect(response).toMatchObject({ status: "error", kind: "PathTraversal" });
      expect(run).not.toHaveBeenCalled();
    } finally {
      rmSync(outside, { recursive: true, force: true });
    }
  });

  it("creates a venv inside a target directory that does not exist yet", async () => {
    run.mockImplementation(async (_file, args, options) => {
      mkdirSync(join(options.cwd, args[1] ?? ""));
      return exec();
    });
    const response = await dispatcher().dispatch("create_venv", { path: "fresh-env" });
    expect(response).toMatchObject({ status: "ok", tool: "create_venv" });
    expect(run).toHaveBeenCalledWith("/usr/bin/uv", ["venv", ".venv"], expect.objectContaining({ cwd: join(root, "fresh-env") }));
  });

  it("maps a bootstrap timeout to ExecutionTimeout", async () => {
    mkdirSync(join(root, "fresh"));
    run.mockResolvedValueOnce(exec({ exitCode: 1, timedOut: true }));
    const response = await dispatcher().dispatch("install", { path: "fresh", manager: "npm", package: "react" });

    expect(response).toEqual({
      status: "error",
      kind: "ExecutionTimeout",
      message: "Failed to initialize project: npm init timed out after 30000ms",
    });
    expect(run).toHaveBeenCalledTimes(1);
  });

  it("reports a cancelled bootstrap as cancelled", async () => {
    mkdirSync(join(root, "fresh"));
    run.mockResolvedValueOnce(exec({ exitCode: 1, cancelled: true }));
    const response = await dispatcher().dispatch("add", { path: "fresh", manager: "uv", args: ["requests"] });
    expect(response).toEqual({ status: "error", kind: "ExecutionFailed", message: "uv add was cancelled" });
  });

  it("rejects work beyond max_concurrent_tasks as Busy", async () => {
    const gate = deferred<ExecutionResult>();
    const entered = deferred<void>();
    run.mockImplementationOnce(() => {
      entered.resolve();
      return gate.promise;
    });
    const relay = dispatcher({ max_concurrent_tasks: 1 });

    const first = relay.dispatch("install", { path: ".", manager: "uv", package: "requests" });
    await entered.promise;
    expect(relay.activeCount).toBe(1);

    const second = await relay.dispatch("install", { path: ".", manager: "uv", package: "pandas" });
    expect(second).toMatchObject({ status: "error", kind: "Busy" });

    gate.resolve(exec());
    expect(await first).toMatchObject({ status: "ok" });
    expect(relay.activeCount).toBe(0);
  });
});
