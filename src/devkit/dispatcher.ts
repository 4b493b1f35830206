/**
 * Tool dispatcher: the single entry point for one tool call.
 *
 * received → path_validated → whitelist_validated → manager_resolved →
 * command_built → executed → succeeded | failed
 *
 * Every stage before `executed` may short-circuit with a ToolError; nothing
 * is spawned until all of them pass.
 */
import fs from 'fs-extra';
import path from 'path';
import { z } from 'zod';
import type { PkgRelayConfig } from '../config.js';
import type { Logger } from '../logger.js';
import { silentLogger } from '../logger.js';
import { ShellAdapter } from './adapters/shell.js';
import { ToolError, errorMessage, isToolError } from './errors.js';
import { confineFile, confinePath } from './guards/path.js';
import type { AllowSet } from './guards/whitelist.js';
import { validatePackage, validateRequirementsFile } from './guards/whitelist.js';
import {
  MANIFESTS,
  buildBootstrapCommand,
  buildCommand,
  checkRequest,
  parseAddArgs,
  requirementsFromPackage,
  venvName,
} from './managers/commands.js';
import type { BuildOptions } from './managers/commands.js';
import { ManagerResolver } from './managers/resolver.js';
import { MANAGER_IDS, TOOL_NAMES } from './types.js';
import type { ExecutionResult, ManagerExecutable, ManagerId, ResolvedCommand, ToolName, ToolRequest, ToolResponse } from './types.js';
import { isWithinDir } from './utils.js';

export const ToolParamsSchema = z.object({
  path: z.string().min(1).describe('Project directory, absolute or relative to the project root'),
  manager: z.enum(MANAGER_IDS).optional().describe('Package manager: npm, uv or pip (default uv, or pip when USE_UV=false)'),
  package: z.string().min(1).optional().describe("Package spec, e.g. 'requests==2.31' or 'react@18', or '-r requirements.txt'"),
  args: z.array(z.string()).optional().describe('Arguments passed through to `add`'),
  venv_name: z.string().min(1).optional().describe('Virtual environment directory name'),
});

export type ToolParams = z.infer<typeof ToolParamsSchema>;

export type DispatchStage =
  | 'received'
  | 'path_validated'
  | 'whitelist_validated'
  | 'manager_resolved'
  | 'command_built'
  | 'executed';

export interface DispatcherOptions {
  config: PkgRelayConfig;
  shell?: Pick<ShellAdapter, 'run' | 'which'>;
  resolver?: Pick<ManagerResolver, 'resolve'>;
  log?: Logger;
}

export interface DispatchOptions {
  /** Aborting terminates the request's child process. */
  signal?: AbortSignal;
}

const TOOL_NAME_SET: ReadonlySet<string> = new Set(TOOL_NAMES);

export function isToolName(name: string): name is ToolName {
  return TOOL_NAME_SET.has(name);
}

export class ToolDispatcher {
  private readonly config: PkgRelayConfig;
  private readonly shell: Pick<ShellAdapter, 'run' | 'which'>;
  private readonly resolver: Pick<ManagerResolver, 'resolve'>;
  private readonly log: Logger;
  private readonly allowed: AllowSet;
  private active = 0;

  constructor(options: DispatcherOptions) {
    this.config = options.config;
    this.shell = options.shell ?? ShellAdapter.create();
    this.log = options.log ?? silentLogger;
    this.allowed = options.config.allowed_packages ? new Set(options.config.allowed_packages) : null;
    this.resolver = options.resolver ?? new ManagerResolver({
      overrides: { npm: this.config.npm_path, uv: this.config.uv_path, pip: this.config.pip_path },
      which: (binary) => this.shell.which(binary),
    });
  }

  /** Number of requests currently running a subprocess. */
  get activeCount(): number {
    return this.active;
  }

  async dispatch(tool: string, params: unknown, options: DispatchOptions = {}): Promise<ToolResponse> {
    let stage: DispatchStage = 'received';
    const advance = (next: DispatchStage) => {
      stage = next;
      this.log(`[${tool}] ${next}`, 'debug');
    };

    try {
      const request = this.parse(tool, params);
      checkRequest(request, this.config.venv_name);

      const cwd = await confinePath(
        request.path,
        this.config.project_dir,
        request.tool === 'init' || request.tool === 'create_venv' ? 'parent' : 'exists',
      );
      const requirementFiles = await this.confineRequirements(request, cwd);
      if (request.tool === 'create_venv') await this.confineVenv(request, cwd);
      advance('path_validated');

      await this.checkWhitelist(request, requirementFiles);
      advance('whitelist_validated');

      const executable = await this.resolver.resolve(request.manager);
      advance('manager_resolved');

      const buildOptions: BuildOptions = {
        cwd,
        timeouts: this.config.timeouts,
        defaultVenvName: this.config.venv_name,
        hasPyproject: await fs.pathExists(path.join(cwd, 'pyproject.toml')),
      };
      const command = buildCommand(request, executable, buildOptions);
      advance('command_built');

      const result = await this.admit(() => this.execute(request, executable, command, buildOptions, options.signal));
      advance('executed');

      return await this.normalize(request, command, result);
    } catch (err) {
      return this.fail(tool, stage, err);
    }
  }

  // ─── Stages ───

  private parse(tool: string, params: unknown): ToolRequest {
    if (!isToolName(tool)) {
      throw new ToolError('CommandBuildError', `Unknown tool: '${tool}'. Available: [${TOOL_NAMES.join(', ')}]`);
    }
    const parsed = ToolParamsSchema.safeParse(params);
    if (!parsed.success) {
      const issues = parsed.error.issues.map(i => `${i.path.join('.') || 'params'}: ${i.message}`);
      throw new ToolError('CommandBuildError', `Invalid parameters for '${tool}': ${issues.join('; ')}`);
    }
    // venv and add are uv commands; elsewhere USE_UV picks the Python manager
    const defaultManager: ManagerId = tool === 'create_venv' || tool === 'add' || this.config.use_uv ? 'uv' : 'pip';
    return { ...parsed.data, tool, manager: parsed.data.manager ?? defaultManager };
  }

  private async confineRequirements(request: ToolRequest, cwd: string): Promise<string[]> {
    const confine = (files: string[]) => Promise.all(files.map(file => confineFile(file, cwd, this.config.project_dir)));
    if (request.tool === 'add') {
      const { requirements, constraints } = parseAddArgs(request.args ?? []);
      // constraint files are read by the manager but name nothing to install
      await confine(constraints);
      return confine(requirements);
    }
    const requirements = request.tool === 'install' ? requirementsFromPackage(request.package) : undefined;
    return confine(requirements === undefined ? [] : [requirements]);
  }

  /**
   * The venv lands inside the target directory, never beside or above it.
   * Intermediate symlinks are followed before the check.
   */
  private async confineVenv(request: ToolRequest, cwd: string): Promise<void> {
    const name = venvName(request, { defaultVenvName: this.config.venv_name });
    let target = path.resolve(cwd, name);
    // a target directory that does not exist yet holds no links to follow
    if (await fs.pathExists(cwd)) {
      target = await confinePath(target, this.config.project_dir, 'parent');
    }
    if (!isWithinDir(target, cwd) || target === cwd) {
      throw new ToolError('PathTraversal', `Virtual environment '${name}' must be inside '${request.path}'`);
    }
  }

  private async checkWhitelist(request: ToolRequest, requirementFiles: string[]): Promise<void> {
    for (const file of requirementFiles) {
      await validateRequirementsFile(request.manager, file, this.allowed);
    }
    if (request.tool === 'add') {
      for (const spec of parseAddArgs(request.args ?? []).packages) {
        validatePackage(request.manager, spec, this.allowed);
      }
    } else if (request.package && requirementsFromPackage(request.package) === undefined) {
      validatePackage(request.manager, request.package, this.allowed);
    }
  }

  /** Rejects rather than queues once max_concurrent_tasks are running. */
  private async admit<T>(work: () => Promise<T>): Promise<T> {
    if (this.active >= this.config.max_concurrent_tasks) {
      throw new ToolError('Busy', `Too many concurrent executions (max_concurrent_tasks=${this.config.max_concurrent_tasks})`);
    }
    this.active++;
    try {
      return await work();
    } finally {
      this.active--;
    }
  }

  private async execute(
    request: ToolRequest,
    executable: ManagerExecutable,
    command: ResolvedCommand,
    buildOptions: BuildOptions,
    signal?: AbortSignal,
  ): Promise<ExecutionResult> {
    if (request.tool === 'init' || request.tool === 'create_venv') {
      await fs.ensureDir(command.working_directory);
    }

    const manifest = MANIFESTS[request.manager];
    if ((request.tool === 'install' || request.tool === 'add') && manifest
      && !(await fs.pathExists(path.join(command.working_directory, manifest)))) {
      const bootstrap = buildBootstrapCommand(executable, buildOptions);
      if (bootstrap) {
        this.log(`[${request.tool}] no ${manifest} in ${command.working_directory}, initializing`, 'info');
        const init = await this.run(bootstrap, signal);
        if (init.timedOut) {
          throw new ToolError('ExecutionTimeout', `Failed to initialize project: ${request.manager} init timed out after ${bootstrap.timeout_ms}ms`);
        }
        if (init.cancelled) {
          throw new ToolError('ExecutionFailed', `${request.manager} ${request.tool} was cancelled`);
        }
        if (init.exitCode !== 0) {
          throw new ToolError('ExecutionFailed', `Failed to initialize project: ${init.stderr.trim() || `exit code ${init.exitCode}`}`);
        }
      }
    }

    return this.run(command, signal);
  }

  private run(command: ResolvedCommand, signal?: AbortSignal): Promise<ExecutionResult> {
    this.log(`Running ${[command.executable_path, ...command.argument_vector].join(' ')} in ${command.working_directory}`, 'debug');
    return this.shell.run(command.executable_path, command.argument_vector, {
      cwd: command.working_directory,
      timeout_ms: command.timeout_ms,
      env: command.env_overrides,
      max_output_bytes: this.config.max_install_size,
      kill_grace_ms: this.config.kill_grace_ms,
      signal,
    });
  }

  // ─── Normalization ───

  private async normalize(request: ToolRequest, command: ResolvedCommand, result: ExecutionResult): Promise<ToolResponse> {
    const details = {
      exit_code: result.exitCode,
      stdout: result.stdout,
      stderr: result.stderr,
      duration_ms: result.durationMs,
    };

    if (result.timedOut) {
      return { status: 'error', kind: 'ExecutionTimeout', message: `${request.manager} ${request.tool} timed out after ${command.timeout_ms}ms`, ...details };
    }
    if (result.cancelled) {
      return { status: 'error', kind: 'ExecutionFailed', message: `${request.manager} ${request.tool} was cancelled`, ...details };
    }
    if (result.exitCode !== 0) {
      const reason = result.spawnError ? `could not start: ${result.spawnError}` : `failed with exit code ${result.exitCode}`;
      return { status: 'error', kind: 'ExecutionFailed', message: `${request.manager} ${request.tool} ${reason}`, ...details };
    }

    if (request.tool === 'create_venv') {
      const venvDir = path.resolve(command.working_directory, venvName(request, { defaultVenvName: this.config.venv_name }));
      if (!(await fs.pathExists(venvDir))) {
        return { status: 'error', kind: 'ExecutionFailed', message: `uv venv exited 0 but ${venvDir} was not created`, ...details };
      }
    }

    if (result.truncated.stdout || result.truncated.stderr) {
      this.log(`[${request.tool}] output truncated at ${this.config.max_install_size} bytes`, 'warn');
    }

    return {
      status: 'ok',
      tool: request.tool,
      exit_code: 0,
      stdout: result.stdout,
      stderr: result.stderr,
      duration_ms: result.durationMs,
      truncated: result.truncated.stdout || result.truncated.stderr,
    };
  }

  private fail(tool: string, stage: DispatchStage, err: unknown): ToolResponse {
    if (isToolError(err)) {
      this.log(`[${tool}] rejected after ${stage}: ${err.kind}: ${err.message}`, 'warn');
      return { status: 'error', kind: err.kind, message: err.message };
    }
    this.log(`[${tool}] failed after ${stage}: ${errorMessage(err)}`, 'error');
    return { status: 'error', kind: 'InternalError', message: errorMessage(err) };
  }
}
