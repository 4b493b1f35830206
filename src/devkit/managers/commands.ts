import { ToolError } from '../errors.js';
import type { ManagerExecutable, ManagerId, ResolvedCommand, ToolName, ToolRequest } from '../types.js';
import type { OperationTimeouts } from '../../config.js';

/** Project manifest each manager's install/add expects in the working directory. */
export const MANIFESTS: Record<ManagerId, string | null> = {
  npm: 'package.json',
  uv: 'pyproject.toml',
  pip: null,
};

const TIMEOUT_KEYS: Record<ToolName, keyof OperationTimeouts> = {
  install: 'install',
  add: 'install',
  uninstall: 'uninstall',
  init: 'init',
  create_venv: 'venv',
};

const QUIET_ENV: Record<ManagerId, Record<string, string>> = {
  npm: { npm_config_fund: 'false', npm_config_audit: 'false', npm_config_update_notifier: 'false', npm_config_yes: 'true' },
  uv: { UV_NO_PROGRESS: '1' },
  pip: { PIP_DISABLE_PIP_VERSION_CHECK: '1', PIP_NO_INPUT: '1' },
};

/** uv add / npm add options whose next argument is a value, not a package. */
const VALUE_FLAGS = new Set([
  '--group', '--optional', '--extra', '--index', '--default-index', '--index-url', '--extra-index-url',
  '--python', '-p', '--package', '--marker', '-m', '--tag', '--branch', '--rev', '--bounds',
  '--registry', '--workspace', '-w', '--omit', '--include',
]);
const REQUIREMENT_FLAGS = new Set(['-r', '--requirements', '--requirement']);
const CONSTRAINT_FLAGS = new Set(['-c', '--constraints', '--constraint']);
/** Options that point the manager at another project, prefix or the global install. */
const LOCATION_FLAGS = new Set([
  '--directory', '--project', '--prefix', '--cwd', '-C', '--script',
  '--global', '-g', '--location', '--userconfig', '--globalconfig', '--cache', '--cache-dir',
]);

export interface BuildOptions {
  /** Confined working directory. */
  cwd: string;
  timeouts: OperationTimeouts;
  defaultVenvName: string;
  /** Whether `cwd` already holds a pyproject.toml (decides uv remove vs uv pip uninstall). */
  hasPyproject: boolean;
}

export interface AddArguments {
  packages: string[];
  requirements: string[];
  constraints: string[];
}

/** `-r requirements.txt` given as the install package. */
export function requirementsFromPackage(spec: string | undefined): string | undefined {
  const match = spec?.trim().match(/^(?:-r|--requirements?)(?:\s+|=)(\S.*)$/);
  return match?.[1]?.trim();
}

function rejectOption(option: string, reason: string): ToolError {
  return new ToolError('CommandBuildError', `Option '${option}' is not allowed: ${reason}`);
}

/**
 * Splits `add` arguments into package specs, requirement files and
 * constraint files so all of them can be checked before anything runs.
 * Options that relocate the command are refused, as is any `--opt=value`
 * or attached short form that cannot be classified.
 */
export function parseAddArgs(args: readonly string[]): AddArguments {
  const parsed: AddArguments = { packages: [], requirements: [], constraints: [] };

  const takeFile = (option: string, file: string | undefined): string => {
    if (file === undefined || file === '' || file.startsWith('-')) {
      throw new ToolError('CommandBuildError', `'${option}' must be followed by a file`);
    }
    return file;
  };

  for (let i = 0; i < args.length; i++) {
    const arg = args[i] ?? '';
    const eq = arg.startsWith('--') ? arg.indexOf('=') : -1;
    const option = eq === -1 ? arg : arg.slice(0, eq);
    const inline = eq === -1 ? undefined : arg.slice(eq + 1);

    if (LOCATION_FLAGS.has(option)) {
      throw rejectOption(option, 'the working directory is set by path');
    }
    if (REQUIREMENT_FLAGS.has(option)) {
      parsed.requirements.push(takeFile(option, inline ?? args[++i]));
    } else if (CONSTRAINT_FLAGS.has(option)) {
      parsed.constraints.push(takeFile(option, inline ?? args[++i]));
    } else if (VALUE_FLAGS.has(option)) {
      if (inline === undefined) {
        if (args[i + 1] === undefined) throw new ToolError('CommandBuildError', `'${option}' requires a value`);
        i++;
      }
    } else if (inline !== undefined) {
      throw rejectOption(option, 'unrecognized option with a value');
    } else if (/^-[^-]./.test(arg)) {
      throw rejectOption(arg, 'combined or attached short options are not accepted');
    } else if (!arg.startsWith('-')) {
      parsed.packages.push(arg);
    }
  }
  return parsed;
}

function requirePackage(request: ToolRequest): string {
  const spec = request.package?.trim();
  if (!spec) throw new ToolError('CommandBuildError', `'${request.tool}' requires a package`);
  if (spec.startsWith('-')) {
    throw new ToolError('CommandBuildError', `Package '${spec}' looks like an option`);
  }
  return spec;
}

function unsupported(request: ToolRequest, hint: string): ToolError {
  return new ToolError('CommandBuildError', `'${request.tool}' is not supported for ${request.manager}: ${hint}`);
}

function toolArguments(request: ToolRequest, options: Pick<BuildOptions, 'defaultVenvName' | 'hasPyproject'>): string[] {
  const { manager } = request;

  switch (request.tool) {
    case 'install': {
      const requirements = requirementsFromPackage(request.package);
      if (requirements !== undefined) {
        if (manager === 'npm') throw unsupported(request, 'requirements files are Python-only');
        return manager === 'uv' ? ['add', '-r', requirements] : ['install', '-r', requirements];
      }
      const spec = requirePackage(request);
      return manager === 'uv' ? ['add', spec] : ['install', spec];
    }

    case 'uninstall': {
      const spec = requirePackage(request);
      if (manager === 'npm') return ['uninstall', spec];
      if (manager === 'pip') return ['uninstall', '-y', spec];
      return options.hasPyproject ? ['remove', spec] : ['pip', 'uninstall', '-y', spec];
    }

    case 'init':
      if (manager === 'npm') return ['init', '-y'];
      if (manager === 'uv') return ['init'];
      throw unsupported(request, 'pip has no project initializer');

    case 'create_venv': {
      if (manager !== 'uv') throw unsupported(request, 'virtual environments are created with uv');
      return ['venv', venvName(request, options)];
    }

    case 'add': {
      if (manager === 'pip') throw unsupported(request, 'use install');
      if (!request.args?.length) throw new ToolError('CommandBuildError', `'add' requires at least one argument`);
      const { requirements } = parseAddArgs(request.args);
      if (manager === 'npm' && requirements.length) throw unsupported(request, 'requirements files are Python-only');
      return ['add', ...request.args];
    }
  }
}

export function venvName(request: Pick<ToolRequest, 'venv_name'>, options: Pick<BuildOptions, 'defaultVenvName'>): string {
  const name = request.venv_name?.trim() || options.defaultVenvName;
  if (name.startsWith('-')) {
    throw new ToolError('CommandBuildError', `Virtual environment name '${name}' looks like an option`);
  }
  return name;
}

function freeze(
  executable: ManagerExecutable,
  args: string[],
  cwd: string,
  timeout_ms: number,
): ResolvedCommand {
  return Object.freeze({
    executable_path: executable.file,
    argument_vector: Object.freeze([...executable.prefixArgs, ...args]),
    working_directory: cwd,
    timeout_ms,
    env_overrides: Object.freeze({ ...QUIET_ENV[executable.manager] }),
  });
}

/**
 * Runs the per-tool parameter rules without an executable, so malformed
 * requests fail before any filesystem or PATH work.
 */
export function checkRequest(request: ToolRequest, defaultVenvName: string): void {
  toolArguments(request, { defaultVenvName, hasPyproject: true });
}

/** Builds the exact argument vector for one validated request. */
export function buildCommand(request: ToolRequest, executable: ManagerExecutable, options: BuildOptions): ResolvedCommand {
  const args = toolArguments(request, options);
  return freeze(executable, args, options.cwd, options.timeouts[TIMEOUT_KEYS[request.tool]]);
}

/** `npm init -y` / `uv init`, run before install or add when the manifest is missing. */
export function buildBootstrapCommand(executable: ManagerExecutable, options: BuildOptions): ResolvedCommand | null {
  const args = executable.manager === 'npm' ? ['init', '-y'] : executable.manager === 'uv' ? ['init'] : null;
  return args ? freeze(executable, args, options.cwd, options.timeouts.init) : null;
}
