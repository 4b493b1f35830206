import fs from 'fs-extra';
import os from 'os';
import path from 'path';
import { ToolError } from '../errors.js';
import type { ManagerExecutable, ManagerId } from '../types.js';
import { binaryName, isShellShim } from '../utils.js';

export type PlatformFamily = 'windows' | 'posix';

export type Probe =
  | { kind: 'path'; name: string }
  | { kind: 'file'; path: string };

type ProbeList = (env: NodeJS.ProcessEnv, home: string) => Probe[];

const onPath = (name: string): Probe => ({ kind: 'path', name });
const atFile = (...segments: (string | undefined)[]): Probe[] =>
  segments.every((s): s is string => Boolean(s)) ? [{ kind: 'file', path: path.win32.join(...segments) }] : [];
const atPosixFile = (...segments: string[]): Probe => ({ kind: 'file', path: path.posix.join(...segments) });

/** Ordered candidates per platform family and manager. First hit wins. */
export const PROBES: Record<PlatformFamily, Record<ManagerId, ProbeList>> = {
  windows: {
    npm: (env) => [
      onPath('npm'),
      ...atFile(env.APPDATA, 'npm', 'npm.cmd'),
      ...atFile(env.ProgramFiles, 'nodejs', 'npm.cmd'),
      ...atFile(env['ProgramFiles(x86)'], 'nodejs', 'npm.cmd'),
    ],
    uv: (env, home) => [
      onPath('uv'),
      ...atFile(home, '.local', 'bin', 'uv.exe'),
      ...atFile(home, '.cargo', 'bin', 'uv.exe'),
      ...atFile(env.LOCALAPPDATA, 'Programs', 'uv', 'uv.exe'),
    ],
    pip: () => [onPath('pip'), onPath('pip3')],
  },
  posix: {
    npm: () => [onPath('npm')],
    uv: (_env, home) => [
      onPath('uv'),
      atPosixFile(home, '.local', 'bin', 'uv'),
      atPosixFile(home, '.cargo', 'bin', 'uv'),
    ],
    pip: () => [onPath('pip3'), onPath('pip')],
  },
};

export interface ResolverOptions {
  /** Explicit executables from config (NPM_PATH, UV_PATH, PIP_PATH). */
  overrides?: Partial<Record<ManagerId, string>>;
  which: (binary: string) => Promise<string | null>;
  platform?: NodeJS.Platform;
  env?: NodeJS.ProcessEnv;
  homedir?: string;
  isFile?: (file: string) => Promise<boolean>;
  /** Node binary used to launch npm-cli.js in place of the npm.cmd shim. */
  nodePath?: string;
}

async function regularFile(file: string): Promise<boolean> {
  try {
    return (await fs.stat(file)).isFile();
  } catch {
    return false;
  }
}

/**
 * Maps a manager id to a launchable executable. Successful lookups are
 * cached for the life of the resolver; concurrent first calls for the same
 * manager share a single lookup. Failed lookups are not cached.
 */
export class ManagerResolver {
  private cache = new Map<ManagerId, Promise<ManagerExecutable>>();
  private readonly family: PlatformFamily;
  private readonly pathApi: path.PlatformPath;
  private readonly isFile: (file: string) => Promise<boolean>;

  constructor(private options: ResolverOptions) {
    this.family = (options.platform ?? process.platform) === 'win32' ? 'windows' : 'posix';
    this.pathApi = this.family === 'windows' ? path.win32 : path.posix;
    this.isFile = options.isFile ?? regularFile;
  }

  resolve(manager: ManagerId): Promise<ManagerExecutable> {
    const cached = this.cache.get(manager);
    if (cached) return cached;

    const pending = this.lookup(manager);
    this.cache.set(manager, pending);
    // Callers still see the rejection; only the cache entry is dropped.
    pending.catch(() => {
      if (this.cache.get(manager) === pending) this.cache.delete(manager);
    });
    return pending;
  }

  private async lookup(manager: ManagerId): Promise<ManagerExecutable> {
    const override = this.options.overrides?.[manager];
    const probes = override
      ? [this.probeFor(override)]
      : PROBES[this.family][manager](this.options.env ?? process.env, this.options.homedir ?? os.homedir());

    for (const probe of probes) {
      const found = probe.kind === 'path'
        ? await this.options.which(probe.name)
        : (await this.isFile(probe.path)) ? probe.path : null;
      if (!found) continue;

      const executable = await this.launchable(manager, found);
      if (executable) return executable;
    }

    throw new ToolError(
      'ManagerNotFound',
      override
        ? `Configured ${manager} executable '${override}' was not found or cannot be launched`
        : `No ${manager} executable found (${this.family}); set ${manager.toUpperCase()}_PATH to override`,
    );
  }

  private probeFor(override: string): Probe {
    const looksLikePath = this.pathApi.isAbsolute(override) || override.includes('/') || override.includes('\\');
    return looksLikePath ? { kind: 'file', path: override } : onPath(override);
  }

  /**
   * Turns a lookup hit into something spawn() can start without a shell.
   * On Windows `where npm` also lists the extensionless bash script, so the
   * .exe and .cmd siblings are tried; the npm.cmd shim becomes
   * `node npm-cli.js`.
   */
  private async launchable(manager: ManagerId, found: string): Promise<ManagerExecutable | null> {
    const candidates = this.family === 'windows' && !this.pathApi.extname(found)
      ? [`${found}.exe`, `${found}.cmd`]
      : [found];

    for (const file of candidates) {
      if (candidates.length > 1 && !(await this.isFile(file))) continue;
      if (!isShellShim(file)) return { manager, file, prefixArgs: [] };
      if (binaryName(file) !== 'npm') continue;

      const cli = this.pathApi.join(this.pathApi.dirname(file), 'node_modules', 'npm', 'bin', 'npm-cli.js');
      if (await this.isFile(cli)) {
        return { manager, file: this.options.nodePath ?? process.execPath, prefixArgs: [cli] };
      }
    }
    return null;
  }
}
