/**
 * pkgrelay configuration.
 * Loaded once from ~/.pkgrelay/config.yaml (or PKGRELAY_CONFIG_PATH) and
 * overlaid with environment variables, then frozen.
 */
import fs from 'fs-extra';
import path from 'path';
import os from 'os';
import yaml from 'js-yaml';
import { z } from 'zod';
import { randomUUID } from 'crypto';

// ─── Schema ───

export const OperationTimeoutsSchema = z.object({
  install: z.number().int().positive().default(300_000),
  uninstall: z.number().int().positive().default(60_000),
  init: z.number().int().positive().default(30_000),
  venv: z.number().int().positive().default(120_000),
});

export type OperationTimeouts = z.infer<typeof OperationTimeoutsSchema>;

export const LOG_LEVELS = ['debug', 'info', 'warn', 'error'] as const;
export type LogLevel = (typeof LOG_LEVELS)[number];

export const PkgRelayConfigSchema = z.object({
  /** Port for the WebSocket server */
  port: z.number().int().min(0).max(65535).default(7420),
  /** Token clients must present in the x-pkgrelay-auth header */
  auth_token: z.string().min(1).optional(),
  /** Confinement root: no operation reads or writes outside it */
  project_dir: z.string().min(1).default(process.cwd()),
  /** Package whitelist. null (or a '*' entry) = unrestricted */
  allowed_packages: z
    .array(z.string().min(1))
    .nullable()
    .default(null)
    .transform((list) => (list === null || list.includes('*') ? null : list)),
  /** Per-stream output cap for a single subprocess, in bytes */
  max_install_size: z.number().int().positive().default(50_000_000),
  timeouts: OperationTimeoutsSchema.default({}),
  npm_path: z.string().min(1).optional(),
  uv_path: z.string().min(1).optional(),
  pip_path: z.string().min(1).optional(),
  /** Default directory name for create_venv */
  venv_name: z.string().min(1).default('.venv'),
  /** uv (true) or pip (false) when a request names no manager */
  use_uv: z.boolean().default(true),
  /** Executions beyond this are rejected as Busy */
  max_concurrent_tasks: z.number().int().min(1).default(4),
  /** Wait between SIGTERM and SIGKILL on timeout or cancellation */
  kill_grace_ms: z.number().int().min(0).default(5_000),
  log_level: z.enum(LOG_LEVELS).default('info'),
});

export type PkgRelayConfig = Readonly<Omit<z.infer<typeof PkgRelayConfigSchema>, 'timeouts' | 'allowed_packages'>> & {
  readonly timeouts: Readonly<OperationTimeouts>;
  readonly allowed_packages: readonly string[] | null;
};

// ─── Paths ───

export function relayPaths(env: NodeJS.ProcessEnv = process.env) {
  const home = env.PKGRELAY_HOME ?? path.join(os.homedir(), '.pkgrelay');
  return {
    home,
    config: env.PKGRELAY_CONFIG_PATH ?? path.join(home, 'config.yaml'),
    pid: path.join(home, 'pkgrelay.pid'),
    authToken: path.join(home, 'auth_token'),
  };
}

// ─── Environment variable helpers ───

function parseBool(value: string | undefined): boolean | undefined {
  if (value === undefined) return undefined;
  const lower = value.toLowerCase();
  if (lower === 'true' || lower === '1' || lower === 'yes') return true;
  if (lower === 'false' || lower === '0' || lower === 'no') return false;
  return undefined;
}

function parseList(value: string): string[] | null {
  const items = value.split(',').map(s => s.trim()).filter(Boolean);
  return items.length ? items : null;
}

/**
 * Build a config object from environment variables.
 * Returns only the keys that have corresponding env vars set.
 */
function configFromEnv(env: NodeJS.ProcessEnv): Record<string, unknown> {
  const out: Record<string, unknown> = {};
  const timeouts: Record<string, number> = {};

  if (env.PKGRELAY_PORT) out.port = parseInt(env.PKGRELAY_PORT, 10);
  if (env.PKGRELAY_AUTH_TOKEN) out.auth_token = env.PKGRELAY_AUTH_TOKEN;
  if (env.PROJECT_DIR) out.project_dir = env.PROJECT_DIR;
  if (env.ALLOWED_PACKAGES !== undefined) out.allowed_packages = parseList(env.ALLOWED_PACKAGES);
  if (env.MAX_INSTALL_SIZE) out.max_install_size = parseInt(env.MAX_INSTALL_SIZE, 10);
  if (env.INSTALL_TIMEOUT) timeouts.install = parseInt(env.INSTALL_TIMEOUT, 10);
  if (env.UNINSTALL_TIMEOUT) timeouts.uninstall = parseInt(env.UNINSTALL_TIMEOUT, 10);
  if (env.INIT_TIMEOUT) timeouts.init = parseInt(env.INIT_TIMEOUT, 10);
  if (env.VENV_TIMEOUT) timeouts.venv = parseInt(env.VENV_TIMEOUT, 10);
  if (env.NPM_PATH) out.npm_path = env.NPM_PATH;
  if (env.UV_PATH) out.uv_path = env.UV_PATH;
  if (env.PIP_PATH) out.pip_path = env.PIP_PATH;
  if (env.VENV_NAME) out.venv_name = env.VENV_NAME;
  // an unrecognized value is left as a string for the schema to reject
  if (env.USE_UV !== undefined) out.use_uv = parseBool(env.USE_UV) ?? env.USE_UV;
  if (env.PKGRELAY_MAX_CONCURRENT) out.max_concurrent_tasks = parseInt(env.PKGRELAY_MAX_CONCURRENT, 10);
  if (env.PKGRELAY_KILL_GRACE_MS) out.kill_grace_ms = parseInt(env.PKGRELAY_KILL_GRACE_MS, 10);
  if (env.LOG_LEVEL) out.log_level = env.LOG_LEVEL.toLowerCase();

  if (Object.keys(timeouts).length) out.timeouts = timeouts;
  return out;
}

function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === 'object' && value !== null && !Array.isArray(value);
}

function deepFreeze<T>(value: T): T {
  if (typeof value === 'object' && value !== null) {
    for (const inner of Object.values(value)) deepFreeze(inner);
    Object.freeze(value);
  }
  return value;
}

// ─── Loader ───

let cachedConfig: PkgRelayConfig | null = null;

export interface LoadConfigOptions {
  env?: NodeJS.ProcessEnv;
}

/**
 * Load config with layered resolution:
 *   1. config.yaml (base, if it exists)
 *   2. environment variables (override; nested `timeouts` merge per key)
 *
 * The result is deep-frozen and cached for the life of the process.
 */
export function loadConfig(options: LoadConfigOptions = {}): PkgRelayConfig {
  if (cachedConfig) return cachedConfig;

  const env = options.env ?? process.env;
  const { config: configFile } = relayPaths(env);
  let fileConfig: Record<string, unknown> = {};

  if (fs.existsSync(configFile)) {
    const parsed: unknown = yaml.load(fs.readFileSync(configFile, 'utf-8'));
    if (isRecord(parsed)) {
      fileConfig = parsed;
    } else if (parsed !== undefined && parsed !== null) {
      throw new Error(`Config file ${configFile} must contain a mapping`);
    }
  }

  const envConfig = configFromEnv(env);
  const fileTimeouts = isRecord(fileConfig.timeouts) ? fileConfig.timeouts : {};
  const envTimeouts = isRecord(envConfig.timeouts) ? envConfig.timeouts : {};
  const merged = { ...fileConfig, ...envConfig, timeouts: { ...fileTimeouts, ...envTimeouts } };

  const result = PkgRelayConfigSchema.parse(merged);
  cachedConfig = deepFreeze({ ...result, project_dir: path.resolve(result.project_dir) });
  return cachedConfig;
}

export function getConfig(): PkgRelayConfig {
  if (!cachedConfig) return loadConfig();
  return cachedConfig;
}

export function resetConfigCache(): void {
  cachedConfig = null;
}

/**
 * Auth token for the server: explicit config > persisted file > generated
 * (and persisted for the next start).
 */
export function resolveAuthToken(config: PkgRelayConfig, env: NodeJS.ProcessEnv = process.env): string {
  if (config.auth_token) return config.auth_token;

  const paths = relayPaths(env);
  if (fs.existsSync(paths.authToken)) {
    const persisted = fs.readFileSync(paths.authToken, 'utf-8').trim();
    if (persisted) return persisted;
  }

  const token = randomUUID();
  fs.ensureDirSync(paths.home);
  fs.writeFileSync(paths.authToken, token, { encoding: 'utf-8', mode: 0o600 });
  return token;
}

/** Generate a default config.yaml content */
export function generateDefaultConfig(projectDir: string, authToken: string): string {
  return `# pkgrelay configuration
port: 7420
auth_token: "${authToken}"

# Confinement root: install, uninstall, init, create_venv and add stay inside it
project_dir: "${projectDir.replace(/\\/g, '/')}"

# Package whitelist (omit or null for unrestricted)
# allowed_packages: [requests, pandas, react]

# Output cap per stream, in bytes
max_install_size: 50000000

# Timeouts (ms)
timeouts:
  install: 300000
  uninstall: 60000
  init: 30000
  venv: 120000

# Executable overrides (auto-detected when omitted)
# npm_path: /usr/local/bin/npm
# uv_path: /usr/local/bin/uv
# pip_path: /usr/bin/pip3

venv_name: .venv
use_uv: true
max_concurrent_tasks: 4
kill_grace_ms: 5000

# Logging
log_level: info
`;
}
