import type { ToolDispatcher } from './dispatcher.js';

export const TOOL_NAMES = ['install', 'uninstall', 'init', 'create_venv', 'add'] as const;
export const MANAGER_IDS = ['npm', 'uv', 'pip'] as const;

export type ToolName = (typeof TOOL_NAMES)[number];
export type ManagerId = (typeof MANAGER_IDS)[number];

/** One tool call after parameter validation. */
export interface ToolRequest {
  tool: ToolName;
  path: string;
  manager: ManagerId;
  package?: string;
  args?: string[];
  venv_name?: string;
}

/** A launchable manager binary. `prefixArgs` go before the command's own args. */
export interface ManagerExecutable {
  manager: ManagerId;
  file: string;
  prefixArgs: string[];
}

export interface ResolvedCommand {
  readonly executable_path: string;
  readonly argument_vector: readonly string[];
  readonly working_directory: string;
  readonly timeout_ms: number;
  readonly env_overrides: Readonly<Record<string, string>>;
}

export interface ExecutionResult {
  exitCode: number;
  stdout: string;
  stderr: string;
  durationMs: number;
  timedOut: boolean;
  cancelled: boolean;
  truncated: { stdout: boolean; stderr: boolean };
  /** Set when the child could not be started at all. */
  spawnError?: string;
  pid?: number;
}

export type ToolResponse =
  | {
      status: 'ok';
      tool: ToolName;
      exit_code: number;
      stdout: string;
      stderr: string;
      duration_ms: number;
      truncated: boolean;
    }
  | {
      status: 'error';
      kind: string;
      message: string;
      exit_code?: number;
      stdout?: string;
      stderr?: string;
      duration_ms?: number;
    };

/** What tool factories receive; tools capture it in closure. */
export interface ToolContext {
  dispatcher: Pick<ToolDispatcher, 'dispatch'>;
}
