/**
 * pkgrelay CLI.
 * Commands: init, start, stop, status, run
 */
import { Command } from 'commander';
import fs from 'fs-extra';
import path from 'path';
import chalk from 'chalk';
import { randomUUID } from 'crypto';
import {
  loadConfig,
  relayPaths,
  resolveAuthToken,
  generateDefaultConfig,
} from './config.js';
import type { PkgRelayConfig } from './config.js';
import { scaffold, writePid, removePid, readPid } from './lifecycle.js';
import { createConsoleLogger } from './logger.js';
import { ToolDispatcher } from './devkit/dispatcher.js';
import { errorMessage } from './devkit/errors.js';
import { RelayExecutor } from './executor.js';
import { RelayServer } from './server.js';

const program = new Command();

program
  .name('pkgrelay')
  .description('pkgrelay: guarded npm, uv and pip operations for AI agents')
  .version('0.1.0');

function loadOrExit(): PkgRelayConfig {
  try {
    return loadConfig();
  } catch (err) {
    console.error(chalk.red(`Invalid configuration: ${errorMessage(err)}`));
    process.exit(1);
  }
}

// ─── init ───

program
  .command('init')
  .description('Create ~/.pkgrelay and write a default config.yaml')
  .option('-p, --project-dir <dir>', 'Confinement root for all operations', process.cwd())
  .action((opts: { projectDir: string }) => {
    scaffold();
    const paths = relayPaths();

    if (fs.existsSync(paths.config)) {
      console.log(chalk.yellow(`Config already exists at ${paths.config}`));
      console.log('Delete it first if you want to reinitialize.');
      return;
    }

    const authToken = randomUUID();
    const projectDir = path.resolve(opts.projectDir);
    fs.writeFileSync(paths.config, generateDefaultConfig(projectDir, authToken), 'utf-8');

    console.log(chalk.green(`✓ pkgrelay initialized at ${paths.home}`));
    console.log(chalk.dim(`  Config:  ${paths.config}`));
    console.log(chalk.dim(`  Project: ${projectDir}`));
    console.log(chalk.dim(`  Token:   ${authToken}`));
  });

// ─── start ───

program
  .command('start')
  .description('Start the pkgrelay WebSocket server')
  .action(async () => {
    scaffold();
    const config = loadOrExit();
    const authToken = resolveAuthToken(config);

    if (!writePid()) {
      console.error(chalk.red('Another pkgrelay instance is already running.'));
      process.exit(1);
    }

    const log = createConsoleLogger(config.log_level);
    const dispatcher = new ToolDispatcher({ config, log });
    const executor = new RelayExecutor(dispatcher);
    const server = new RelayServer({
      config,
      authToken,
      executor,
      activeTasks: () => dispatcher.activeCount,
      onLog: log,
    });

    console.log(chalk.green(`Starting pkgrelay on port ${config.port}...`));
    console.log(chalk.dim(`  Tools: ${executor.getCapabilities().join(', ')}`));

    const shutdown = async () => {
      console.log(chalk.yellow('\nShutting down pkgrelay...'));
      await server.stop();
      removePid();
      console.log(chalk.green('pkgrelay stopped.'));
      process.exit(0);
    };

    process.on('SIGINT', () => void shutdown());
    process.on('SIGTERM', () => void shutdown());

    try {
      await server.start();
      console.log(chalk.green('✓ pkgrelay is running'));
      console.log(chalk.dim(`  Project:   ${config.project_dir}`));
      console.log(chalk.dim(`  Whitelist: ${config.allowed_packages ? config.allowed_packages.join(', ') : 'unrestricted'}`));
    } catch (err) {
      console.error(chalk.red(`Failed to start: ${errorMessage(err)}`));
      removePid();
      process.exit(1);
    }
  });

// ─── stop ───

program
  .command('stop')
  .description('Stop a running pkgrelay instance')
  .action(() => {
    const pid = readPid();
    if (!pid) {
      console.log(chalk.yellow('No pkgrelay instance is running.'));
      return;
    }

    try {
      process.kill(pid, 'SIGTERM');
      console.log(chalk.green(`Sent SIGTERM to pkgrelay (PID: ${pid}).`));
    } catch (err) {
      console.error(chalk.red(`Failed to stop: ${errorMessage(err)}`));
    }
  });

// ─── status ───

program
  .command('status')
  .description('Show pkgrelay instance status')
  .action(() => {
    const pid = readPid();
    if (!pid) {
      console.log(chalk.yellow('pkgrelay is not running.'));
      return;
    }

    console.log(chalk.green(`pkgrelay is running (PID: ${pid})`));
    try {
      const config = loadConfig();
      console.log(chalk.dim(`  Port:    ${config.port}`));
      console.log(chalk.dim(`  Project: ${config.project_dir}`));
    } catch (err) {
      console.log(chalk.dim(`  Config unavailable: ${errorMessage(err)}`));
    }
  });

// ─── run ───

interface RunOptions {
  path: string;
  manager?: string;
  package?: string;
  venvName?: string;
}

program
  .command('run')
  .description('Run one tool call in-process and print the JSON response')
  .argument('<tool>', 'install, uninstall, init, create_venv or add')
  .argument('[args...]', 'Arguments for add')
  .option('--path <path>', 'Project directory', '.')
  .option('-m, --manager <manager>', 'npm, uv or pip')
  .option('--package <spec>', 'Package spec for install and uninstall')
  .option('--venv-name <name>', 'Virtual environment name for create_venv')
  .action(async (tool: string, args: string[], opts: RunOptions) => {
    const config = loadOrExit();
    // stdout carries the JSON response only
    const dispatcher = new ToolDispatcher({ config, log: createConsoleLogger(config.log_level, { stderrOnly: true }) });

    const params: Record<string, unknown> = { path: opts.path };
    if (opts.manager) params.manager = opts.manager;
    if (opts.package) params.package = opts.package;
    if (opts.venvName) params.venv_name = opts.venvName;
    if (args.length) params.args = args;

    const response = await dispatcher.dispatch(tool, params);
    console.log(JSON.stringify(response, null, 2));
    if (response.status === 'error') process.exitCode = 1;
  });

export { program };
