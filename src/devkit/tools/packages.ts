import { tool } from '@langchain/core/tools';
import type { StructuredTool } from '@langchain/core/tools';
import { ToolParamsSchema } from '../dispatcher.js';
import type { ToolContext, ToolName } from '../types.js';
import { registerToolFactory } from '../registry.js';

const packageSchema = ToolParamsSchema.pick({ path: true, manager: true, package: true }).required({ package: true });

/**
 * One structured tool per package operation. Each returns the dispatcher's
 * response serialized as JSON; failures are reported in that payload, not thrown.
 */
export function createPackageTools(ctx: ToolContext): StructuredTool[] {
  async function run(name: ToolName, input: unknown, signal?: AbortSignal): Promise<string> {
    const response = await ctx.dispatcher.dispatch(name, input, { signal });
    return JSON.stringify(response);
  }

  return [
    tool(
      async (input, config) => run('install', input, config?.signal),
      {
        name: 'install',
        description: "Install a package with npm, uv or pip. For Python, pass '-r requirements.txt' as the package to install from a requirements file.",
        schema: packageSchema,
      }
    ),

    tool(
      async (input, config) => run('uninstall', input, config?.signal),
      {
        name: 'uninstall',
        description: 'Uninstall a package with npm, uv or pip.',
        schema: packageSchema,
      }
    ),

    tool(
      async (input, config) => run('init', input, config?.signal),
      {
        name: 'init',
        description: 'Initialize a project: package.json (npm init -y) or pyproject.toml (uv init).',
        schema: ToolParamsSchema.pick({ path: true, manager: true }),
      }
    ),

    tool(
      async (input, config) => run('create_venv', input, config?.signal),
      {
        name: 'create_venv',
        description: 'Create a Python virtual environment with uv venv.',
        schema: ToolParamsSchema.pick({ path: true, venv_name: true }),
      }
    ),

    tool(
      async (input, config) => run('add', input, config?.signal),
      {
        name: 'add',
        description: 'Run `uv add` (or `npm add`) with the given arguments, e.g. ["requests", "--dev"] or ["-r", "requirements.txt"].',
        schema: ToolParamsSchema.pick({ path: true, manager: true, args: true }).required({ args: true }),
      }
    ),
  ];
}

registerToolFactory(createPackageTools);
