/**
 * Relay executor: builds the DevKit tool set and runs incoming tool calls
 * through it. Every outcome, including a thrown tool, comes back as a
 * ToolResponse.
 */
import type { StructuredTool } from '@langchain/core/tools';
import { ToolInputParsingException } from '@langchain/core/tools';
import { z } from 'zod';
import { buildDevKit } from './devkit/index.js';
import type { ToolDispatcher } from './devkit/dispatcher.js';
import { errorMessage } from './devkit/errors.js';
import { TOOL_NAMES } from './devkit/types.js';
import type { ToolResponse } from './devkit/types.js';

const ToolResponseSchema: z.ZodType<ToolResponse> = z.discriminatedUnion('status', [
  z.object({
    status: z.literal('ok'),
    tool: z.enum(TOOL_NAMES),
    exit_code: z.number(),
    stdout: z.string(),
    stderr: z.string(),
    duration_ms: z.number(),
    truncated: z.boolean(),
  }),
  z.object({
    status: z.literal('error'),
    kind: z.string(),
    message: z.string(),
    exit_code: z.number().optional(),
    stdout: z.string().optional(),
    stderr: z.string().optional(),
    duration_ms: z.number().optional(),
  }),
]);

export class RelayExecutor {
  private tools: Map<string, StructuredTool> = new Map();

  constructor(private dispatcher: Pick<ToolDispatcher, 'dispatch'>) {
    for (const tool of buildDevKit({ dispatcher })) {
      this.tools.set(tool.name, tool);
    }
  }

  /** Get list of available tool names (capabilities) */
  getCapabilities(): string[] {
    return [...this.tools.keys()];
  }

  describeTools(): { name: string; description: string }[] {
    return [...this.tools.values()].map(({ name, description }) => ({ name, description }));
  }

  /** Execute a tool by name with the given arguments */
  async execute(toolName: string, args: Record<string, unknown>, signal?: AbortSignal): Promise<ToolResponse> {
    const tool = this.tools.get(toolName);
    if (!tool) {
      // the dispatcher owns the unknown-tool response
      return this.dispatcher.dispatch(toolName, args, { signal });
    }

    try {
      const raw: unknown = await tool.invoke(args, { signal });
      if (typeof raw !== 'string') {
        return { status: 'error', kind: 'InternalError', message: `Tool '${toolName}' returned a non-string result` };
      }
      return ToolResponseSchema.parse(JSON.parse(raw));
    } catch (err) {
      if (err instanceof ToolInputParsingException) {
        return { status: 'error', kind: 'CommandBuildError', message: `Invalid parameters for '${toolName}': ${err.message}` };
      }
      if (signal?.aborted) {
        return { status: 'error', kind: 'ExecutionFailed', message: `'${toolName}' was cancelled` };
      }
      return { status: 'error', kind: 'InternalError', message: errorMessage(err) };
    }
  }
}
