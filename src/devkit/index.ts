// Register all DevKit tool factories
// Each import triggers registerToolFactory() as a side effect
import './tools/packages.js';

export { buildDevKit } from './registry.js';
export { ToolDispatcher } from './dispatcher.js';
export type { ToolContext, ToolRequest, ToolResponse } from './types.js';
