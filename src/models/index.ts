export { ModelAdapter } from './base.js';
export {
  type KeywordMatchingOptions,
  KeywordMatchingModel,
  keywordMatchingOptionsSchema,
} from './keyword.js';
export { type McpDependencies, McpModelAdapter, type McpOptions, mcpOptionsSchema } from './mcp.js';
export { connectSseSession, type SessionFactory, type ToolSession } from './mcp-session.js';
