/**
 * Model Context Protocol client sessions over the SSE transport.
 */

import { Client } from '@modelcontextprotocol/sdk/client/index.js';
import { SSEClientTransport } from '@modelcontextprotocol/sdk/client/sse.js';

/**
 * The subset of an MCP client session the adapter relies on.
 */
export interface ToolSession {
  listTools(): Promise<{ tools: { name: string }[] }>;
  callTool(
    params: { name: string; arguments: Record<string, unknown> },
    options?: { timeoutMs?: number },
  ): Promise<unknown>;
  serverInfo(): Record<string, unknown> | null;
  close(): Promise<void>;
}

export type SessionFactory = (opts: {
  endpoint: string;
  headers: Record<string, string>;
}) => Promise<ToolSession>;

export const CLIENT_INFO = { name: 'evalkit', version: '0.1.0' } as const;

export const connectSseSession: SessionFactory = async ({ endpoint, headers }) => {
  const client = new Client({ ...CLIENT_INFO });
  const transport = new SSEClientTransport(new URL(endpoint), {
    requestInit: { headers },
  });
  await client.connect(transport);

  return {
    async listTools() {
      const result = await client.listTools();
      return { tools: result.tools.map((tool) => ({ name: tool.name })) };
    },
    callTool(params, options) {
      return client.callTool(params, undefined, { timeout: options?.timeoutMs });
    },
    serverInfo() {
      const info = client.getServerVersion();
      return info ? { ...info } : null;
    },
    close() {
      return client.close();
    },
  };
};
