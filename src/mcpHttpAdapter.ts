import type { Express, Request, Response } from 'express';
import type { McpServer } from '@modelcontextprotocol/sdk/server/mcp.js';
import { StreamableHTTPServerTransport } from '@modelcontextprotocol/sdk/server/streamableHttp.js';
import { ErrorHelper } from './utils/ErrorHelper.js';

// Keeps the MCP SDK transport glue in one place so index.ts only wires things together.

export async function attachMcpStreamableHttpEndpoint(opts: { app: Express; mcpServer: McpServer; path: string }): Promise<void> {
  const { app, mcpServer, path } = opts;

  // Stateless mode: every request stands alone, so any instance can serve it.
  const transport = new StreamableHTTPServerTransport({
    sessionIdGenerator: undefined,
  });

  await mcpServer.connect(transport);

  app.all(path, async (req: Request, res: Response) => {
    try {
      await transport.handleRequest(req, res, req.body);
    } catch (err) {
      ErrorHelper.LogErrorForCloud(err, `MCP request ${req.method} ${path}`);
      if (!res.headersSent) {
        res.status(500).json({ jsonrpc: '2.0', error: { code: -32603, message: 'Internal server error' }, id: null });
      }
    }
  });
}
