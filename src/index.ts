/*
 * Copyright 2026 Mark Isham
 *
 * Licensed under the Apache License, Version 2.0 (the "License");
 * you may not use this file except in compliance with the License.
 * You may obtain a copy of the License at
 *
 *     http://www.apache.org/licenses/LICENSE-2.0
 *
 * Unless required by applicable law or agreed to in writing, software
 * distributed under the License is distributed on an "AS IS" BASIS,
 * WITHOUT WARRANTIES OR CONDITIONS OF ANY KIND, either express or implied.
 * See the License for the specific language governing permissions and
 * limitations under the License.
 */

import express from 'express';
import { McpServer } from '@modelcontextprotocol/sdk/server/mcp.js';
import { attachMcpStreamableHttpEndpoint } from './mcpHttpAdapter.js';
import { ChartService } from './processor/ChartService.js';
import { VegaChartRenderer } from './render/VegaChartRenderer.js';
import { registerTools } from './tools/registerTools.js';
import { ChartsmithSettings } from './utils/ChartsmithSettings.js';
import { ErrorHelper } from './utils/ErrorHelper.js';
import { LogHelper } from './utils/LogHelper.js';

// NOTE: Serves the chart tools over Streamable HTTP MCP at the configured path (default /mcp).

const environment = process.env.ENVIRONMENT ?? 'development';
const buildNumber = process.env.BUILD_NUMBER ?? 'local';

async function main() {
  const settings = ChartsmithSettings.Load();
  const port = Number(process.env.PORT ?? settings.Server.Port);

  const app = express();

  // CORS middleware - required for MCP Streamable HTTP when called from other origins
  app.use((req, res, next) => {
    res.header('Access-Control-Allow-Origin', '*');
    res.header('Access-Control-Allow-Methods', 'GET, POST, OPTIONS');
    res.header('Access-Control-Allow-Headers', 'Content-Type, Authorization, Mcp-Session-Id');

    if (req.method === 'OPTIONS') {
      res.sendStatus(200);
      return;
    }

    next();
  });

  app.use(express.json({ limit: settings.Server.JsonLimit }));

  app.get('/', (_req, res) => {
    res.type('text/plain').send('Chartsmith: OK');
  });

  const mcpServer = new McpServer({
    name: 'Chartsmith',
    version: '0.1.0',
  });

  const chartService = new ChartService(new VegaChartRenderer(settings.Render), settings.Histogram);
  registerTools(mcpServer, chartService);

  await attachMcpStreamableHttpEndpoint({ app, mcpServer, path: settings.Server.McpPath });

  app.listen(port, () => {
    LogHelper.LogForCloud(`Chartsmith listening on :${port}`, {
      environment,
      buildNumber,
      mcpPath: settings.Server.McpPath,
    });
  });
}

if (require.main === module) {
  main().catch(err => {
    ErrorHelper.LogErrorForCloud(err, 'startup');
    process.exit(1);
  });
}
