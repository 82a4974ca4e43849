import type { McpServer } from '@modelcontextprotocol/sdk/server/mcp.js';
import type { ChartService } from '../processor/ChartService.js';

// Tool registry
//
// Add new MCP tools by:
//  1) Creating a new file in this folder (e.g. `src/tools/createScatterChart.ts`)
//  2) Exporting a `registerXxxTool(server: McpServer, service: ChartService)` function
//  3) Importing and calling it inside `registerTools()` below

import { registerCreateBarChartTool } from './createBarChart.js';
import { registerCreateHistogramTool } from './createHistogram.js';
import { registerCreateLineChartTool } from './createLineChart.js';
import { registerCreatePieChartTool } from './createPieChart.js';

export function registerTools(server: McpServer, service: ChartService) {
  registerCreateBarChartTool(server, service);
  registerCreateLineChartTool(server, service);
  registerCreateHistogramTool(server, service);
  registerCreatePieChartTool(server, service);
}
