import { z } from 'zod';
import type { McpServer } from '@modelcontextprotocol/sdk/server/mcp.js';
import type { CallToolResult } from '@modelcontextprotocol/sdk/types.js';
import type { ChartService } from '../processor/ChartService.js';
import { chartDataSchema, runChartTool } from './chartToolSupport.js';

export const lineChartInputSchema = {
  data: chartDataSchema,
  x_column: z.string().optional().describe('Column for the x axis. Text values are spaced evenly and used as tick labels.'),
  y_column: z.string().optional().describe('Column for the y axis. Must be numeric.'),
  title: z.string().default('Line Chart').describe('Chart title'),
  x_label: z.string().default('X Values').describe('X axis label'),
  y_label: z.string().default('Y Values').describe('Y axis label'),
  color: z.string().default('blue').describe('Line color: a CSS color name or hex code'),
  line_style: z.enum(['-', '--', '-.', ':']).default('-').describe('Line style: "-" solid, "--" dashed, "-." dash-dot, ":" dotted'),
  marker: z.string().default('o').describe('Point marker: "o", "s", "^", "v", "<", ">", "D", "x", "+", "*", or "" for none'),
};

export type LineChartArgs = z.infer<z.ZodObject<typeof lineChartInputSchema>>;

export function handleCreateLineChart(service: ChartService, args: LineChartArgs): Promise<CallToolResult> {
  return runChartTool(service, {
    Kind: 'line',
    Data: args.data,
    Hints: { XColumn: args.x_column, YColumn: args.y_column },
    Style: {
      Title: args.title,
      XLabel: args.x_label,
      YLabel: args.y_label,
      Color: args.color,
      LineStyle: args.line_style,
      Marker: args.marker,
    },
  });
}

export function registerCreateLineChartTool(server: McpServer, service: ChartService) {
  server.registerTool('create_line_chart', {
    description: 'Create a line chart from tabular data and return it as a PNG image. Columns are picked like the bar chart: a text column becomes the x axis, the numeric column the y values. A single column of numbers is plotted against its position.',
    inputSchema: lineChartInputSchema,
  }, async (args) => handleCreateLineChart(service, args));
}
