import { z } from 'zod';
import type { McpServer } from '@modelcontextprotocol/sdk/server/mcp.js';
import type { CallToolResult } from '@modelcontextprotocol/sdk/types.js';
import type { ChartService } from '../processor/ChartService.js';
import { chartDataSchema, runChartTool } from './chartToolSupport.js';

export const barChartInputSchema = {
  data: chartDataSchema,
  x_column: z.string().optional().describe('Column for the category axis. Inferred when omitted or not found.'),
  y_column: z.string().optional().describe('Column for the bar heights. Must be numeric.'),
  title: z.string().default('Bar Chart').describe('Chart title'),
  x_label: z.string().default('Categories').describe('Category axis label'),
  y_label: z.string().default('Values').describe('Value axis label'),
  color: z.string().default('steelblue').describe('Bar color: a CSS color name or hex code'),
  horizontal: z.boolean().default(false).describe('Draw horizontal bars'),
};

export type BarChartArgs = z.infer<z.ZodObject<typeof barChartInputSchema>>;

export function handleCreateBarChart(service: ChartService, args: BarChartArgs): Promise<CallToolResult> {
  return runChartTool(service, {
    Kind: 'bar',
    Data: args.data,
    Hints: { XColumn: args.x_column, YColumn: args.y_column },
    Style: {
      Title: args.title,
      XLabel: args.x_label,
      YLabel: args.y_label,
      Color: args.color,
      Horizontal: args.horizontal,
    },
  });
}

export function registerCreateBarChartTool(server: McpServer, service: ChartService) {
  server.registerTool('create_bar_chart', {
    description: 'Create a bar chart from tabular data and return it as a PNG image. With two columns and no hints, a text column becomes the categories and the numeric column the bar heights, whatever their order. A single column of numbers is plotted against its position.',
    inputSchema: barChartInputSchema,
  }, async (args) => handleCreateBarChart(service, args));
}
