import { z } from 'zod';
import type { McpServer } from '@modelcontextprotocol/sdk/server/mcp.js';
import type { CallToolResult } from '@modelcontextprotocol/sdk/types.js';
import type { ChartService } from '../processor/ChartService.js';
import { chartDataSchema, runChartTool } from './chartToolSupport.js';

export const pieChartInputSchema = {
  data: chartDataSchema,
  labels_column: z.string().optional().describe('Column for slice labels'),
  values_column: z.string().optional().describe('Column for slice sizes. Must be numeric; zero and negative values are left out.'),
  title: z.string().default('Pie Chart').describe('Chart title'),
  colors: z.array(z.string()).optional().describe('Slice colors, in slice order'),
  autopct: z.string().default('%1.1f%%').describe('printf-style format for slice percentages, e.g. "%1.1f%%"; "" hides them'),
  startangle: z.number().default(90).describe('Angle in degrees, counter-clockwise from the x axis, where the first slice starts'),
};

export type PieChartArgs = z.infer<z.ZodObject<typeof pieChartInputSchema>>;

export function handleCreatePieChart(service: ChartService, args: PieChartArgs): Promise<CallToolResult> {
  return runChartTool(service, {
    Kind: 'pie',
    Data: args.data,
    Hints: { LabelsColumn: args.labels_column, ValuesColumn: args.values_column },
    Style: {
      Title: args.title,
      Colors: args.colors ?? null,
      Autopct: args.autopct,
      StartAngle: args.startangle,
    },
  });
}

export function registerCreatePieChartTool(server: McpServer, service: ChartService) {
  server.registerTool('create_pie_chart', {
    description: 'Create a pie chart from labelled values and return it as a PNG image. Rows whose value is zero or negative are dropped; the call fails if no positive value remains. A single column of values gets the labels "Category 1", "Category 2", ...',
    inputSchema: pieChartInputSchema,
  }, async (args) => handleCreatePieChart(service, args));
}
