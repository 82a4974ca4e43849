import { z } from 'zod';
import type { McpServer } from '@modelcontextprotocol/sdk/server/mcp.js';
import type { CallToolResult } from '@modelcontextprotocol/sdk/types.js';
import type { ChartService } from '../processor/ChartService.js';
import { chartDataSchema, runChartTool } from './chartToolSupport.js';

export const histogramInputSchema = {
  data: chartDataSchema,
  column: z.string().optional().describe('Column to plot. Defaults to the first column.'),
  bins: z.number().int().min(1).optional().describe('Number of bins when the values are binned (default 30)'),
  title: z.string().default('Histogram').describe('Chart title'),
  x_label: z.string().default('Values').describe('X axis label'),
  y_label: z.string().default('Frequency').describe('Y axis label'),
  color: z.string().default('skyblue').describe('Bar color: a CSS color name or hex code'),
  alpha: z.number().min(0).max(1).default(0.7).describe('Bar opacity between 0 and 1'),
};

export type HistogramArgs = z.infer<z.ZodObject<typeof histogramInputSchema>>;

export function handleCreateHistogram(service: ChartService, args: HistogramArgs): Promise<CallToolResult> {
  return runChartTool(service, {
    Kind: 'histogram',
    Data: args.data,
    Hints: { Column: args.column },
    Bins: args.bins,
    Style: {
      Title: args.title,
      XLabel: args.x_label,
      YLabel: args.y_label,
      Color: args.color,
      Alpha: args.alpha,
    },
  });
}

export function registerCreateHistogramTool(server: McpServer, service: ChartService) {
  server.registerTool('create_histogram', {
    description: `Create a histogram from a column of data and return it as a PNG image.
Text columns, and numeric columns with few distinct values (20 or fewer by default), are drawn as one bar per value with its count.
Other numeric columns are split into equal-width bins.
When "column" names a numeric column and the data also has a text column, one bar per text value is drawn with the sum of "column" for that value.`,
    inputSchema: histogramInputSchema,
  }, async (args) => handleCreateHistogram(service, args));
}
