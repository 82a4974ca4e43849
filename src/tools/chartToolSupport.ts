import { z } from 'zod';
import type { CallToolResult } from '@modelcontextprotocol/sdk/types.js';
import type { ChartKind, ChartRequest } from '../interfaces/ChartRequest.js';
import type { ChartService } from '../processor/ChartService.js';
import { ErrorHelper } from '../utils/ErrorHelper.js';

// Shared pieces for the chart tools. Each tool file defines its own input schema
// and maps the validated arguments onto a ChartRequest.

export const chartDataSchema = z
  .union([z.string(), z.array(z.unknown()), z.record(z.unknown())])
  .describe(
    'Chart data: a JSON string, CSV text (first line is the header), a list of values, a list of records, ' +
    'or a dictionary. A dictionary of numbers ({"A": 10, "B": 20}) is read as label -> value; ' +
    'a dictionary of lists ({"x": [1, 2], "y": [3, 4]}) is read as columns.'
  );

const KIND_LABELS: Record<ChartKind, string> = {
  bar: 'bar chart',
  line: 'line chart',
  histogram: 'histogram',
  pie: 'pie chart',
};

/**
 * Run a chart request and wrap the PNG as MCP image content.
 * Errors come back as a text block with isError set; the message is passed on unchanged.
 */
export async function runChartTool(service: ChartService, request: ChartRequest): Promise<CallToolResult> {
  try {
    const result = await service.CreateChart(request);
    return {
      content: [
        {
          type: 'image',
          data: result.Png.toString('base64'),
          mimeType: 'image/png',
        },
      ],
    };
  } catch (error) {
    ErrorHelper.LogErrorForCloud(error, `create ${KIND_LABELS[request.Kind]}`);
    return {
      content: [
        {
          type: 'text',
          text: `Error creating ${KIND_LABELS[request.Kind]}: ${ErrorHelper.MessageOf(error)}`,
        },
      ],
      isError: true,
    };
  }
}
