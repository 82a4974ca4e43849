import { z } from 'zod';
import { ChartService } from '../processor/ChartService';
import type { ChartRenderer, RenderJob } from '../render/ChartRenderer';
import { ChartRenderError } from '../utils/ChartErrors';
import { barChartInputSchema, handleCreateBarChart } from '../tools/createBarChart';
import { handleCreateHistogram, histogramInputSchema } from '../tools/createHistogram';
import { handleCreateLineChart, lineChartInputSchema } from '../tools/createLineChart';
import { handleCreatePieChart, pieChartInputSchema } from '../tools/createPieChart';

const FAKE_PNG = Buffer.from('fake-png');

class FakeRenderer implements ChartRenderer {
  public Jobs: RenderJob[] = [];

  async Render(job: RenderJob): Promise<Buffer> {
    this.Jobs.push(job);
    return FAKE_PNG;
  }
}

class FailingRenderer implements ChartRenderer {
  async Render(): Promise<Buffer> {
    throw new ChartRenderError('boom');
  }
}

const histogramSettings = { DefaultBins: 30, DiscreteThreshold: 20, GroupByCategory: true };

function newService(renderer: ChartRenderer = new FakeRenderer()): ChartService {
  return new ChartService(renderer, histogramSettings);
}

describe('chart tools - success', () => {

  it('returns the PNG as base64 image content', async () => {
    const args = z.object(barChartInputSchema).parse({ data: { A: 10, B: 20 } });

    const result = await handleCreateBarChart(newService(), args);

    expect(result.isError).toBeUndefined();
    expect(result.content).toEqual([{ type: 'image', data: FAKE_PNG.toString('base64'), mimeType: 'image/png' }]);
  });

  it('fills in the default styling', async () => {
    const renderer = new FakeRenderer();
    const args = z.object(lineChartInputSchema).parse({ data: { x: [1, 2], y: [3, 4] } });

    await handleCreateLineChart(newService(renderer), args);

    expect(renderer.Jobs[0]).toMatchObject({
      Kind: 'line',
      Style: { Title: 'Line Chart', XLabel: 'X Values', YLabel: 'Y Values', Color: 'blue', LineStyle: '-', Marker: 'o' },
    });
  });

  it('passes column hints and bins through', async () => {
    const renderer = new FakeRenderer();
    const data = { group: Array.from({ length: 30 }, () => 'g'), v: Array.from({ length: 30 }, (_, i) => i) };
    const args = z.object(histogramInputSchema).parse({ data, column: 'v', bins: 3 });

    await handleCreateHistogram(
      new ChartService(renderer, { ...histogramSettings, GroupByCategory: false }),
      args
    );

    expect(renderer.Jobs[0]).toMatchObject({
      Kind: 'histogram',
      Assignment: { Path: 'continuous', ColumnName: 'v', Bins: 3, Counts: [10, 10, 10] },
      Style: { Color: 'skyblue', Alpha: 0.7 },
    });
  });
});

describe('chart tools - errors', () => {

  it('reports pie charts without positive values', async () => {
    const args = z.object(pieChartInputSchema).parse({ data: { A: 0, B: -1 } });

    const result = await handleCreatePieChart(newService(), args);

    expect(result.isError).toBe(true);
    expect(result.content).toEqual([{ type: 'text', text: 'Error creating pie chart: no positive values' }]);
  });

  it('reports empty line chart data', async () => {
    const args = z.object(lineChartInputSchema).parse({ data: {} });

    const result = await handleCreateLineChart(newService(), args);

    expect(result.isError).toBe(true);
    expect(result.content).toEqual([{ type: 'text', text: 'Error creating line chart: insufficient data' }]);
  });

  it('reports a dictionary of text values', async () => {
    const args = z.object(histogramInputSchema).parse({ data: { A: 'text', B: 'more text' } });

    const result = await handleCreateHistogram(newService(), args);

    expect(result.isError).toBe(true);
    expect(result.content).toEqual([
      {
        type: 'text',
        text: 'Error creating histogram: a dictionary of scalar values needs numeric values, or lists as column values',
      },
    ]);
  });

  it('reports renderer failures', async () => {
    const args = z.object(barChartInputSchema).parse({ data: { A: 1 } });

    const result = await handleCreateBarChart(newService(new FailingRenderer()), args);

    expect(result.isError).toBe(true);
    expect(result.content).toEqual([{ type: 'text', text: 'Error creating bar chart: boom' }]);
  });
});

describe('chart tools - input schemas', () => {

  it('rejects a bin count below one', () => {
    expect(z.object(histogramInputSchema).safeParse({ data: [1, 2], bins: 0 }).success).toBe(false);
  });

  it('rejects missing data', () => {
    expect(z.object(barChartInputSchema).safeParse({ data: null }).success).toBe(false);
    expect(z.object(barChartInputSchema).safeParse({}).success).toBe(false);
  });

  it('rejects an unknown line style', () => {
    expect(z.object(lineChartInputSchema).safeParse({ data: [1], line_style: '==' }).success).toBe(false);
  });
});
