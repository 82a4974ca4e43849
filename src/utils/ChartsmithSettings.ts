import { z } from 'zod';
import { loadModuleConfig } from './moduleConfig.js';

const SettingsSchema = z.object({
  server: z.object({
    port: z.number().int().min(0).default(8001),
    mcpPath: z.string().default('/mcp'),
    jsonLimit: z.string().default('1mb'),
  }).default({}),
  render: z.object({
    width: z.number().int().min(50).default(800),
    height: z.number().int().min(50).default(480),
    scale: z.number().positive().default(1.5),
    fontFamily: z.string().default('DejaVu Sans'),
  }).default({}),
  histogram: z.object({
    defaultBins: z.number().int().min(1).default(30),
    discreteThreshold: z.number().int().min(0).default(20),
    groupByCategory: z.boolean().default(true),
  }).default({}),
  logging: z.object({
    level: z.enum(['info', 'silent']).default('info'),
  }).default({}),
});

export interface ServerSettings {
  Port: number;
  McpPath: string;
  JsonLimit: string;
}

export interface RenderSettings {
  Width: number;
  Height: number;
  Scale: number;
  FontFamily: string;
}

export interface HistogramSettings {
  DefaultBins: number;
  DiscreteThreshold: number;
  /** Route a hinted numeric column with a categorical neighbour to the grouped (bar-of-values) path. */
  GroupByCategory: boolean;
}

export interface LoggingSettings {
  Level: 'info' | 'silent';
}

export class ChartsmithSettings {
  public Server: ServerSettings;
  public Render: RenderSettings;
  public Histogram: HistogramSettings;
  public Logging: LoggingSettings;

  constructor(server: ServerSettings, render: RenderSettings, histogram: HistogramSettings, logging: LoggingSettings) {
    this.Server = server;
    this.Render = render;
    this.Histogram = histogram;
    this.Logging = logging;
  }

  private static cached: ChartsmithSettings | null = null;

  /**
   * Read and validate the `config` tree once per process.
   * Throws a ZodError naming the offending key when a value has the wrong type.
   */
  public static Load(): ChartsmithSettings {
    if (ChartsmithSettings.cached) return ChartsmithSettings.cached;
    const config = loadModuleConfig();
    ChartsmithSettings.cached = ChartsmithSettings.FromObject(config.util.toObject());
    return ChartsmithSettings.cached;
  }

  public static FromObject(raw: unknown): ChartsmithSettings {
    const parsed = SettingsSchema.parse(raw ?? {});
    return new ChartsmithSettings(
      { Port: parsed.server.port, McpPath: parsed.server.mcpPath, JsonLimit: parsed.server.jsonLimit },
      {
        Width: parsed.render.width,
        Height: parsed.render.height,
        Scale: parsed.render.scale,
        FontFamily: parsed.render.fontFamily,
      },
      {
        DefaultBins: parsed.histogram.defaultBins,
        DiscreteThreshold: parsed.histogram.discreteThreshold,
        GroupByCategory: parsed.histogram.groupByCategory,
      },
      { Level: parsed.logging.level }
    );
  }
}
