import { Resvg } from '@resvg/resvg-js';
import * as vega from 'vega';
import { compile } from 'vega-lite';
import { ChartRenderError } from '../utils/ChartErrors.js';
import type { RenderSettings } from '../utils/ChartsmithSettings.js';
import { ErrorHelper } from '../utils/ErrorHelper.js';
import type { ChartRenderer, RenderJob } from './ChartRenderer.js';
import { ChartSpecBuilder } from './ChartSpecBuilder.js';

/**
 * Vega-Lite spec -> Vega SVG (headless view) -> PNG via resvg.
 * A fresh view per call; nothing is shared between renders.
 */
export class VegaChartRenderer implements ChartRenderer {
  private readonly settings: RenderSettings;

  constructor(settings: RenderSettings) {
    this.settings = settings;
  }

  public async Render(job: RenderJob): Promise<Buffer> {
    const spec = ChartSpecBuilder.Build(job, this.settings);

    let view: vega.View;
    try {
      view = new vega.View(vega.parse(compile(spec).spec), { renderer: 'none' });
    } catch (err) {
      throw new ChartRenderError(`could not build ${job.Kind} chart: ${ErrorHelper.MessageOf(err)}`, err);
    }

    try {
      const svg = await view.toSVG(this.settings.Scale);
      const resvg = new Resvg(svg, {
        background: 'white',
        font: { loadSystemFonts: true, defaultFontFamily: this.settings.FontFamily },
      });
      return resvg.render().asPng();
    } catch (err) {
      throw new ChartRenderError(`could not draw ${job.Kind} chart: ${ErrorHelper.MessageOf(err)}`, err);
    } finally {
      view.finalize();
    }
  }
}
