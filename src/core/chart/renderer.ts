// src/core/chart/renderer.ts
import * as fs from 'fs/promises';
import { WikiPlotError } from '../errors.js';
import { ErrorCode } from '../types/index.js';
import type { RevisionDate } from '../types/index.js';
import { buildCommandLine } from './command.js';
import { generateChartPath } from './path.js';
import { renderEditHistorySvg } from './svg.js';

export interface ChartRequest {
  dates: readonly RevisionDate[];
  title: string;
  articleUrl: string;
  logBase: number;
  userInput: string;
}

export class ChartRenderer {
  constructor(private outputDir: string) {}

  /** Writes the chart and returns its path */
  async render(request: ChartRequest): Promise<string> {
    const svg = renderEditHistorySvg({
      dates: request.dates,
      articleUrl: request.articleUrl,
      logBase: request.logBase,
      command: buildCommandLine(request.userInput, request.logBase),
    });

    try {
      const chartPath = await generateChartPath(this.outputDir, request.title);
      await fs.writeFile(chartPath, svg, 'utf-8');
      return chartPath;
    } catch (error) {
      throw new WikiPlotError(
        ErrorCode.EXPORT_FAILED,
        `Failed to write chart: ${error instanceof Error ? error.message : String(error)}`,
        false,
        `Check permissions for directory: ${this.outputDir}`
      );
    }
  }
}
