// src/core/orchestrator.ts
import { parseArticleInput } from './article/title.js';
import { RevisionCache } from './cache/index.js';
import { ChartRenderer, countEditsPerDay, findPeak } from './chart/index.js';
import type { AppConfig } from './config/app-config.js';
import { WikiPlotError, createFailedResult } from './errors.js';
import { RetryingHttpClient, RevisionFetcher } from './fetch/index.js';
import type { HttpClient, SleepFn } from './fetch/index.js';
import type { PlotOptions, PlotResult } from './types/index.js';

export interface OrchestratorDeps {
  http?: HttpClient;
  sleep?: SleepFn;
}

export class WikiPlotOrchestrator {
  constructor(
    private config: AppConfig,
    private deps: OrchestratorDeps = {}
  ) {}

  async plot(input: string, options: PlotOptions): Promise<PlotResult> {
    try {
      const article = parseArticleInput(input);

      const http =
        this.deps.http ??
        new RetryingHttpClient({
          maxAttempts: this.config.maxAttempts,
          backoffMs: this.config.backoffMs,
          timeoutMs: this.config.timeoutMs,
          sleep: this.deps.sleep,
          verbose: options.verbose,
        });

      const fetcher = new RevisionFetcher(new RevisionCache(this.config.cacheDir), http, {
        apiEndpoint: this.config.apiEndpoint,
        paceMs: this.config.paceMs,
        sleep: this.deps.sleep,
        verbose: options.verbose,
      });

      const fetched = await fetcher.fetch(article.identifier);

      let chartPath: string | undefined;
      if (options.chart) {
        const renderer = new ChartRenderer(this.config.outputDir);
        chartPath = await renderer.render({
          dates: fetched.dates,
          title: article.displayTitle,
          articleUrl: article.url,
          logBase: options.logBase,
          userInput: options.userInput,
        });
      }

      const daily = countEditsPerDay(fetched.dates);
      const peak = findPeak(daily);

      return {
        status: 'success',
        title: article.displayTitle,
        url: article.url,
        chartPath,
        stats: {
          totalEdits: fetched.dates.length,
          newEdits: fetched.newDates.length,
          days: daily.length,
          peak,
        },
        diagnostics: {
          warnings: fetched.warnings,
        },
      };
    } catch (error) {
      if (error instanceof WikiPlotError) {
        return createFailedResult(error);
      }

      throw error;
    }
  }
}
