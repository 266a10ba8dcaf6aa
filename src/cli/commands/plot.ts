// src/cli/commands/plot.ts
import { Command, InvalidArgumentError } from 'commander';
import { resolveAppConfig } from '../../core/config/app-config.js';
import { DEFAULT_LOG_BASE } from '../../core/config/constants.js';
import { WikiPlotOrchestrator } from '../../core/orchestrator.js';
import { promptForInput } from '../prompt.js';

export interface PlotCommandOptions {
  log: number;
  cacheDir?: string;
  out?: string;
  chart: boolean;
  json: boolean;
  verbose: boolean;
}

export function parseLogBase(value: string): number {
  const base = Number(value);
  if (!Number.isFinite(base) || base <= 1) {
    throw new InvalidArgumentError('Log base must be a number greater than 1.');
  }
  return base;
}

export function registerPlotCommand(program: Command): void {
  program
    .argument('[input]', 'Wikipedia page title or URL (prompted for when omitted)')
    .option('--log <base>', 'Logarithmic base for the y-axis', parseLogBase, DEFAULT_LOG_BASE)
    .option('--cache-dir <dir>', 'Directory for cached revision dates (default: "./cache")')
    .option('--out <dir>', 'Directory for charts (default: "./plotGraphs")')
    .option('--no-chart', 'Only update the cache, skip drawing the chart')
    .option('--json', 'Output JSON to stdout', false)
    .option('--verbose', 'Verbose output', false)
    .action(async (input: string | undefined, options: PlotCommandOptions) => {
      await handlePlot(input, options);
    });
}

async function handlePlot(input: string | undefined, options: PlotCommandOptions): Promise<void> {
  const userInput = input ?? (await promptForInput());

  const config = resolveAppConfig({
    cacheDir: options.cacheDir,
    outputDir: options.out,
  });
  const orchestrator = new WikiPlotOrchestrator(config);

  try {
    const result = await orchestrator.plot(userInput, {
      logBase: options.log,
      userInput,
      chart: options.chart,
      verbose: options.verbose,
    });

    if (options.json) {
      console.log(JSON.stringify(result, null, 2));
    }

    if (result.status === 'success') {
      if (result.chartPath) {
        console.log('Plot saved as:', result.chartPath);
      }
      return;
    }

    const error = result.diagnostics?.error;
    console.error('Failed:', error?.message);
    if (error?.suggestion) {
      console.error('Suggestion:', error.suggestion);
    }
    process.exit(1);
  } catch (error) {
    console.error('Error:', error instanceof Error ? error.message : error);
    process.exit(1);
  }
}
