#!/usr/bin/env node

import { Command } from 'commander';
import { APP_NAME, APP_VERSION } from '../core/config/constants.js';
import { registerPlotCommand } from './commands/plot.js';

export function buildProgram(): Command {
  const program = new Command();

  program
    .name(APP_NAME)
    .description('Plot the edit history of a Wikipedia article')
    .version(APP_VERSION);

  registerPlotCommand(program);

  return program;
}

export async function runCli(argv: string[] = process.argv): Promise<void> {
  const program = buildProgram();
  await program.parseAsync(argv);
}

if (process.env.NODE_ENV !== 'test') {
  runCli().catch((error: unknown) => {
    console.error('Error:', error instanceof Error ? error.message : error);
    process.exit(1);
  });
}
