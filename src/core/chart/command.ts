// src/core/chart/command.ts
import { APP_NAME, DEFAULT_LOG_BASE } from '../config/constants.js';

function shellQuote(value: string): string {
  return `'${value.replace(/'/g, `'\\''`)}'`;
}

/** The command line that reproduces a chart, printed in its footer */
export function buildCommandLine(userInput: string, logBase: number): string {
  if (!userInput) {
    return APP_NAME;
  }

  const command = `${APP_NAME} ${shellQuote(userInput)}`;
  return logBase !== DEFAULT_LOG_BASE ? `${command} --log ${logBase}` : command;
}
