// src/core/errors.ts
import { ErrorCode } from './types/index.js';
import type { PlotResult } from './types/index.js';

export class WikiPlotError extends Error {
  code: ErrorCode;
  retryable: boolean;
  suggestion?: string;
  context?: Record<string, unknown>;

  constructor(
    code: ErrorCode,
    message: string,
    retryable: boolean = false,
    suggestion?: string,
    context?: Record<string, unknown>
  ) {
    super(message);
    this.name = 'WikiPlotError';
    this.code = code;
    this.retryable = retryable;
    this.suggestion = suggestion;
    this.context = context;
    Object.setPrototypeOf(this, WikiPlotError.prototype);
  }
}

export function createFailedResult(error: WikiPlotError): PlotResult & { status: 'failed' } {
  return {
    status: 'failed',
    diagnostics: {
      warnings: [],
      error: {
        code: error.code,
        message: error.message,
        retryable: error.retryable,
        suggestion: error.suggestion,
      },
    },
  };
}

export { ErrorCode };
