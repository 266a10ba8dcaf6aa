// src/core/chart/index.ts
export { ChartRenderer } from './renderer.js';
export type { ChartRequest } from './renderer.js';
export { renderEditHistorySvg, formatTickValue, tickExponents, topExponent } from './svg.js';
export { countEditsPerDay, findPeak, isBusyDay, toDayNumber, BUSY_DAY_RATIO } from './counts.js';
export type { DailyCount } from './counts.js';
export { chartFileName, generateChartPath } from './path.js';
export { buildCommandLine } from './command.js';
