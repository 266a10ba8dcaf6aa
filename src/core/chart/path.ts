// src/core/chart/path.ts
import * as path from 'path';
import * as fs from 'fs/promises';

export function chartFileName(title: string): string {
  return `${title.replace(/[ /\\]/g, '_')}_edit_history.svg`;
}

export async function generateChartPath(outputDir: string, title: string): Promise<string> {
  await fs.mkdir(outputDir, { recursive: true });
  return path.join(outputDir, chartFileName(title));
}
