import { describe, it, expect, beforeEach, afterEach } from '@jest/globals';
import * as fs from 'fs/promises';
import * as os from 'os';
import * as path from 'path';
import * as cheerio from 'cheerio';
import { ChartRenderer } from '../renderer.js';
import { WikiPlotError } from '../../errors.js';
import { ErrorCode } from '../../types/index.js';

describe('ChartRenderer', () => {
  let tmpDir: string;

  beforeEach(async () => {
    tmpDir = await fs.mkdtemp(path.join(os.tmpdir(), 'wikiplot-chart-'));
  });

  afterEach(async () => {
    await fs.rm(tmpDir, { recursive: true, force: true });
  });

  const request = {
    dates: ['2020-01-01', '2020-01-02'],
    title: 'Grace Hopper',
    articleUrl: 'https://en.wikipedia.org/wiki/Grace_Hopper',
    logBase: 2,
    userInput: 'Grace Hopper',
  };

  it('writes the SVG under the output directory', async () => {
    const outputDir = path.join(tmpDir, 'plotGraphs');
    const renderer = new ChartRenderer(outputDir);

    const chartPath = await renderer.render(request);

    expect(chartPath).toBe(path.join(outputDir, 'Grace_Hopper_edit_history.svg'));
    const svg = await fs.readFile(chartPath, 'utf-8');
    expect(svg.startsWith('<?xml')).toBe(true);
    const $ = cheerio.load(svg, { xml: true });
    expect($('text.command').text()).toBe("Command: wikiplot 'Grace Hopper' --log 2");
  });

  it('fails with EXPORT_FAILED when the directory cannot be created', async () => {
    const blocker = path.join(tmpDir, 'blocked');
    await fs.writeFile(blocker, '');
    const renderer = new ChartRenderer(path.join(blocker, 'plots'));

    const error = await renderer.render(request).catch((e: unknown) => e);

    expect(error).toBeInstanceOf(WikiPlotError);
    expect(error).toMatchObject({ code: ErrorCode.EXPORT_FAILED });
  });
});
