// src/core/chart/svg.ts
import * as cheerio from 'cheerio';
import type { RevisionDate } from '../types/index.js';
import { countEditsPerDay, findPeak, isBusyDay, toDayNumber } from './counts.js';

export interface ChartInput {
  dates: readonly RevisionDate[];
  articleUrl: string;
  logBase: number;
  command: string;
}

type Attributes = Record<string, string | number>;

const WIDTH = 1600;
const HEIGHT = 600;
const PLOT = { left: 90, right: 1570, top: 130, bottom: 520 };
// Bars start slightly below 1 edit so single-edit days stay visible
const Y_FLOOR_EXPONENT = -0.25;
const MAX_Y_TICKS = 10;

const COLORS = {
  background: 'black',
  text: 'white',
  muted: 'gray',
  link: 'royalblue',
  bar: 'steelblue',
  busy: 'red',
  grid: 'white',
};

function fmt(value: number): string {
  return String(Number(value.toFixed(2)));
}

export function formatTickValue(value: number): string {
  return Number.isInteger(value) ? String(value) : String(Number(value.toPrecision(3)));
}

/**
 * Exponents that get a gridline: every one from 0 to `maxExponent` when they
 * fit in {@link MAX_Y_TICKS}, otherwise every n-th one.
 */
export function tickExponents(maxExponent: number): number[] {
  const step = Math.max(1, Math.ceil((maxExponent + 1) / MAX_Y_TICKS));
  const exponents: number[] = [];
  for (let exponent = 0; exponent <= maxExponent; exponent += step) {
    exponents.push(exponent);
  }
  return exponents;
}

/**
 * Highest exponent drawn on the y axis: the smallest integer `k` with
 * `base^k >= maxCount`, and never below 1.
 */
export function topExponent(maxCount: number, logBase: number): number {
  const exact = Math.log(maxCount) / Math.log(logBase);
  return Math.max(1, Math.ceil(exact - 1e-9));
}

function loadSvg(width: number, height: number) {
  const $ = cheerio.load(
    `<svg xmlns="http://www.w3.org/2000/svg" width="${width}" height="${height}" viewBox="0 0 ${width} ${height}"></svg>`,
    { xml: true }
  );
  return { $, root: $('svg') };
}

class SvgDocument {
  private svg: ReturnType<typeof loadSvg>;

  constructor(width: number, height: number) {
    this.svg = loadSvg(width, height);
  }

  add(tag: string, attributes: Attributes, text?: string): void {
    const node = this.svg.$(`<${tag}/>`);
    for (const [name, value] of Object.entries(attributes)) {
      node.attr(name, typeof value === 'number' ? fmt(value) : value);
    }
    if (text !== undefined) {
      node.text(text);
    }
    this.svg.root.append(node);
  }

  toString(): string {
    return `<?xml version="1.0" encoding="UTF-8"?>\n${this.svg.$.xml()}\n`;
  }
}

/**
 * Log-scale bar chart of edits per day, dark theme, as an SVG document.
 */
export function renderEditHistorySvg(input: ChartInput): string {
  const { dates, articleUrl, logBase, command } = input;
  const doc = new SvgDocument(WIDTH, HEIGHT);
  const daily = countEditsPerDay(dates);
  const peak = findPeak(daily);

  doc.add('rect', { x: 0, y: 0, width: WIDTH, height: HEIGHT, fill: COLORS.background });

  const heading = peak
    ? `Total edits: ${dates.length} | Peak: ${peak.date} (${peak.count} edits) | Red bars = busiest editing days`
    : 'Total edits: 0 | No revisions found';
  doc.add('text', { class: 'title', x: WIDTH / 2, y: 36, 'text-anchor': 'middle', 'font-size': 16, fill: COLORS.text }, heading);
  doc.add(
    'text',
    { class: 'subtitle', x: WIDTH / 2, y: 70, 'text-anchor': 'middle', 'font-size': 16, fill: COLORS.text },
    `Plot Graph (Log Scale base: ${logBase}) that represents the amount of edits in the wikipedia article over time at`
  );
  doc.add('text', { class: 'url', x: WIDTH / 2, y: 100, 'text-anchor': 'middle', 'font-size': 19, fill: COLORS.link }, articleUrl);

  const plotWidth = PLOT.right - PLOT.left;
  const plotHeight = PLOT.bottom - PLOT.top;

  doc.add('line', { x1: PLOT.left, y1: PLOT.bottom, x2: PLOT.right, y2: PLOT.bottom, stroke: COLORS.text });
  doc.add('line', { x1: PLOT.left, y1: PLOT.top, x2: PLOT.left, y2: PLOT.bottom, stroke: COLORS.text });
  doc.add(
    'text',
    {
      class: 'y-label',
      x: 24,
      y: (PLOT.top + PLOT.bottom) / 2,
      'text-anchor': 'middle',
      'font-size': 14,
      fill: COLORS.text,
      transform: `rotate(-90 24 ${fmt((PLOT.top + PLOT.bottom) / 2)})`,
    },
    `Log (base ${logBase}) Number of edits in one day`
  );
  doc.add('text', { class: 'x-label', x: WIDTH / 2, y: PLOT.bottom + 50, 'text-anchor': 'middle', 'font-size': 14, fill: COLORS.text }, 'Year');
  doc.add('text', { class: 'command', x: 16, y: HEIGHT - 12, 'font-size': 13, fill: COLORS.muted }, `Command: ${command}`);

  if (!peak) {
    doc.add(
      'text',
      { class: 'empty', x: WIDTH / 2, y: (PLOT.top + PLOT.bottom) / 2, 'text-anchor': 'middle', 'font-size': 20, fill: COLORS.muted },
      'No revisions found'
    );
    return doc.toString();
  }

  // y axis: exponents of the log base
  const maxExponent = topExponent(peak.count, logBase);
  const yFor = (exponent: number): number =>
    PLOT.bottom - ((exponent - Y_FLOOR_EXPONENT) / (maxExponent - Y_FLOOR_EXPONENT)) * plotHeight;

  for (const exponent of tickExponents(maxExponent)) {
    const y = yFor(exponent);
    doc.add('line', { class: 'grid', x1: PLOT.left, y1: y, x2: PLOT.right, y2: y, stroke: COLORS.grid, 'stroke-opacity': 0.3 });
    doc.add(
      'text',
      { class: 'y-tick', x: PLOT.left - 8, y: y + 4, 'text-anchor': 'end', 'font-size': 12, fill: COLORS.text },
      formatTickValue(Math.pow(logBase, exponent))
    );
  }

  // x axis: one slot per calendar day between the first and last edit
  const firstDay = toDayNumber(daily[0].date);
  const lastDay = toDayNumber(daily[daily.length - 1].date);
  const slot = plotWidth / (lastDay - firstDay + 1);
  const xFor = (day: number): number => PLOT.left + (day - firstDay) * slot;

  for (const { date, count } of daily) {
    const top = yFor(Math.log(count) / Math.log(logBase));
    const busy = isBusyDay(count, peak.count);
    doc.add('rect', {
      class: busy ? 'bar busy' : 'bar',
      'data-date': date,
      'data-count': count,
      x: xFor(toDayNumber(date)),
      y: top,
      width: Math.max(slot, 0.5),
      height: PLOT.bottom - top,
      fill: busy ? COLORS.busy : COLORS.bar,
      'fill-opacity': busy ? 0.8 : 1,
    });
  }

  const firstYear = Number(daily[0].date.slice(0, 4));
  const lastYear = Number(daily[daily.length - 1].date.slice(0, 4));
  const ticks: Array<{ day: number; label: string }> = [];
  for (let year = firstYear; year <= lastYear; year++) {
    const day = toDayNumber(`${year}-01-01`);
    if (day >= firstDay && day <= lastDay) {
      ticks.push({ day, label: String(year) });
    }
  }
  if (ticks.length === 0) {
    ticks.push({ day: firstDay, label: daily[0].date });
  }

  for (const tick of ticks) {
    const x = xFor(tick.day);
    doc.add('line', { x1: x, y1: PLOT.bottom, x2: x, y2: PLOT.bottom + 6, stroke: COLORS.text });
    doc.add('text', { class: 'x-tick', x, y: PLOT.bottom + 22, 'text-anchor': 'middle', 'font-size': 12, fill: COLORS.text }, tick.label);
  }

  return doc.toString();
}
