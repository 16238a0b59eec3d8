import fs from 'fs/promises';
import path from 'path';
import { Resvg } from '@resvg/resvg-js';
import { PILLAR_KEYS, PillarScoreSet } from '../healthScore/healthScore.types';
import { CHART_LABELS } from '../healthScore/pillars';
import { artifactName } from '../../storage/artifactNames';
import { ChartRenderer } from './reports.types';

const SIZE = 800;
const CENTER = SIZE / 2;
const RADIUS = 260;
const SCALE_MAX = 120;
const RING_STEP = 12;
const ACCENT = '#1aaf6c';
const GRID = '#808080';
const OUTPUT_WIDTH = 1600;

type Point = { x: number; y: number };

const fmt = (value: number) => value.toFixed(2);

export function escapeXml(value: string): string {
  return value.replace(/&/g, '&amp;').replace(/</g, '&lt;').replace(/>/g, '&gt;').replace(/"/g, '&quot;');
}

function polarToCartesian(angle: number, r: number): Point {
  return {
    x: CENTER + r * Math.cos(angle),
    y: CENTER + r * Math.sin(angle),
  };
}

function closedPath(points: Point[]): string {
  return points.map((p, idx) => `${idx === 0 ? 'M' : 'L'} ${fmt(p.x)} ${fmt(p.y)}`).join(' ') + ' Z';
}

function anchorFor(x: number): 'start' | 'middle' | 'end' {
  if (Math.abs(x - CENTER) < 1) return 'middle';
  return x > CENTER ? 'start' : 'end';
}

/**
 * Radar chart on a fixed 0-120 radial scale with a dashed ring every 12 units.
 * The first axis points straight up; axes follow pillar order clockwise.
 */
export function buildRadarSvg(scores: PillarScoreSet): string {
  const angleStep = (2 * Math.PI) / PILLAR_KEYS.length;
  const startAngle = -Math.PI / 2;
  const angleAt = (index: number) => startAngle + index * angleStep;
  const radiusFor = (value: number) => (value / SCALE_MAX) * RADIUS;

  const rings: string[] = [];
  for (let level = RING_STEP; level <= SCALE_MAX; level += RING_STEP) {
    const points = PILLAR_KEYS.map((_, i) => polarToCartesian(angleAt(i), radiusFor(level)));
    rings.push(
      `<path d="${closedPath(points)}" fill="none" stroke="${GRID}" stroke-width="0.8" stroke-dasharray="4 3" opacity="0.5"/>`,
      `<text x="${fmt(CENTER + 4)}" y="${fmt(CENTER - radiusFor(level))}" font-size="12" fill="${GRID}">${level}</text>`
    );
  }

  const spokes = PILLAR_KEYS.map((_, i) => {
    const end = polarToCartesian(angleAt(i), RADIUS);
    return `<path d="M ${CENTER} ${CENTER} L ${fmt(end.x)} ${fmt(end.y)}" stroke="${GRID}" stroke-width="0.8" stroke-dasharray="4 3" opacity="0.5"/>`;
  });

  const dataPoints = PILLAR_KEYS.map((key, i) => polarToCartesian(angleAt(i), radiusFor(scores.pillar(key))));
  const dataPath = closedPath(dataPoints);

  const markers = dataPoints.map(
    (p) => `<rect x="${fmt(p.x - 5)}" y="${fmt(p.y - 5)}" width="10" height="10" fill="${ACCENT}" stroke="#ffffff" stroke-width="1"/>`
  );

  const values = PILLAR_KEYS.map((key, i) => {
    const p = dataPoints[i];
    const offset = polarToCartesian(angleAt(i), radiusFor(scores.pillar(key)) + 22);
    return `<text x="${fmt(offset.x)}" y="${fmt(offset.y)}" text-anchor="${anchorFor(p.x)}" dominant-baseline="middle" font-size="14" font-weight="bold">${Math.trunc(scores.pillar(key))}</text>`;
  });

  const labels = PILLAR_KEYS.map((key, i) => {
    const pos = polarToCartesian(angleAt(i), RADIUS + 48);
    return `<text x="${fmt(pos.x)}" y="${fmt(pos.y)}" text-anchor="${anchorFor(pos.x)}" dominant-baseline="middle" font-size="16">${escapeXml(CHART_LABELS[key])}</text>`;
  });

  return [
    `<svg xmlns="http://www.w3.org/2000/svg" viewBox="0 0 ${SIZE} ${SIZE}" width="${SIZE}" height="${SIZE}" font-family="Helvetica, Arial, sans-serif">`,
    `<rect width="${SIZE}" height="${SIZE}" fill="#ffffff"/>`,
    `<text x="${CENTER}" y="48" text-anchor="middle" font-size="26">Your Health Score</text>`,
    ...rings,
    ...spokes,
    `<path d="${dataPath}" fill="${ACCENT}" fill-opacity="0.25"/>`,
    `<path d="${dataPath}" fill="none" stroke="${ACCENT}" stroke-width="2"/>`,
    ...markers,
    ...values,
    ...labels,
    '</svg>',
  ].join('\n');
}

export class RadarChartRenderer implements ChartRenderer {
  constructor(private chartDir: string) {}

  async render(scores: PillarScoreSet): Promise<string> {
    await fs.mkdir(this.chartDir, { recursive: true });
    const resvg = new Resvg(buildRadarSvg(scores), {
      fitTo: { mode: 'width', value: OUTPUT_WIDTH },
      font: { loadSystemFonts: true },
    });
    const png = resvg.render().asPng();
    const filePath = path.join(this.chartDir, artifactName('chart', 'png'));
    await fs.writeFile(filePath, png);
    return filePath;
  }
}
