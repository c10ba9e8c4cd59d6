import * as d3 from 'd3';
import { defaultLogger, type Logger } from './logger';
import { formatCount, formatRate, latestCount, rateOfIncrease } from './stats';
import type { CircleSpec, CountyRecord, Hotspot, LatLon, MapModel } from './types';

/** Geographic centre of the contiguous United States. */
export const MAP_CENTER: LatLon = { lat: 39.758056, lon: -96.0 };

export const MAP_ZOOM = 4;

export const LOW_RATE_COLOR = '#008000';

export const HIGH_RATE_COLOR = '#ff0000';

const RADIUS_EXPONENT = 0.43;

const RADIUS_SCALE_METRES = 500;

/**
 * Circle radius in metres. The exponent keeps the drawn area growing slower
 * than the case count so a few large counties do not cover the map.
 */
export function circleRadius(count: number): number {
  return count ** RADIUS_EXPONENT * RADIUS_SCALE_METRES;
}

/**
 * Linear green→red scale from a rate of 1 to `threshold`, clamped at both
 * ends. A threshold at or below 1 leaves no room to interpolate, so the
 * scale becomes a step at 1.
 */
export function rateColor(threshold: number): (rate: number) => string {
  if (!(threshold > 1)) {
    return (rate) => (rate >= 1 ? HIGH_RATE_COLOR : LOW_RATE_COLOR);
  }
  const scale = d3
    .scaleLinear<string>()
    .domain([1, threshold])
    .range([LOW_RATE_COLOR, HIGH_RATE_COLOR])
    .clamp(true);
  return (rate) => d3.color(scale(rate))?.formatHex() ?? HIGH_RATE_COLOR;
}

export function formatTooltip(record: Pick<CountyRecord, 'county' | 'state'>, cases: number, rate: number): string {
  return `${record.county}, ${record.state}\nCases: ${formatCount(cases)}\nRate: ${formatRate(rate)}`;
}

export interface RenderDeps {
  logger?: Logger;
}

/**
 * Builds the map for one threshold. Counties without cases are left out and
 * the rest are ordered by latest count, largest first, so smaller circles
 * are drawn last and stay on top.
 */
export function renderMap(counties: readonly CountyRecord[], threshold: number, deps: RenderDeps = {}): MapModel {
  const logger = deps.logger ?? defaultLogger;
  const color = rateColor(threshold);

  const ordered = counties
    .filter((record) => latestCount(record.cases) > 0)
    .sort((a, b) => d3.descending(latestCount(a.cases), latestCount(b.cases)));

  const circles: CircleSpec[] = [];
  const skipped: string[] = [];
  for (const record of ordered) {
    if (record.lat == null || record.lon == null) {
      logger.debug({ fips: record.fips, county: record.county }, 'county has no coordinates');
      skipped.push(record.fips);
      continue;
    }
    const cases = latestCount(record.cases);
    const rate = rateOfIncrease(record.cases);
    circles.push({
      fips: record.fips,
      county: record.county,
      state: record.state,
      center: { lat: record.lat, lon: record.lon },
      cases,
      rate,
      radius: circleRadius(cases),
      color: color(rate),
      tooltip: formatTooltip(record, cases, rate)
    });
  }

  if (skipped.length > 0) {
    logger.warn({ skipped: skipped.length }, 'counties without coordinates left off the map');
  }

  return { center: { ...MAP_CENTER }, zoom: MAP_ZOOM, threshold, circles, skipped };
}

/** Fastest-growing counties first; equal rates fall back to case count. */
export function rankByRate(circles: readonly CircleSpec[], limit = 10): Hotspot[] {
  return [...circles]
    .sort((a, b) => d3.descending(a.rate, b.rate) || d3.descending(a.cases, b.cases))
    .slice(0, limit)
    .map(({ fips, county, state, rate, cases }) => ({ fips, county, state, rate, cases }));
}
