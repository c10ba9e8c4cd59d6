import * as d3 from 'd3';

export const RATE_WINDOW_DAYS = 5;

/** Ratio substituted when cases appear on top of a zero baseline. */
export const ZERO_BASELINE_RATIO = 2;

/**
 * Day-over-day growth ratio with the division-by-zero cases substituted:
 * 0/0 is no signal (0), n/0 is the fixed high-growth sentinel.
 */
export function growthRatio(previous: number, next: number): number {
  if (previous === 0) {
    return next === 0 ? 0 : ZERO_BASELINE_RATIO;
  }
  return next / previous;
}

/**
 * Linearly weighted average of the last `days` growth ratios; the most
 * recent ratio weighs the most (weights 1..days, normalised).
 *
 * Shorter series shrink the window to the pairs available. A single value
 * yields 0.
 */
export function rateOfIncrease(counts: readonly number[], days = RATE_WINDOW_DAYS): number {
  if (!Number.isInteger(days) || days < 1) {
    throw new RangeError(`days must be a positive integer, got ${days}`);
  }
  const window = counts.slice(-(days + 1));
  const pairs = window.length - 1;
  if (pairs < 1) {
    return 0;
  }
  let weighted = 0;
  for (let i = 0; i < pairs; i += 1) {
    weighted += (i + 1) * growthRatio(window[i], window[i + 1]);
  }
  const totalWeight = (pairs * (pairs + 1)) / 2;
  return weighted / totalWeight;
}

export function latestCount(counts: readonly number[]): number {
  return counts.length === 0 ? 0 : counts[counts.length - 1];
}

export function formatRate(rate: number): string {
  return d3.format('.3f')(rate);
}

export function formatCount(count: number): string {
  return d3.format(',')(count);
}
