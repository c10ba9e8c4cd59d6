import { err, ok, type Result } from 'neverthrow';
import { clampThreshold } from '../src/ui';

export interface RankOptions {
  threshold: number;
  top: number;
}

export interface RankArgs {
  rate?: string;
  top?: string;
}

export interface UsageError {
  readonly type: 'UsageError';
  readonly message: string;
  readonly option: string;
  readonly value: string;
}

const createUsageError = (option: string, value: string, message: string): UsageError => ({
  type: 'UsageError',
  message,
  option,
  value,
});

/** Validates the command-line values; `defaultRate` applies when `--rate` is absent. */
export function parseRankOptions(args: RankArgs, defaultRate: number): Result<RankOptions, UsageError> {
  let rate = defaultRate;
  if (args.rate != null) {
    rate = args.rate.trim() === '' ? Number.NaN : Number(args.rate);
    if (!Number.isFinite(rate)) {
      return err(createUsageError('rate', args.rate, '--rate must be a number'));
    }
  }
  const rawTop = args.top ?? '10';
  const top = Number(rawTop);
  if (!Number.isInteger(top) || top < 1) {
    return err(createUsageError('top', rawTop, '--top must be a positive integer'));
  }
  return ok({ threshold: clampThreshold(rate), top });
}
