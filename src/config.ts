/**
 * Runtime configuration with validation
 * Uses TypeBox for runtime type checking
 */

import { Type, type Static } from '@sinclair/typebox';
import { Value } from '@sinclair/typebox/value';

export const RED_RATE_MIN = 1;
export const RED_RATE_MAX = 1.5;
export const RED_RATE_STEP = 0.01;

export const DEFAULT_CASES_URL =
  'https://raw.githubusercontent.com/CSSEGISandData/COVID-19/master/csse_covid_19_data/csse_covid_19_time_series/time_series_covid19_confirmed_US.csv';

export const ConfigSchema = Type.Object({
  casesUrl: Type.String({ minLength: 1 }),
  fetchTimeoutMs: Type.Integer({ minimum: 1 }),
  defaultRedRate: Type.Number({ minimum: RED_RATE_MIN, maximum: RED_RATE_MAX }),
  logLevel: Type.Union([
    Type.Literal('fatal'),
    Type.Literal('error'),
    Type.Literal('warn'),
    Type.Literal('info'),
    Type.Literal('debug'),
    Type.Literal('trace'),
    Type.Literal('silent'),
  ]),
});

export type AppConfig = Static<typeof ConfigSchema>;

const readString = (env: Record<string, unknown>, key: string): string | undefined => {
  const value = env[key];
  return typeof value === 'string' && value !== '' ? value : undefined;
};

const readNumber = (env: Record<string, unknown>, key: string, fallback: number): number => {
  const value = readString(env, key);
  return value != null ? Number(value) : fallback;
};

/**
 * Parse and validate configuration from a flat environment record
 * (`import.meta.env` in the browser, `process.env` in scripts).
 */
export const parseConfig = (env: Record<string, unknown>): AppConfig => {
  const rawConfig = {
    casesUrl: readString(env, 'VITE_CASES_URL') ?? DEFAULT_CASES_URL,
    fetchTimeoutMs: readNumber(env, 'VITE_FETCH_TIMEOUT_MS', 30_000),
    defaultRedRate: readNumber(env, 'VITE_DEFAULT_RED_RATE', 1.05),
    logLevel: readString(env, 'VITE_LOG_LEVEL') ?? 'info',
  };

  if (!Value.Check(ConfigSchema, rawConfig)) {
    const errors = [...Value.Errors(ConfigSchema, rawConfig)];
    const errorMessages = errors.map((e) => `${e.path}: ${e.message}`).join(', ');
    throw new Error(`Invalid configuration: ${errorMessages}`);
  }

  return rawConfig;
};
