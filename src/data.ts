import * as d3 from 'd3';
import { ResultAsync, err, ok, type Result } from 'neverthrow';
import type { AppConfig } from './config';
import {
  createFetchError,
  createSchemaError,
  createValidationError,
  type FetchError,
  type LoadError
} from './errors';
import { defaultLogger, type Logger } from './logger';
import stateTable from './data/states.json';
import type { CaseTable, CountyRecord } from './types';

const REQUIRED_COLUMNS = ['UID', 'FIPS', 'Admin2', 'Province_State', 'Lat', 'Long_'] as const;

/** Index of the first date column in the feed. */
export const DATE_COLUMN_OFFSET = 11;

const DATE_COLUMN = /^\d{1,2}\/\d{1,2}\/\d{2,4}$/;

export const STATE_ABBREVIATIONS: ReadonlyMap<string, string> = new Map(Object.entries(stateTable));

export function stateAbbreviation(
  name: string,
  abbreviations: ReadonlyMap<string, string> = STATE_ABBREVIATIONS
): string | undefined {
  return abbreviations.get(name.trim());
}

/** State, national and out-of-state aggregate rows fall outside this range. */
export function isCountyFips(code: number): boolean {
  return code > 1000 && code <= 60000;
}

function parseNumber(value: string | undefined | null): number | null {
  if (value == null || value.trim() === '') {
    return null;
  }
  const n = Number(value);
  return Number.isFinite(n) ? n : null;
}

const CASE_COUNT = /^\d+$/;

/** Cumulative counts are plain decimal integers. */
function parseCount(value: string): number | null {
  const trimmed = value.trim();
  return CASE_COUNT.test(trimmed) ? Number(trimmed) : null;
}

function parseCoordinates(latRaw: string | undefined, lonRaw: string | undefined): { lat: number | null; lon: number | null } {
  const lat = parseNumber(latRaw);
  const lon = parseNumber(lonRaw);
  // the feed writes 0,0 for rows it cannot place
  if (lat == null || lon == null || (lat === 0 && lon === 0)) {
    return { lat: null, lon: null };
  }
  return { lat, lon };
}

function checkSchema(columns: readonly string[]): Result<string[], LoadError> {
  for (const column of REQUIRED_COLUMNS) {
    if (!columns.includes(column)) {
      return err(createSchemaError(column));
    }
  }
  const dates = columns.slice(DATE_COLUMN_OFFSET);
  if (dates.length === 0) {
    return err(createSchemaError('dates', `Expected date columns from column ${DATE_COLUMN_OFFSET} onward`));
  }
  const misplaced = dates.find((column) => !DATE_COLUMN.test(column));
  if (misplaced !== undefined) {
    return err(createSchemaError(misplaced, `Column '${misplaced}' sits among the date columns but is not a date`));
  }
  return ok(dates);
}

/**
 * Turns the raw feed into county records: county-level rows only, state
 * names replaced by abbreviations, one cumulative count per date column.
 */
export function parseCaseTable(
  rows: d3.DSVRowArray<string>,
  abbreviations: ReadonlyMap<string, string> = STATE_ABBREVIATIONS
): Result<CaseTable, LoadError> {
  return checkSchema(rows.columns).andThen((dates): Result<CaseTable, LoadError> => {
    const counties: CountyRecord[] = [];
    const seen = new Set<string>();
    for (const row of rows) {
      const code = parseNumber(row.FIPS);
      if (code == null || !isCountyFips(code)) continue;

      const uid = (row.UID ?? '').trim();
      if (uid === '' || seen.has(uid)) {
        return err(createValidationError(uid, 'UID', uid, uid === '' ? 'missing UID' : `duplicate UID '${uid}'`));
      }
      seen.add(uid);

      const stateName = (row.Province_State ?? '').trim();
      const state = stateAbbreviation(stateName, abbreviations);
      if (state === undefined) {
        return err(createValidationError(uid, 'Province_State', stateName, `unknown state '${stateName}'`));
      }

      const cases: number[] = [];
      for (const date of dates) {
        const raw = row[date] ?? '';
        const count = parseCount(raw);
        if (count == null) {
          return err(createValidationError(uid, date, raw, `invalid case count '${raw}' on ${date}`));
        }
        cases.push(count);
      }

      const county = (row.Admin2 ?? '').trim();
      counties.push({
        uid,
        fips: String(Math.trunc(code)).padStart(5, '0'),
        county: county === '' ? 'Unknown' : county,
        state,
        ...parseCoordinates(row.Lat, row.Long_),
        cases
      });
    }
    return ok({ dates, counties });
  });
}

export function fetchCaseCsv(url: string, timeoutMs: number): ResultAsync<d3.DSVRowArray<string>, FetchError> {
  return ResultAsync.fromPromise(d3.text(url, { signal: AbortSignal.timeout(timeoutMs) }), (cause) =>
    createFetchError(url, cause)
  ).map((text) => d3.csvParse(text));
}

export interface LoadCaseTableDeps {
  logger?: Logger;
}

export function loadCaseTable(
  config: Pick<AppConfig, 'casesUrl' | 'fetchTimeoutMs'>,
  deps: LoadCaseTableDeps = {}
): ResultAsync<CaseTable, LoadError> {
  const logger = deps.logger ?? defaultLogger;
  return fetchCaseCsv(config.casesUrl, config.fetchTimeoutMs)
    .andThen((rows) => parseCaseTable(rows))
    .map((table) => {
      logger.info(
        { counties: table.counties.length, latestDate: table.dates[table.dates.length - 1] },
        'case table loaded'
      );
      return table;
    })
    .mapErr((error) => {
      logger.error({ error }, 'case table failed to load');
      return error;
    });
}
