import fs from 'node:fs';
import path from 'node:path';
import { parseArgs } from 'node:util';
import { csvParse } from 'd3-dsv';
import { parseConfig } from '../src/config';
import { parseCaseTable } from '../src/data';
import { describeLoadError } from '../src/errors';
import { createLogger } from '../src/logger';
import { rankByRate, renderMap } from '../src/render';
import { formatCount, formatRate } from '../src/stats';
import { parseRankOptions } from './rank-options';

const config = parseConfig(process.env);
const logger = createLogger({ level: config.logLevel, name: 'rank-counties', pretty: true });

function main(): number {
  const { values, positionals } = parseArgs({
    allowPositionals: true,
    options: {
      rate: { type: 'string' },
      top: { type: 'string', default: '10' }
    }
  });

  const file = positionals[0];
  if (!file) {
    logger.error('usage: rank-counties <cases.csv> [--rate 1.05] [--top 10]');
    return 2;
  }
  const options = parseRankOptions(values, config.defaultRedRate);
  if (options.isErr()) {
    logger.error({ [options.error.option]: options.error.value }, options.error.message);
    return 2;
  }
  const { threshold, top } = options.value;

  const rows = csvParse(fs.readFileSync(path.resolve(process.cwd(), file), 'utf8'));
  const table = parseCaseTable(rows);
  if (table.isErr()) {
    logger.error({ error: table.error }, describeLoadError(table.error));
    return 1;
  }

  const model = renderMap(table.value.counties, threshold, { logger });
  logger.info(
    { counties: model.circles.length, latestDate: table.value.dates[table.value.dates.length - 1], threshold },
    'ranked counties'
  );
  for (const hotspot of rankByRate(model.circles, top)) {
    process.stdout.write(
      `${hotspot.fips}\t${hotspot.county}, ${hotspot.state}\t${formatRate(hotspot.rate)}\t${formatCount(hotspot.cases)}\n`
    );
  }
  return 0;
}

process.exitCode = main();
