/**
 * Alerts Query Command
 */

import { stringify } from 'csv-stringify/sync';
import { logger } from '../../utils/logger';
import { parseArgs, getOption, hasFlag } from '../../utils/args';
import { CONFIG_OPTIONS_HELP, resolveConfig } from '../../utils/config';
import { queryAlerts } from '../../../src/api/alerts';
import { createContext } from '../../../src/context';

const FORMATS = ['table', 'json', 'csv'] as const;
type Format = (typeof FORMATS)[number];

function parseFormat(raw: string | undefined): Format {
  const format = FORMATS.find((candidate) => candidate === (raw ?? 'table'));
  if (!format) {
    throw new Error(`Unknown format "${raw}". Expected one of: ${FORMATS.join(', ')}`);
  }
  return format;
}

export default async function alertsQuery(args: string[]) {
  const parsed = parseArgs(args);

  if (hasFlag(parsed, 'help', 'h')) {
    console.log(`
Query stored alerts for one batch file

USAGE
  npm run cli alerts:query <source_file> [options]

OPTIONS
  --format <table|json|csv> Output format (default: table)
${CONFIG_OPTIONS_HELP}
  --help, -h                Show this help message

EXAMPLES
  npm run cli alerts:query sample_readings.csv
  npm run cli alerts:query sample_readings.csv --format csv > alerts.csv
    `);
    return;
  }

  const format = parseFormat(getOption(parsed, 'format'));
  const ctx = createContext(resolveConfig(parsed));

  try {
    const result = await queryAlerts({ source_file: parsed.positional[0] }, ctx.store);

    if (result.status !== 200) {
      logger.error(result.body.error);
      process.exitCode = 1;
      return;
    }

    const { alerts } = result.body;
    switch (format) {
      case 'json':
        logger.json(alerts);
        break;
      case 'csv':
        process.stdout.write(stringify(alerts, {
          header: true,
          columns: ['record_id', 'stress_score', 'timestamp'],
        }));
        break;
      case 'table':
        logger.table(alerts.map((alert) => ({ ...alert })));
        logger.info(`${alerts.length} alerts`);
        break;
    }
  } finally {
    ctx.close();
  }
}
