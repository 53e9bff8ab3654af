/**
 * Ingest Command
 *
 * Runs one batch through the pipeline, either from a local path or from an
 * object in the local object store.
 */

import { logger } from '../../utils/logger';
import { parseArgs, getOption, hasFlag, requireOption } from '../../utils/args';
import { CONFIG_OPTIONS_HELP, resolveConfig } from '../../utils/config';
import { createContext } from '../../../src/context';
import type { RunOutcome } from '../../../src/types';

function printOutcome(outcome: RunOutcome) {
  logger.info(`Run ${outcome.runId} on ${outcome.sourceFile}: ${outcome.status}` +
    (outcome.haltReason ? ` (${outcome.haltReason})` : ''));
  logger.table([{
    candidates: outcome.candidates,
    rejected_rows: outcome.rejectedRows,
    confirmed: outcome.confirmed,
    inserted: outcome.inserted,
    row_failures: outcome.rowFailures.length,
    write_failures: outcome.writeFailures.length,
  }]);
  if (outcome.error) {
    logger.warn(outcome.error);
  }
}

export default async function ingest(args: string[]) {
  const parsed = parseArgs(args);

  if (hasFlag(parsed, 'help', 'h')) {
    console.log(`
Ingest a batch file

USAGE
  npm run cli ingest [<file>] [options]
  npm run cli ingest --bucket <name> --key <key> [options]

OPTIONS
  --bucket <name>           Read the batch from the local object store
  --key <key>               Object key inside the bucket
  --dry-run                 Count alerts without writing them
  --json                    Print the full run outcome as JSON
${CONFIG_OPTIONS_HELP}
  --help, -h                Show this help message

EXAMPLES
  npm run cli ingest resources/sample_readings.csv
  npm run cli ingest --bucket uploads --key 2024/batch-07.csv --dry-run
    `);
    return;
  }

  // --bucket and --key only make sense as a pair
  const object = getOption(parsed, 'bucket') || getOption(parsed, 'key')
    ? { bucket: requireOption(parsed, 'bucket'), key: requireOption(parsed, 'key') }
    : null;

  const config = resolveConfig(parsed);
  const ctx = createContext(config);

  try {
    const filePath = object
      ? await ctx.objectStore.download(object.bucket, object.key)
      : parsed.positional[0] ?? config.local.csvPath;

    logger.section(`📥 Ingest ${filePath}`);
    const outcome = await ctx.orchestrator.run(filePath);

    if (hasFlag(parsed, 'json')) {
      logger.json(outcome);
    } else {
      printOutcome(outcome);
    }

    if (outcome.status === 'errored') {
      process.exitCode = 1;
    } else {
      logger.success(`Stored ${outcome.inserted} alerts${config.storage.dryRun ? ' (dry run)' : ''}`);
    }
  } finally {
    ctx.close();
  }
}
