/**
 * Shared option handling for commands that build an application context
 */

import {
  loadConfig,
  mergeConfig,
  validateConfig,
  type PipelineConfig,
  type PipelineConfigOverrides,
} from '../../src/config';
import { getNumberOption, getOption, hasFlag, type ParsedArgs } from './args';

export const CONFIG_OPTIONS_HELP = `  --config <path>           JSON config file (default: config/pipeline.json)
  --database <path>         SQLite database file
  --model <path>            Decision tree JSON artifact
  --threshold <n>           Stress pre-filter threshold`;

export function resolveConfig(parsed: ParsedArgs): PipelineConfig {
  const base = loadConfig({ configPath: getOption(parsed, 'config'), force: true });
  const overrides: PipelineConfigOverrides = {};

  const threshold = getNumberOption(parsed, 'threshold');
  if (threshold !== undefined) overrides.stressThreshold = threshold;

  const model = getOption(parsed, 'model');
  if (model) overrides.model = { path: model };

  const database = getOption(parsed, 'database');
  if (database || hasFlag(parsed, 'dry-run')) {
    overrides.storage = {};
    if (database) overrides.storage.databasePath = database;
    if (hasFlag(parsed, 'dry-run')) overrides.storage.dryRun = true;
  }

  const port = getNumberOption(parsed, 'port');
  if (port !== undefined) overrides.server = { port };

  const validation = validateConfig(overrides);
  if (!validation.valid) {
    throw new Error(`Invalid options: ${validation.errors.join('; ')}`);
  }
  return mergeConfig(base, overrides);
}
