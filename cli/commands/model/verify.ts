/**
 * Model Verify Command
 *
 * Loads the classifier artifact and checks it against the configured feature
 * layout without touching storage.
 */

import { logger } from '../../utils/logger';
import { parseArgs, hasFlag } from '../../utils/args';
import { CONFIG_OPTIONS_HELP, resolveConfig } from '../../utils/config';
import { assertClassifierMatchesSchema } from '../../../src/models/classifier';
import { loadDecisionTreeClassifier } from '../../../src/models/decision-tree';
import { createFeatureSchema } from '../../../src/utils/feature-vector';

export default async function verify(args: string[]) {
  const parsed = parseArgs(args);

  if (hasFlag(parsed, 'help', 'h')) {
    console.log(`
Verify the classifier artifact

USAGE
  npm run cli model:verify [options]

OPTIONS
${CONFIG_OPTIONS_HELP}
  --help, -h                Show this help message
    `);
    return;
  }

  const config = resolveConfig(parsed);
  logger.section('🌳 Model Verification');
  logger.info(`Artifact: ${config.model.path}`);

  const schema = createFeatureSchema(config);
  const classifier = loadDecisionTreeClassifier(config.model.path);

  logger.info(`Model version: ${classifier.version}`);
  logger.info(`Vocabulary version: ${schema.vocabularyVersion}`);
  logger.info(`Input columns: ${classifier.featureNames.length}`);

  try {
    assertClassifierMatchesSchema(classifier, schema);
  } catch (error) {
    logger.error(error instanceof Error ? error.message : String(error));
    process.exitCode = 1;
    return;
  }

  logger.success('Classifier matches the configured feature layout');
}
