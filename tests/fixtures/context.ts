import { join } from 'node:path';
import { DEFAULT_CONFIG, mergeConfig, type PipelineConfig, type PipelineConfigOverrides } from '../../src/config';
import { MODEL_PATH } from './readings';

/**
 * Config for an isolated run: bundled model, in-memory alert table and
 * object store directories under `dir`.
 */
export function testConfig(dir: string, overrides: PipelineConfigOverrides = {}): PipelineConfig {
	const base = mergeConfig(DEFAULT_CONFIG, {
		model: { path: MODEL_PATH },
		storage: { databasePath: ':memory:' },
		objectStore: { rootDir: join(dir, 'buckets'), downloadDir: join(dir, 'downloads') },
		local: { csvPath: join(dir, 'local.csv') },
		logging: { logLevel: 'silent' },
	});
	return mergeConfig(base, overrides);
}
