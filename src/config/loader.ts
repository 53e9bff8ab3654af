/**
 * Configuration Loader
 *
 * Loads configuration from multiple sources with the following priority:
 * 1. Environment variables (highest priority)
 * 2. JSON config file (CONFIG_PATH, or config/pipeline.json when present)
 * 3. Default Configuration (lowest priority - hardcoded)
 *
 * Configuration is cached in memory for the lifetime of the process.
 */

import { existsSync, readFileSync } from 'node:fs';
import {
	DEFAULT_CONFIG,
	validateConfig,
	type LogLevel,
	type PipelineConfig,
	type PipelineConfigOverrides,
} from './defaults';
import { logger } from '../logger';

const DEFAULT_CONFIG_PATH = 'config/pipeline.json';

export type EnvSource = Record<string, string | undefined>;

export interface LoadConfigOptions {
	env?: EnvSource;
	configPath?: string;
	force?: boolean;
}

// In-memory cache
let cachedConfig: PipelineConfig | null = null;

function isPlainObject(value: unknown): value is Record<string, unknown> {
	return value !== null && typeof value === 'object' && !Array.isArray(value);
}

/**
 * Merge overrides section by section. Nested sections are replaced key by key,
 * so a file that only sets `storage.dryRun` keeps the default table name.
 */
export function mergeConfig(base: PipelineConfig, overrides: PipelineConfigOverrides): PipelineConfig {
	return {
		stressThreshold: overrides.stressThreshold ?? base.stressThreshold,
		features: { ...base.features, ...overrides.features },
		model: { ...base.model, ...overrides.model },
		storage: { ...base.storage, ...overrides.storage },
		objectStore: { ...base.objectStore, ...overrides.objectStore },
		local: { ...base.local, ...overrides.local },
		logging: { ...base.logging, ...overrides.logging },
		server: { ...base.server, ...overrides.server },
	};
}

/**
 * Load overrides from a JSON file. A missing default file is not an error;
 * a missing explicit file or an invalid one is.
 */
function loadFromFile(path: string, explicit: boolean): PipelineConfigOverrides | null {
	if (!existsSync(path)) {
		if (explicit) {
			throw new Error(`Config file not found: ${path}`);
		}
		logger.debug({
			event: 'config_not_found',
			source: 'file',
			path,
		}, 'No configuration file found, using defaults');
		return null;
	}

	const overrides: PipelineConfigOverrides = JSON.parse(readFileSync(path, 'utf8'));
	if (!isPlainObject(overrides)) {
		throw new Error(`Config file ${path} must contain a JSON object`);
	}

	const validation = validateConfig(overrides);
	if (!validation.valid) {
		logger.error({
			event: 'config_invalid',
			source: 'file',
			path,
			errors: validation.errors,
		}, 'Invalid configuration file');
		throw new Error(`Invalid configuration in ${path}: ${validation.errors.join('; ')}`);
	}

	logger.info({
		event: 'config_loaded',
		source: 'file',
		path,
	}, 'Loaded configuration file');
	return overrides;
}

function parseBoolean(value: string | undefined): boolean | undefined {
	if (value === undefined || value === '') return undefined;
	return ['true', '1', 'yes'].includes(value.trim().toLowerCase());
}

function parseNumber(name: string, value: string | undefined): number | undefined {
	if (value === undefined || value === '') return undefined;
	const parsed = Number(value);
	if (!Number.isFinite(parsed)) {
		throw new Error(`Environment variable ${name} must be a number, got "${value}"`);
	}
	return parsed;
}

function parseLogLevel(value: string | undefined): LogLevel | undefined {
	switch (value) {
		case 'debug':
		case 'info':
		case 'warn':
		case 'error':
		case 'silent':
			return value;
		case undefined:
		case '':
			return undefined;
		default:
			throw new Error(`LOG_LEVEL must be debug, info, warn, error or silent, got "${value}"`);
	}
}

/**
 * Overrides taken from the environment. Unset variables contribute nothing,
 * so they never shadow values from the config file.
 */
export function loadFromEnv(env: EnvSource): PipelineConfigOverrides {
	const overrides: PipelineConfigOverrides = {};

	const threshold = parseNumber('STRESS_THRESHOLD', env.STRESS_THRESHOLD);
	if (threshold !== undefined) overrides.stressThreshold = threshold;

	if (env.MODEL_PATH) overrides.model = { path: env.MODEL_PATH };

	const storage: Partial<PipelineConfig['storage']> = {};
	if (env.DATABASE_PATH) storage.databasePath = env.DATABASE_PATH;
	if (env.ALERTS_TABLE) storage.tableName = env.ALERTS_TABLE;
	const dryRun = parseBoolean(env.DRY_RUN);
	if (dryRun !== undefined) storage.dryRun = dryRun;
	overrides.storage = storage;

	const objectStore: Partial<PipelineConfig['objectStore']> = {};
	if (env.OBJECT_STORE_ROOT) objectStore.rootDir = env.OBJECT_STORE_ROOT;
	if (env.DOWNLOAD_DIR) objectStore.downloadDir = env.DOWNLOAD_DIR;
	overrides.objectStore = objectStore;

	const local: Partial<PipelineConfig['local']> = {};
	const runningLocally = parseBoolean(env.RUNNING_LOCALLY);
	if (runningLocally !== undefined) local.runningLocally = runningLocally;
	if (env.LOCAL_CSV_PATH) local.csvPath = env.LOCAL_CSV_PATH;
	overrides.local = local;

	const logLevel = parseLogLevel(env.LOG_LEVEL);
	if (logLevel !== undefined) overrides.logging = { logLevel };

	const port = parseNumber('PORT', env.PORT);
	if (port !== undefined) overrides.server = { port };

	return overrides;
}

/**
 * Load configuration with caching
 */
export function loadConfig(options: LoadConfigOptions = {}): PipelineConfig {
	if (cachedConfig && !options.force) {
		return cachedConfig;
	}

	const env = options.env ?? process.env;
	const explicitPath = options.configPath ?? env.CONFIG_PATH;

	let config: PipelineConfig = mergeConfig(DEFAULT_CONFIG, {});

	const fileConfig = loadFromFile(explicitPath ?? DEFAULT_CONFIG_PATH, explicitPath !== undefined);
	if (fileConfig) {
		config = mergeConfig(config, fileConfig);
	}

	const envConfig = loadFromEnv(env);
	const envValidation = validateConfig(envConfig);
	if (!envValidation.valid) {
		throw new Error(`Invalid environment configuration: ${envValidation.errors.join('; ')}`);
	}
	config = mergeConfig(config, envConfig);

	cachedConfig = config;
	return config;
}

/**
 * Clear the configuration cache (useful for testing or forced reload)
 */
export function clearConfigCache(): void {
	cachedConfig = null;
	logger.debug({
		event: 'config_cache_cleared',
	}, 'Configuration cache cleared');
}
