/**
 * Default Configuration for the stress alert pipeline
 *
 * These defaults let the pipeline run locally without any extra setup.
 * Settings can be overridden by:
 * 1. A JSON config file (CONFIG_PATH, default config/pipeline.json)
 * 2. Environment variables
 *
 * Priority: Env Vars > Config File > Defaults
 */

export type LogLevel = 'debug' | 'info' | 'warn' | 'error' | 'silent';

export interface LocationVocabulary {
	version: string; // Bumped whenever the classifier is retrained on a new location set
	categories: number[]; // Closed set of location ids, in training column order
}

export interface PipelineConfig {
	// Cheap pre-filter applied before any model work
	stressThreshold: number; // Rows with stress_level strictly above this are candidates

	// Feature layout shared with the training export
	features: {
		numerical: string[]; // Numerical columns, in training column order
		locationColumnPrefix: string; // One-hot columns are `${prefix}_${id}`
		locationVocabulary: LocationVocabulary;
	};

	// Classifier artifact
	model: {
		path: string; // JSON decision tree exported by the training job
	};

	// Alert table
	storage: {
		databasePath: string; // SQLite file, or ':memory:'
		tableName: string;
		pageSize: number; // Items per query page
		dryRun: boolean; // Count alerts as inserted without writing them
	};

	// Uploaded batch files
	objectStore: {
		rootDir: string; // Buckets are directories below this root
		downloadDir: string; // Where referenced objects are copied before ingest
	};

	// Local (direct invocation) mode
	local: {
		runningLocally: boolean; // Route every unrecognised event to the local batch
		csvPath: string;
	};

	logging: {
		logLevel: LogLevel; // Pino log level
	};

	server: {
		port: number;
	};
}

export type PipelineConfigOverrides = {
	[K in keyof PipelineConfig]?: Partial<PipelineConfig[K]>;
};

export const DEFAULT_CONFIG: PipelineConfig = {
	stressThreshold: 42,

	features: {
		numerical: [
			'temperature_celsius',
			'humidity_percent',
			'air_quality_index',
			'noise_level_db',
			'lighting_lux',
			'crowd_density',
			'sleep_hours',
			'mood_score',
		],
		locationColumnPrefix: 'location_id',
		locationVocabulary: {
			version: '2024-01',
			categories: [101, 102, 103, 104, 105],
		},
	},

	model: {
		path: 'resources/stress_model.json',
	},

	storage: {
		databasePath: 'data/alerts.db',
		tableName: 'HighStressUsers',
		pageSize: 100,
		dryRun: false,
	},

	objectStore: {
		rootDir: 'data/buckets',
		downloadDir: 'data/downloads',
	},

	local: {
		runningLocally: false,
		csvPath: 'resources/sample_readings.csv',
	},

	logging: {
		logLevel: 'info',
	},

	server: {
		port: 3000,
	},
};

const LOG_LEVELS: LogLevel[] = ['debug', 'info', 'warn', 'error', 'silent'];
const TABLE_NAME_PATTERN = /^[A-Za-z_][A-Za-z0-9_]*$/;

/**
 * Training columns in the exact order the classifier was fitted on.
 */
export function getTrainingColumns(config: Pick<PipelineConfig, 'features'>): string[] {
	const { numerical, locationColumnPrefix, locationVocabulary } = config.features;
	return [
		...numerical,
		...locationVocabulary.categories.map((id) => `${locationColumnPrefix}_${id}`),
	];
}

/**
 * Validate configuration values
 */
export function validateConfig(config: PipelineConfigOverrides): {
	valid: boolean;
	errors: string[];
} {
	const errors: string[] = [];

	if (config.stressThreshold !== undefined && !Number.isFinite(config.stressThreshold)) {
		errors.push('stressThreshold must be a finite number');
	}

	if (config.features) {
		const { numerical, locationVocabulary, locationColumnPrefix } = config.features;
		if (numerical !== undefined) {
			if (!Array.isArray(numerical) || !numerical.every((name) => typeof name === 'string')) {
				errors.push('features.numerical must be a list of column names');
			} else if (numerical.length === 0) {
				errors.push('features.numerical must list at least one column');
			} else if (new Set(numerical).size !== numerical.length) {
				errors.push('features.numerical must not contain duplicates');
			}
		}
		if (locationColumnPrefix !== undefined && locationColumnPrefix.trim() === '') {
			errors.push('features.locationColumnPrefix must not be empty');
		}
		if (locationVocabulary !== undefined) {
			if (!locationVocabulary.version) {
				errors.push('features.locationVocabulary.version is required');
			}
			const { categories } = locationVocabulary;
			if (!Array.isArray(categories)) {
				errors.push('features.locationVocabulary.categories is required');
			} else if (!categories.every((id) => Number.isInteger(id))) {
				errors.push('features.locationVocabulary.categories must be integers');
			} else if (new Set(categories).size !== categories.length) {
				errors.push('features.locationVocabulary.categories must not contain duplicates');
			}
		}
	}

	if (config.storage) {
		const { pageSize, tableName } = config.storage;
		if (pageSize !== undefined && (!Number.isInteger(pageSize) || pageSize < 1)) {
			errors.push('storage.pageSize must be a positive integer');
		}
		if (tableName !== undefined && !TABLE_NAME_PATTERN.test(tableName)) {
			errors.push('storage.tableName must be a plain identifier');
		}
	}

	if (config.logging?.logLevel !== undefined && !LOG_LEVELS.includes(config.logging.logLevel)) {
		errors.push(`logging.logLevel must be one of ${LOG_LEVELS.join(', ')}`);
	}

	if (config.server?.port !== undefined) {
		const { port } = config.server;
		if (!Number.isInteger(port) || port < 0 || port > 65535) {
			errors.push('server.port must be an integer between 0 and 65535');
		}
	}

	return {
		valid: errors.length === 0,
		errors,
	};
}
