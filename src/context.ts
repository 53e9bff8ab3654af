/**
 * Application context
 *
 * Everything an invocation needs, built once per process. Construction fails
 * fast: a missing model or a feature layout mismatch throws here instead of
 * surfacing as a failed request later.
 */

import { mkdirSync } from 'node:fs';
import { dirname } from 'node:path';
import Database from 'better-sqlite3';
import { Orchestrator, type OrchestratorOptions } from './agent/orchestrator';
import { loadConfig, type PipelineConfig } from './config';
import { logger, setLogLevel } from './logger';
import { assertClassifierMatchesSchema, type Classifier } from './models/classifier';
import { loadDecisionTreeClassifier } from './models/decision-tree';
import { LocalObjectStore, type ObjectStore } from './services/object-store';
import { AlertStore } from './storage/alert-store';
import { SqliteAlertTable, type AlertTable } from './storage/alert-table';
import { createFeatureSchema, type FeatureSchema } from './utils/feature-vector';

export interface AppContext {
	readonly config: PipelineConfig;
	readonly schema: FeatureSchema;
	readonly classifier: Classifier;
	readonly store: AlertStore;
	readonly objectStore: ObjectStore;
	readonly orchestrator: Orchestrator;
	close(): void;
}

/** Collaborators a caller may supply instead of the configured defaults */
export interface ContextOverrides {
	classifier?: Classifier;
	table?: AlertTable;
	objectStore?: ObjectStore;
	orchestrator?: OrchestratorOptions;
}

function openDatabase(path: string): Database.Database {
	if (path !== ':memory:') {
		mkdirSync(dirname(path), { recursive: true });
	}
	const db = new Database(path);
	db.pragma('journal_mode = WAL');
	return db;
}

export function createContext(
	config: PipelineConfig = loadConfig(),
	overrides: ContextOverrides = {}
): AppContext {
	setLogLevel(config.logging.logLevel);

	const schema = createFeatureSchema(config);
	const classifier = overrides.classifier ?? loadDecisionTreeClassifier(config.model.path);
	assertClassifierMatchesSchema(classifier, schema);

	let db: Database.Database | null = null;
	let table = overrides.table;
	if (!table) {
		db = openDatabase(config.storage.databasePath);
		table = new SqliteAlertTable(db, config.storage.tableName);
	}

	const store = new AlertStore(table, {
		dryRun: config.storage.dryRun,
		pageSize: config.storage.pageSize,
	});
	const objectStore =
		overrides.objectStore ?? new LocalObjectStore(config.objectStore.rootDir, config.objectStore.downloadDir);
	const orchestrator = new Orchestrator(
		{ classifier, schema, store, threshold: config.stressThreshold },
		overrides.orchestrator
	);

	logger.info({
		event: 'context_ready',
		model_version: classifier.version,
		vocabulary_version: schema.vocabularyVersion,
		threshold: config.stressThreshold,
		table: config.storage.tableName,
		dry_run: config.storage.dryRun,
	}, 'Application context ready');

	return {
		config,
		schema,
		classifier,
		store,
		objectStore,
		orchestrator,
		close() {
			db?.close();
		},
	};
}
