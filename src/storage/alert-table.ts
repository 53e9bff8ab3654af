/**
 * Alert table client.
 *
 * `AlertTable` is the narrow key-value contract the pipeline needs: put one
 * item, and query one partition a page at a time with a continuation key.
 * `SqliteAlertTable` implements it on better-sqlite3 with keyset pagination
 * over (pk, sk).
 */

import type Database from 'better-sqlite3';
import type { AlertItem } from '../types';

export interface AlertKey {
	PK: string;
	SK: string;
}

export interface AlertQuery {
	partitionKey: string;
	exclusiveStartKey?: AlertKey;
	limit?: number;
}

export interface AlertPage {
	items: AlertItem[];
	/** Present when more items may follow; pass back as exclusiveStartKey */
	lastEvaluatedKey?: AlertKey;
}

export interface AlertTable {
	putItem(item: AlertItem): Promise<void>;
	query(query: AlertQuery): Promise<AlertPage>;
}

interface AlertRow {
	pk: string;
	sk: string;
	user_id: string;
	timestamp: string;
	source_file: string;
	location_id: number;
	original_stress_level: string;
	predicted_stress_label: number;
	sleep_hours: string;
	mood_score: string;
	noise_level_db: string;
}

const DEFAULT_QUERY_LIMIT = 100;
const TABLE_NAME_PATTERN = /^[A-Za-z_][A-Za-z0-9_]*$/;

function toItem(row: AlertRow): AlertItem {
	return {
		PK: row.pk,
		SK: row.sk,
		UserID: row.user_id,
		Timestamp: row.timestamp,
		SourceFile: row.source_file,
		LocationID: row.location_id,
		OriginalStressLevel: row.original_stress_level,
		PredictedStressLabel: row.predicted_stress_label === 1 ? 1 : 0,
		SleepHours: row.sleep_hours,
		MoodScore: row.mood_score,
		NoiseLevelDB: row.noise_level_db,
	};
}

export class SqliteAlertTable implements AlertTable {
	private readonly insert: Database.Statement<unknown[]>;
	private readonly firstPage: Database.Statement<[string, number], AlertRow>;
	private readonly nextPage: Database.Statement<[string, string, number], AlertRow>;

	constructor(
		private readonly db: Database.Database,
		readonly tableName: string
	) {
		// Table names cannot be bound as parameters
		if (!TABLE_NAME_PATTERN.test(tableName)) {
			throw new Error(`Invalid table name: ${tableName}`);
		}

		db.exec(`
			CREATE TABLE IF NOT EXISTS ${tableName} (
				pk TEXT NOT NULL,
				sk TEXT NOT NULL,
				user_id TEXT NOT NULL,
				timestamp TEXT NOT NULL,
				source_file TEXT NOT NULL,
				location_id INTEGER NOT NULL,
				original_stress_level TEXT NOT NULL,
				predicted_stress_label INTEGER NOT NULL,
				sleep_hours TEXT NOT NULL,
				mood_score TEXT NOT NULL,
				noise_level_db TEXT NOT NULL,
				PRIMARY KEY (pk, sk)
			)
		`);

		this.insert = db.prepare(`
			INSERT OR REPLACE INTO ${tableName} (
				pk, sk, user_id, timestamp, source_file, location_id,
				original_stress_level, predicted_stress_label,
				sleep_hours, mood_score, noise_level_db
			) VALUES (?, ?, ?, ?, ?, ?, ?, ?, ?, ?, ?)
		`);
		this.firstPage = db.prepare<[string, number], AlertRow>(
			`SELECT * FROM ${tableName} WHERE pk = ? ORDER BY sk LIMIT ?`
		);
		this.nextPage = db.prepare<[string, string, number], AlertRow>(
			`SELECT * FROM ${tableName} WHERE pk = ? AND sk > ? ORDER BY sk LIMIT ?`
		);
	}

	async putItem(item: AlertItem): Promise<void> {
		this.insert.run(
			item.PK,
			item.SK,
			item.UserID,
			item.Timestamp,
			item.SourceFile,
			item.LocationID,
			item.OriginalStressLevel,
			item.PredictedStressLabel,
			item.SleepHours,
			item.MoodScore,
			item.NoiseLevelDB
		);
	}

	async query(query: AlertQuery): Promise<AlertPage> {
		const limit = query.limit ?? DEFAULT_QUERY_LIMIT;
		// Read one extra row to learn whether another page exists
		const rows = query.exclusiveStartKey
			? this.nextPage.all(query.partitionKey, query.exclusiveStartKey.SK, limit + 1)
			: this.firstPage.all(query.partitionKey, limit + 1);

		const items = rows.slice(0, limit).map(toItem);
		if (rows.length <= limit) {
			return { items };
		}

		const last = items[items.length - 1];
		return { items, lastEvaluatedKey: { PK: last.PK, SK: last.SK } };
	}

	close(): void {
		this.db.close();
	}
}
