/**
 * Alert persistence on top of an AlertTable.
 *
 * Writes are isolated per item: one failed put is logged and counted, the
 * remaining alerts are still written. Reads return every page of a batch's
 * partition, following continuation keys until the table reports none.
 */

import { randomUUID } from 'node:crypto';
import { logger } from '../logger';
import type { AlertItem, ConfirmedReading, WriteFailure } from '../types';
import { toDecimalString } from '../utils/decimal';
import type { AlertKey, AlertTable } from './alert-table';
import { partitionKey, sortKey } from './keys';

export interface AlertStoreOptions {
	/** Skip the physical write but still count the alert as inserted */
	dryRun?: boolean;
	/** Items requested per query page */
	pageSize?: number;
	generateId?: () => string;
}

export interface WriteResult {
	inserted: number;
	failures: WriteFailure[];
}

export class AlertStore {
	private readonly dryRun: boolean;
	private readonly pageSize: number;
	private readonly generateId: () => string;

	constructor(
		private readonly table: AlertTable,
		options: AlertStoreOptions = {}
	) {
		this.dryRun = options.dryRun ?? false;
		this.pageSize = options.pageSize ?? 100;
		this.generateId = options.generateId ?? randomUUID;
	}

	/**
	 * Shape a confirmed reading into a persisted item with a fresh alert id.
	 */
	buildItem(confirmed: ConfirmedReading, sourceFile: string): AlertItem {
		const { reading, prediction } = confirmed;
		const alertId = this.generateId();

		return {
			PK: partitionKey(sourceFile),
			SK: sortKey(reading.locationId, alertId),
			UserID: alertId,
			Timestamp: reading.timestamp,
			SourceFile: sourceFile,
			LocationID: reading.locationId,
			OriginalStressLevel: reading.stressLevel,
			PredictedStressLabel: prediction,
			SleepHours: toDecimalString(reading.features.sleep_hours ?? ''),
			MoodScore: toDecimalString(reading.features.mood_score ?? ''),
			NoiseLevelDB: toDecimalString(reading.features.noise_level_db ?? ''),
		};
	}

	async writeAlerts(confirmed: ConfirmedReading[], sourceFile: string): Promise<WriteResult> {
		const result: WriteResult = { inserted: 0, failures: [] };

		for (const entry of confirmed) {
			let sortKeyForLog = '';
			try {
				const item = this.buildItem(entry, sourceFile);
				sortKeyForLog = item.SK;
				if (!this.dryRun) {
					await this.table.putItem(item);
				}
				result.inserted++;
			} catch (error) {
				const message = error instanceof Error ? error.message : String(error);
				result.failures.push({ sortKey: sortKeyForLog, rowIndex: entry.reading.rowIndex, error: message });
				logger.warn({
					event: 'alert_write_failed',
					source_file: sourceFile,
					row_index: entry.reading.rowIndex,
					sort_key: sortKeyForLog,
					error: message,
				}, `Error storing alert for row ${entry.reading.rowIndex}`);
			}
		}

		logger.info({
			event: 'alerts_stored',
			source_file: sourceFile,
			inserted: result.inserted,
			failed: result.failures.length,
			dry_run: this.dryRun,
		}, `Successfully processed ${result.inserted} records from ${sourceFile}`);

		return result;
	}

	/**
	 * Every alert stored for a batch. Any page failure propagates and the pages
	 * already read are dropped with it.
	 */
	async readAllBySourceFile(sourceFile: string): Promise<AlertItem[]> {
		const pk = partitionKey(sourceFile);
		const items: AlertItem[] = [];
		let startKey: AlertKey | undefined;
		let pages = 0;

		do {
			const page = await this.table.query({
				partitionKey: pk,
				exclusiveStartKey: startKey,
				limit: this.pageSize,
			});
			pages++;
			items.push(...page.items);
			startKey = page.lastEvaluatedKey;
		} while (startKey);

		logger.debug({
			event: 'alerts_read',
			partition_key: pk,
			pages,
			items: items.length,
		}, `Read ${items.length} alerts for ${sourceFile}`);

		return items;
	}
}
