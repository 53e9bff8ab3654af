import { describe, it, expect, vi } from 'vitest';
import { queryAlerts, toAlertResponse } from '../../../src/api/alerts';
import { AlertStore } from '../../../src/storage/alert-store';
import type { AlertPage, AlertQuery, AlertTable } from '../../../src/storage/alert-table';
import type { AlertItem } from '../../../src/types';

function storedAlert(overrides: Partial<AlertItem> = {}): AlertItem {
	return {
		PK: 'SOURCEFILE#week-10.csv',
		SK: 'LOCATION#101#USERID#alert-1',
		UserID: 'alert-1',
		Timestamp: '2024-03-04 09:05:30',
		SourceFile: 'week-10.csv',
		LocationID: 101,
		OriginalStressLevel: '57.9',
		PredictedStressLabel: 1,
		SleepHours: '5',
		MoodScore: '3',
		NoiseLevelDB: '72.5',
		...overrides,
	};
}

function storeWith(query: (query: AlertQuery) => Promise<AlertPage>) {
	const table = {
		putItem: vi.fn<(item: AlertItem) => Promise<void>>(async () => undefined),
		query: vi.fn(query),
	} satisfies AlertTable;
	return { table, store: new AlertStore(table) };
}

describe('toAlertResponse', () => {
	it('reports the source file, integer score and ISO timestamp', () => {
		expect(toAlertResponse(storedAlert())).toEqual({
			record_id: 'week-10.csv',
			stress_score: 57,
			timestamp: '2024-03-04T09:05:30Z',
		});
	});

	it('falls back for missing fields', () => {
		expect(toAlertResponse({})).toEqual({ record_id: 'unknown-source', stress_score: 0, timestamp: null });
	});

	it('returns a null timestamp when the stored value does not parse', () => {
		expect(toAlertResponse(storedAlert({ Timestamp: 'garbled' })).timestamp).toBeNull();
	});
});

describe('queryAlerts', () => {
	it.each([null, undefined, {}, { source_file: '' }, { source_file: '   ' }])(
		'rejects %j without reading storage',
		async (params) => {
			const { table, store } = storeWith(async () => ({ items: [] }));

			const result = await queryAlerts(params, store);

			expect(result).toEqual({ status: 400, body: { error: "The 'source_file' query parameter is required." } });
			expect(table.query).not.toHaveBeenCalled();
		}
	);

	it('returns every stored alert for the file', async () => {
		const { table, store } = storeWith(async () => ({
			items: [storedAlert(), storedAlert({ SK: 'LOCATION#102#USERID#alert-2', OriginalStressLevel: '88', Timestamp: 'x' })],
		}));

		const result = await queryAlerts({ source_file: 'week-10.csv' }, store);

		expect(result).toEqual({
			status: 200,
			body: {
				alerts: [
					{ record_id: 'week-10.csv', stress_score: 57, timestamp: '2024-03-04T09:05:30Z' },
					{ record_id: 'week-10.csv', stress_score: 88, timestamp: null },
				],
			},
		});
		expect(table.query.mock.calls[0][0].partitionKey).toBe('SOURCEFILE#week-10.csv');
	});

	it('looks up the source file exactly as sent', async () => {
		const { table, store } = storeWith(async () => ({ items: [] }));

		const result = await queryAlerts({ source_file: ' week-10.csv' }, store);

		expect(result).toEqual({ status: 200, body: { alerts: [] } });
		expect(table.query.mock.calls[0][0].partitionKey).toBe('SOURCEFILE# week-10.csv');
	});

	it('reports a storage failure as a server error', async () => {
		const { store } = storeWith(async () => {
			throw new Error('connection refused');
		});

		const result = await queryAlerts({ source_file: 'week-10.csv' }, store);

		expect(result).toEqual({ status: 500, body: { error: 'Could not retrieve alerts.' } });
	});
});
