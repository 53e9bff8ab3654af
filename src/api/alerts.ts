/**
 * Alerts query
 *
 * Transport-independent handler behind `GET /alerts`. Both the Hono route and
 * the event router call it and only differ in how they serialize the result.
 */

import { QueryValidationError } from '../errors';
import { logger } from '../logger';
import type { AlertStore } from '../storage/alert-store';
import type { AlertItem, AlertResponseItem } from '../types';
import { decimalToInteger } from '../utils/decimal';
import { storedTimestampToIso } from '../utils/timestamp';

export type AlertsQueryParams = Record<string, string | undefined> | null | undefined;

export type AlertsQueryResult =
	| { status: 200; body: { alerts: AlertResponseItem[] } }
	| { status: 400 | 500; body: { error: string } };

const UNKNOWN_SOURCE = 'unknown-source';

export function toAlertResponse(item: Partial<AlertItem>): AlertResponseItem {
	return {
		record_id: item.SourceFile ?? UNKNOWN_SOURCE,
		stress_score: decimalToInteger(item.OriginalStressLevel),
		timestamp: storedTimestampToIso(item.Timestamp),
	};
}

function requireSourceFile(params: AlertsQueryParams): string {
	const sourceFile = params?.source_file;
	if (sourceFile === undefined || sourceFile.trim() === '') {
		throw new QueryValidationError("The 'source_file' query parameter is required.", 'source_file');
	}
	return sourceFile;
}

export async function queryAlerts(params: AlertsQueryParams, store: AlertStore): Promise<AlertsQueryResult> {
	let sourceFile: string;
	try {
		sourceFile = requireSourceFile(params);
	} catch (error) {
		if (!(error instanceof QueryValidationError)) throw error;
		logger.warn({
			event: 'alerts_query_rejected',
			parameter: error.parameter,
		}, error.message);
		return { status: 400, body: { error: error.message } };
	}

	try {
		const items = await store.readAllBySourceFile(sourceFile);
		logger.info({
			event: 'alerts_query',
			source_file: sourceFile,
			count: items.length,
		}, `Retrieved ${items.length} alerts for ${sourceFile}`);
		return { status: 200, body: { alerts: items.map(toAlertResponse) } };
	} catch (error) {
		logger.error({
			event: 'alerts_query_failed',
			source_file: sourceFile,
			error: error instanceof Error ? error.message : String(error),
		}, 'Error querying alerts');
		return { status: 500, body: { error: 'Could not retrieve alerts.' } };
	}
}
