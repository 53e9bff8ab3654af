/**
 * Batch reader and threshold pre-filter.
 *
 * Reads one CSV batch, validates the columns every later stage relies on and
 * keeps only readings whose stress level is strictly above the threshold.
 * Nothing here touches the classifier; this is the cheap filter that decides
 * whether a run needs model work at all.
 */

import { readFileSync } from 'node:fs';
import { basename } from 'node:path';
import { parse } from 'csv-parse/sync';
import { BatchLoadError } from '../errors';
import { logger } from '../logger';
import type { Reading, RejectedRow } from '../types';
import { toDecimalString } from '../utils/decimal';
import { canonicalizeTimestamp } from '../utils/timestamp';

/** Columns copied onto the persisted alert in addition to the key fields */
export const RECORD_FEATURE_COLUMNS = ['sleep_hours', 'mood_score', 'noise_level_db'] as const;

const KEY_COLUMNS = ['timestamp', 'location_id', 'stress_level'] as const;
const INTEGER_PATTERN = /^[+-]?\d+(?:\.0*)?$/;

export interface BatchFilterOptions {
	threshold: number;
	numericalFeatures: string[];
}

export interface LoadedBatch {
	filePath: string;
	sourceFile: string;
	totalRows: number;
	readings: Reading[];
	rejectedRows: RejectedRow[];
}

export interface FilteredBatch extends LoadedBatch {
	threshold: number;
	candidates: Reading[];
}

export function requiredColumns(numericalFeatures: string[]): string[] {
	return [...new Set<string>([...KEY_COLUMNS, ...RECORD_FEATURE_COLUMNS, ...numericalFeatures])];
}

interface RawRow {
	values: Record<string, string>;
	fieldCount: number;
}

function readRows(filePath: string): { header: string[]; rows: RawRow[] } {
	let raw: string;
	try {
		raw = readFileSync(filePath, 'utf8');
	} catch (error) {
		throw new BatchLoadError(
			`Could not read batch file: ${error instanceof Error ? error.message : String(error)}`,
			filePath
		);
	}

	let records: unknown;
	try {
		records = parse(raw, {
			bom: true,
			relax_column_count: true,
			skip_empty_lines: true,
			trim: true,
		});
	} catch (error) {
		throw new BatchLoadError(
			`Could not parse batch file: ${error instanceof Error ? error.message : String(error)}`,
			filePath
		);
	}

	if (!Array.isArray(records) || records.length === 0) {
		throw new BatchLoadError('Batch file has no header row', filePath);
	}

	const [first, ...rest] = records.map((record: unknown) =>
		Array.isArray(record) ? record.map((value: unknown) => (typeof value === 'string' ? value : '')) : []
	);
	const header = first ?? [];

	// Short rows leave their trailing columns unset; toReading rejects them.
	const rows = rest.map((fields): RawRow => {
		const values: Record<string, string> = {};
		header.forEach((column, index) => {
			const value = fields[index];
			if (value !== undefined) values[column] = value;
		});
		return { values, fieldCount: fields.length };
	});

	return { header, rows };
}

function toReading(
	{ values: row, fieldCount }: RawRow,
	rowIndex: number,
	expectedFields: number,
	numericalFeatures: string[]
): Reading | RejectedRow {
	if (fieldCount !== expectedFields) {
		return { rowIndex, reason: `expected ${expectedFields} fields, got ${fieldCount}` };
	}

	const timestamp = canonicalizeTimestamp(row.timestamp ?? '');
	if (timestamp === null) {
		return { rowIndex, reason: `unparseable timestamp "${row.timestamp ?? ''}"` };
	}

	const rawLocation = (row.location_id ?? '').trim();
	if (!INTEGER_PATTERN.test(rawLocation)) {
		return { rowIndex, reason: `location_id "${rawLocation}" is not an integer` };
	}

	let stressLevel: string;
	try {
		stressLevel = toDecimalString(row.stress_level ?? '');
	} catch (error) {
		return { rowIndex, reason: `stress_level: ${error instanceof Error ? error.message : String(error)}` };
	}

	const features: Record<string, string> = {};
	for (const name of new Set([...numericalFeatures, ...RECORD_FEATURE_COLUMNS])) {
		features[name] = row[name] ?? '';
	}

	return {
		rowIndex,
		locationId: Math.trunc(Number(rawLocation)),
		timestamp,
		stressLevel,
		stressScore: Number(stressLevel),
		features,
	};
}

function isReading(value: Reading | RejectedRow): value is Reading {
	return 'timestamp' in value;
}

/**
 * Load every row of a batch. Throws BatchLoadError when the file as a whole
 * is unusable; individual unparseable rows, including rows with the wrong
 * number of fields, are returned as rejected.
 */
export function loadBatch(filePath: string, numericalFeatures: string[]): LoadedBatch {
	const { header, rows } = readRows(filePath);

	const present = new Set(header);
	const missing = requiredColumns(numericalFeatures).filter((column) => !present.has(column));
	if (missing.length > 0) {
		throw new BatchLoadError(`Batch is missing required columns: ${missing.join(', ')}`, filePath);
	}

	const readings: Reading[] = [];
	const rejectedRows: RejectedRow[] = [];
	rows.forEach((row, rowIndex) => {
		const result = toReading(row, rowIndex, header.length, numericalFeatures);
		if (isReading(result)) {
			readings.push(result);
		} else {
			rejectedRows.push(result);
		}
	});

	logger.info({
		event: 'batch_loaded',
		file_path: filePath,
		total_rows: rows.length,
		rejected_rows: rejectedRows.length,
	}, `Loaded ${rows.length} rows from ${filePath}`);

	return {
		filePath,
		sourceFile: basename(filePath),
		totalRows: rows.length,
		readings,
		rejectedRows,
	};
}

/**
 * Readings whose stress level is strictly greater than the threshold.
 * A reading exactly at the threshold is excluded.
 */
export function filterByThreshold(readings: Reading[], threshold: number): Reading[] {
	return readings.filter((reading) => reading.stressScore > threshold);
}

export function loadAndFilterBatch(filePath: string, options: BatchFilterOptions): FilteredBatch {
	const batch = loadBatch(filePath, options.numericalFeatures);
	const candidates = filterByThreshold(batch.readings, options.threshold);

	logger.info({
		event: 'batch_filtered',
		file_path: filePath,
		threshold: options.threshold,
		candidates: candidates.length,
	}, `Found ${candidates.length} readings with stress_level > ${options.threshold}`);

	return { ...batch, threshold: options.threshold, candidates };
}
