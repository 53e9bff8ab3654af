/**
 * Shared test fixtures: batch CSV writers, readings and classifier stubs.
 */

import { writeFileSync } from 'node:fs';
import { join } from 'node:path';
import { fileURLToPath } from 'node:url';
import { stringify } from 'csv-stringify/sync';
import { vi } from 'vitest';
import { DEFAULT_CONFIG, getTrainingColumns } from '../../src/config/defaults';
import type { Classifier } from '../../src/models/classifier';
import type { Prediction, Reading } from '../../src/types';

export const MODEL_PATH = fileURLToPath(new URL('../../resources/stress_model.json', import.meta.url));

export const BATCH_COLUMNS = [
	'timestamp',
	'location_id',
	'temperature_celsius',
	'humidity_percent',
	'air_quality_index',
	'noise_level_db',
	'lighting_lux',
	'crowd_density',
	'stress_level',
	'sleep_hours',
	'mood_score',
];

/** A calm, fully populated row; tests override only what they care about */
export const BASE_ROW: Record<string, string> = {
	timestamp: '2024-03-04 09:00:00',
	location_id: '101',
	temperature_celsius: '22.5',
	humidity_percent: '48',
	air_quality_index: '40',
	noise_level_db: '55.5',
	lighting_lux: '400',
	crowd_density: '0.25',
	stress_level: '50',
	sleep_hours: '7',
	mood_score: '6',
};

export function row(overrides: Record<string, string> = {}): Record<string, string> {
	return { ...BASE_ROW, ...overrides };
}

export function writeBatch(
	dir: string,
	name: string,
	rows: Record<string, string>[],
	columns: string[] = BATCH_COLUMNS
): string {
	const path = join(dir, name);
	writeFileSync(path, stringify([columns, ...rows.map((entry) => columns.map((column) => entry[column] ?? ''))]));
	return path;
}

export function makeReading(overrides: Partial<Reading> = {}, features: Record<string, string> = {}): Reading {
	const { timestamp, location_id, stress_level, ...rest } = BASE_ROW;
	return {
		rowIndex: 0,
		locationId: Number(location_id),
		timestamp,
		stressLevel: stress_level,
		stressScore: Number(stress_level),
		...overrides,
		features: { ...rest, ...features },
	};
}

export function stubClassifier(
	predict: (vector: Float32Array) => Prediction,
	featureNames: string[] = getTrainingColumns(DEFAULT_CONFIG)
) {
	const classifier = {
		version: 'test-model',
		featureNames,
		predict: vi.fn<(vector: Float32Array) => Prediction>(predict),
	};
	return classifier satisfies Classifier;
}
