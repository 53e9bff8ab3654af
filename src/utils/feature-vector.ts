import { getTrainingColumns, type PipelineConfig } from '../config/defaults';
import { RowProcessingError } from '../errors';
import type { Reading } from '../types';

/**
 * Column layout the classifier was trained on: numerical features first, then
 * one-hot location columns in vocabulary order.
 */
export interface FeatureSchema {
	columns: string[];
	numerical: string[];
	vocabularyVersion: string;
	/** location id → vector index of its one-hot column */
	locationIndex: Map<number, number>;
}

const NUMERIC_PATTERN = /^[+-]?(?:\d+\.?\d*|\.\d+)(?:[eE][+-]?\d+)?$/;

export function createFeatureSchema(config: Pick<PipelineConfig, 'features'>): FeatureSchema {
	const { numerical, locationVocabulary } = config.features;
	const locationIndex = new Map<number, number>();
	locationVocabulary.categories.forEach((id, offset) => {
		locationIndex.set(id, numerical.length + offset);
	});

	return {
		columns: getTrainingColumns(config),
		numerical: [...numerical],
		vocabularyVersion: locationVocabulary.version,
		locationIndex,
	};
}

function parseFeature(name: string, raw: string | undefined, rowIndex: number): number {
	const trimmed = raw?.trim() ?? '';
	if (trimmed === '') {
		throw new RowProcessingError(`missing value for ${name}`, rowIndex);
	}
	if (!NUMERIC_PATTERN.test(trimmed)) {
		throw new RowProcessingError(`non-numeric value "${raw}" for ${name}`, rowIndex);
	}
	const value = Number(trimmed);
	if (!Number.isFinite(value)) {
		throw new RowProcessingError(`out-of-range value "${raw}" for ${name}`, rowIndex);
	}
	return value;
}

/**
 * Project one reading onto the training layout.
 *
 * A location outside the vocabulary leaves every location column at zero; the
 * vector keeps the same width either way.
 */
export function buildFeatureVector(reading: Reading, schema: FeatureSchema): Float32Array {
	const vector = new Float32Array(schema.columns.length);

	schema.numerical.forEach((name, index) => {
		vector[index] = parseFeature(name, reading.features[name], reading.rowIndex);
	});

	const locationColumn = schema.locationIndex.get(reading.locationId);
	if (locationColumn !== undefined) {
		vector[locationColumn] = 1;
	}

	return vector;
}
