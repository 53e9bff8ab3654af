/**
 * Per-row model confirmation.
 *
 * Every candidate is featurized and classified on its own. A row that fails
 * either step is recorded and skipped; the rest of the batch carries on.
 */

import { logger } from '../logger';
import type { Classifier } from '../models/classifier';
import type { ConfirmedReading, Prediction, Reading, RowFailure, RowStage } from '../types';
import { buildFeatureVector, type FeatureSchema } from '../utils/feature-vector';

export interface InferenceResult {
	/** Rows whose feature vector was built and handed to the classifier, failed or not */
	attempted: number;
	confirmed: ConfirmedReading[];
	failures: RowFailure[];
}

type RowOutcome =
	| { ok: true; prediction: Prediction }
	| { ok: false; stage: RowStage; error: string };

function classifyRow(reading: Reading, schema: FeatureSchema, classifier: Classifier): RowOutcome {
	let vector: Float32Array;
	try {
		vector = buildFeatureVector(reading, schema);
	} catch (error) {
		return { ok: false, stage: 'featurize', error: error instanceof Error ? error.message : String(error) };
	}

	try {
		return { ok: true, prediction: classifier.predict(vector) };
	} catch (error) {
		return { ok: false, stage: 'inference', error: error instanceof Error ? error.message : String(error) };
	}
}

export function runInference(
	readings: Reading[],
	schema: FeatureSchema,
	classifier: Classifier
): InferenceResult {
	const result: InferenceResult = { attempted: 0, confirmed: [], failures: [] };

	for (const reading of readings) {
		const outcome = classifyRow(reading, schema, classifier);

		if (outcome.ok || outcome.stage === 'inference') {
			result.attempted++;
		}

		if (!outcome.ok) {
			result.failures.push({ rowIndex: reading.rowIndex, stage: outcome.stage, error: outcome.error });
			logger.warn({
				event: 'row_processing_failed',
				row_index: reading.rowIndex,
				stage: outcome.stage,
				error: outcome.error,
			}, `Error processing row ${reading.rowIndex}`);
			continue;
		}

		if (outcome.prediction === 1) {
			result.confirmed.push({ reading, prediction: outcome.prediction });
		}
	}

	logger.info({
		event: 'inference_complete',
		model_version: classifier.version,
		attempted: result.attempted,
		confirmed: result.confirmed.length,
		failed: result.failures.length,
	}, 'Model inference complete');

	return result;
}
