import { ModelSchemaError } from '../errors';
import type { Prediction } from '../types';
import type { FeatureSchema } from '../utils/feature-vector';

/**
 * Pre-trained binary classifier. Loaded once per process and read-only
 * afterwards.
 */
export interface Classifier {
	readonly version: string;
	/** Input columns in the order the model was trained on */
	readonly featureNames: readonly string[];
	predict(vector: Float32Array): Prediction;
}

/**
 * Fail fast when the artifact and the configured feature layout disagree.
 * Checked once at startup rather than on every row.
 */
export function assertClassifierMatchesSchema(classifier: Classifier, schema: FeatureSchema): void {
	const expected = schema.columns;
	const actual = classifier.featureNames;

	if (actual.length !== expected.length) {
		throw new ModelSchemaError(
			`Classifier ${classifier.version} expects ${actual.length} input columns, ` +
				`configured layout (vocabulary ${schema.vocabularyVersion}) has ${expected.length}`
		);
	}

	const mismatch = expected.findIndex((column, index) => actual[index] !== column);
	if (mismatch !== -1) {
		throw new ModelSchemaError(
			`Classifier ${classifier.version} column ${mismatch} is "${actual[mismatch]}", ` +
				`configured layout has "${expected[mismatch]}"`
		);
	}
}
