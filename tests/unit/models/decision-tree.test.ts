import { describe, it, expect } from 'vitest';
import { DEFAULT_CONFIG } from '../../../src/config/defaults';
import { ModelSchemaError } from '../../../src/errors';
import { assertClassifierMatchesSchema } from '../../../src/models/classifier';
import {
	DecisionTreeClassifier,
	loadDecisionTreeClassifier,
	parseDecisionTreeModel,
	type DecisionTreeModel,
} from '../../../src/models/decision-tree';
import { createFeatureSchema } from '../../../src/utils/feature-vector';
import { MODEL_PATH, stubClassifier } from '../../fixtures/readings';

const twoFeatureModel: DecisionTreeModel = {
	meta: { version: 'tree_v1', features: ['mood_score', 'sleep_hours'] },
	tree: {
		t: 'n',
		f: 'mood_score',
		v: 4.5,
		l: { t: 'l', v: 1, reason: 'low_mood' },
		r: {
			t: 'n',
			f: 'sleep_hours',
			v: 5,
			operator: '>',
			l: { t: 'l', v: 0 },
			r: { t: 'l', v: 1 },
		},
	},
};

describe('parseDecisionTreeModel', () => {
	it('accepts the single tree layout', () => {
		const model = parseDecisionTreeModel(JSON.parse(JSON.stringify(twoFeatureModel)));
		expect(model.meta).toEqual({ version: 'tree_v1', features: ['mood_score', 'sleep_hours'] });
		expect(model.tree).toEqual(twoFeatureModel.tree);
	});

	it('accepts a one-tree forest export', () => {
		const model = parseDecisionTreeModel({ meta: twoFeatureModel.meta, forest: [twoFeatureModel.tree] });
		expect(model.tree).toEqual(twoFeatureModel.tree);
	});

	it('rejects a forest with more than one tree', () => {
		expect(() =>
			parseDecisionTreeModel({ meta: twoFeatureModel.meta, forest: [twoFeatureModel.tree, twoFeatureModel.tree] })
		).toThrow('Expected a single tree, artifact has 2');
	});

	it('rejects leaves that are not binary labels', () => {
		expect(() =>
			parseDecisionTreeModel({
				meta: twoFeatureModel.meta,
				tree: { t: 'n', f: 'mood_score', v: 1, l: { t: 'l', v: 0.7 }, r: { t: 'l', v: 0 } },
			})
		).toThrow('Leaf at tree.l must predict 0 or 1, got 0.7');
	});

	it('rejects artifacts without metadata', () => {
		expect(() => parseDecisionTreeModel({ tree: { t: 'l', v: 1 } })).toThrow(ModelSchemaError);
		expect(() => parseDecisionTreeModel({ meta: { version: 'x', features: [] }, tree: { t: 'l', v: 1 } })).toThrow(
			'Model meta.features must list the input columns'
		);
	});

	it('rejects unsupported operators', () => {
		expect(() =>
			parseDecisionTreeModel({
				meta: twoFeatureModel.meta,
				tree: { t: 'n', f: 'mood_score', v: 1, operator: '==', l: { t: 'l', v: 0 }, r: { t: 'l', v: 1 } },
			})
		).toThrow('Unsupported operator == at tree');
	});
});

describe('DecisionTreeClassifier', () => {
	const classifier = new DecisionTreeClassifier(twoFeatureModel);

	it('sends values equal to the threshold left by default', () => {
		expect(classifier.predict(Float32Array.from([4.5, 8]))).toBe(1);
		expect(classifier.predict(Float32Array.from([4.6, 8]))).toBe(0);
		expect(classifier.predict(Float32Array.from([4.6, 4]))).toBe(1);
	});

	it('honours an explicit operator', () => {
		// sleep_hours > 5 goes left
		expect(classifier.predict(Float32Array.from([6, 6]))).toBe(0);
		expect(classifier.predict(Float32Array.from([6, 5]))).toBe(1);
	});

	it('rejects vectors of the wrong width', () => {
		expect(() => classifier.predict(Float32Array.from([1, 2, 3]))).toThrow('Expected 2 features, got 3');
	});

	it('rejects NaN inputs', () => {
		expect(() => classifier.predict(Float32Array.from([Number.NaN, 1]))).toThrow('Feature "mood_score" is NaN');
	});

	it('refuses a split on a column missing from the metadata', () => {
		expect(
			() =>
				new DecisionTreeClassifier({
					meta: { version: 'tree_v2', features: ['mood_score'] },
					tree: { t: 'n', f: 'crowd_density', v: 0.5, l: { t: 'l', v: 0 }, r: { t: 'l', v: 1 } },
				})
		).toThrow('Model tree_v2 splits on "crowd_density", which is not in meta.features');
	});
});

describe('loadDecisionTreeClassifier', () => {
	it('loads the bundled artifact and matches the default layout', () => {
		const classifier = loadDecisionTreeClassifier(MODEL_PATH);
		const schema = createFeatureSchema(DEFAULT_CONFIG);

		expect(classifier.version).toBe('stress-dt-2024-01');
		expect(classifier.featureNames).toEqual(schema.columns);
		expect(() => assertClassifierMatchesSchema(classifier, schema)).not.toThrow();
	});

	it('wraps a missing file in ModelSchemaError', () => {
		expect(() => loadDecisionTreeClassifier('/nonexistent/model.json')).toThrow(ModelSchemaError);
	});
});

describe('assertClassifierMatchesSchema', () => {
	const schema = createFeatureSchema(DEFAULT_CONFIG);

	it('fails on a width mismatch', () => {
		const narrow = stubClassifier(() => 0, schema.columns.slice(0, 12));
		expect(() => assertClassifierMatchesSchema(narrow, schema)).toThrow(
			'Classifier test-model expects 12 input columns, configured layout (vocabulary 2024-01) has 13'
		);
	});

	it('fails on a column order mismatch', () => {
		const reversed = stubClassifier(() => 0, [...schema.columns].reverse());
		expect(() => assertClassifierMatchesSchema(reversed, schema)).toThrow(
			'Classifier test-model column 0 is "location_id_105", configured layout has "temperature_celsius"'
		);
	});
});
