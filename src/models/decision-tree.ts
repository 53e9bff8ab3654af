/**
 * JSON-backed decision tree classifier.
 *
 * The tree is trained offline, exported into a compact JSON structure and
 * evaluated in process, so inference needs no native runtime.
 *
 * Artifact shape:
 *   { "meta": { "version": "...", "features": [...] }, "tree": <node> }
 * The `{ meta, forest: [<node>] }` layout of a one-tree forest export is
 * accepted as well.
 */

import { readFileSync } from 'node:fs';
import { ModelSchemaError } from '../errors';
import { logger } from '../logger';
import type { Prediction } from '../types';
import type { Classifier } from './classifier';

// Minified JSON types (t=type, f=feature, v=value/threshold, l=left, r=right)
export type DecisionTreeLeaf = {
	t: 'l';
	v: Prediction;
	reason?: string;
};

export type DecisionTreeNode = {
	t: 'n';
	f: string;
	v: number;
	operator?: '<' | '<=' | '>' | '>='; // Defaults to <= (scikit-learn split convention)
	l: DecisionTree;
	r: DecisionTree;
};

export type DecisionTree = DecisionTreeLeaf | DecisionTreeNode;

export interface DecisionTreeModel {
	meta: {
		version: string;
		features: string[];
	};
	tree: DecisionTree;
}

// Absolute upper bound on tree depth to prevent runaway traversal
const ABSOLUTE_MAX_DEPTH = 50;

function isRecord(value: unknown): value is Record<string, unknown> {
	return value !== null && typeof value === 'object' && !Array.isArray(value);
}

function parseOperator(value: unknown, path: string): DecisionTreeNode['operator'] {
	switch (value) {
		case undefined:
			return undefined;
		case '<':
		case '<=':
		case '>':
		case '>=':
			return value;
		default:
			throw new ModelSchemaError(`Unsupported operator ${String(value)} at ${path}`);
	}
}

function parseNode(value: unknown, path: string, depth: number): DecisionTree {
	if (depth > ABSOLUTE_MAX_DEPTH) {
		throw new ModelSchemaError(`Tree deeper than ${ABSOLUTE_MAX_DEPTH} levels at ${path}`);
	}
	if (!isRecord(value)) {
		throw new ModelSchemaError(`Expected a tree node at ${path}`);
	}

	if (value.t === 'l') {
		const label = value.v;
		if (label !== 0 && label !== 1) {
			throw new ModelSchemaError(`Leaf at ${path} must predict 0 or 1, got ${String(label)}`);
		}
		return {
			t: 'l',
			v: label,
			reason: typeof value.reason === 'string' ? value.reason : undefined,
		};
	}

	if (value.t === 'n') {
		const feature = value.f;
		const threshold = value.v;
		if (typeof feature !== 'string' || typeof threshold !== 'number' || !Number.isFinite(threshold)) {
			throw new ModelSchemaError(`Split at ${path} needs a feature name and numeric threshold`);
		}
		return {
			t: 'n',
			f: feature,
			v: threshold,
			operator: parseOperator(value.operator, path),
			l: parseNode(value.l, `${path}.l`, depth + 1),
			r: parseNode(value.r, `${path}.r`, depth + 1),
		};
	}

	throw new ModelSchemaError(`Unknown node type at ${path}`);
}

/**
 * Validate a parsed JSON artifact and return a typed model.
 */
export function parseDecisionTreeModel(json: unknown): DecisionTreeModel {
	if (!isRecord(json) || !isRecord(json.meta)) {
		throw new ModelSchemaError('Model artifact must have a "meta" object');
	}

	const { version, features } = json.meta;
	if (typeof version !== 'string' || version === '') {
		throw new ModelSchemaError('Model meta.version must be a non-empty string');
	}
	if (!Array.isArray(features) || features.length === 0) {
		throw new ModelSchemaError('Model meta.features must list the input columns');
	}
	const featureNames: string[] = [];
	for (const name of features) {
		if (typeof name !== 'string') {
			throw new ModelSchemaError('Model meta.features must contain only column names');
		}
		featureNames.push(name);
	}

	// Handle both the single tree layout and a one-tree forest export
	let root: unknown = json.tree;
	if (root === undefined && Array.isArray(json.forest)) {
		if (json.forest.length !== 1) {
			throw new ModelSchemaError(`Expected a single tree, artifact has ${json.forest.length}`);
		}
		root = json.forest[0];
	}

	return {
		meta: {
			version,
			features: featureNames,
		},
		tree: parseNode(root, 'tree', 0),
	};
}

type CompiledNode =
	| { leaf: true; label: Prediction }
	| {
			leaf: false;
			index: number;
			threshold: number;
			operator: NonNullable<DecisionTreeNode['operator']>;
			left: CompiledNode;
			right: CompiledNode;
	  };

function compile(node: DecisionTree, columns: Map<string, number>, version: string): CompiledNode {
	if (node.t === 'l') {
		return { leaf: true, label: node.v };
	}

	const index = columns.get(node.f);
	if (index === undefined) {
		throw new ModelSchemaError(`Model ${version} splits on "${node.f}", which is not in meta.features`);
	}

	return {
		leaf: false,
		index,
		threshold: node.v,
		operator: node.operator ?? '<=',
		left: compile(node.l, columns, version),
		right: compile(node.r, columns, version),
	};
}

function goesLeft(value: number, threshold: number, operator: NonNullable<DecisionTreeNode['operator']>): boolean {
	switch (operator) {
		case '<':
			return value < threshold;
		case '>':
			return value > threshold;
		case '>=':
			return value >= threshold;
		case '<=':
		default:
			return value <= threshold;
	}
}

export class DecisionTreeClassifier implements Classifier {
	readonly version: string;
	readonly featureNames: readonly string[];
	private readonly root: CompiledNode;

	constructor(model: DecisionTreeModel) {
		this.version = model.meta.version;
		this.featureNames = Object.freeze([...model.meta.features]);

		const columns = new Map<string, number>();
		model.meta.features.forEach((name, index) => columns.set(name, index));
		this.root = compile(model.tree, columns, model.meta.version);
	}

	predict(vector: Float32Array): Prediction {
		if (vector.length !== this.featureNames.length) {
			throw new Error(`Expected ${this.featureNames.length} features, got ${vector.length}`);
		}

		let current = this.root;
		while (!current.leaf) {
			const value = vector[current.index];
			if (Number.isNaN(value)) {
				throw new Error(`Feature "${this.featureNames[current.index]}" is NaN`);
			}
			current = goesLeft(value, current.threshold, current.operator) ? current.left : current.right;
		}
		return current.label;
	}
}

/**
 * Load the classifier artifact from disk. Called once at startup; any problem
 * with the file is fatal for the process.
 */
export function loadDecisionTreeClassifier(path: string): DecisionTreeClassifier {
	let json: unknown;
	try {
		json = JSON.parse(readFileSync(path, 'utf8'));
	} catch (error) {
		throw new ModelSchemaError(
			`Could not read model artifact ${path}: ${error instanceof Error ? error.message : String(error)}`
		);
	}

	const classifier = new DecisionTreeClassifier(parseDecisionTreeModel(json));
	logger.info({
		event: 'model_loaded',
		path,
		model_version: classifier.version,
		input_width: classifier.featureNames.length,
	}, 'Loaded decision tree classifier');
	return classifier;
}
