/**
 * Pipeline orchestrator
 *
 * Runs one batch through load → filter → infer → store under a single
 * RunTrace:
 *
 *   STARTED → LOADING → FILTERED → INFERRING → STORING → FINISHED
 *
 * A load failure or an empty candidate set ends the run early without an
 * error. Any unexpected exception moves the run to ERRORED; it still reaches
 * FINISHED and the trace is always flushed.
 */

import { randomUUID } from 'node:crypto';
import { basename } from 'node:path';
import { BatchLoadError } from '../errors';
import { logger } from '../logger';
import type { Classifier } from '../models/classifier';
import { loadAndFilterBatch, type FilteredBatch } from '../pipeline/batch-filter';
import { runInference } from '../pipeline/inference-runner';
import type { AlertStore } from '../storage/alert-store';
import type { RunOutcome } from '../types';
import type { FeatureSchema } from '../utils/feature-vector';
import { RunTrace, type Clock } from './run-trace';

export interface OrchestratorDeps {
	classifier: Classifier;
	schema: FeatureSchema;
	store: AlertStore;
	threshold: number;
}

export interface OrchestratorOptions {
	generateRunId?: () => string;
	clock?: Clock;
}

export class Orchestrator {
	private readonly generateRunId: () => string;

	constructor(
		private readonly deps: OrchestratorDeps,
		private readonly options: OrchestratorOptions = {}
	) {
		this.generateRunId = options.generateRunId ?? randomUUID;
	}

	async run(filePath: string): Promise<RunOutcome> {
		const trace = new RunTrace(this.generateRunId(), this.options.clock);
		const outcome: RunOutcome = {
			runId: trace.runId,
			sourceFile: basename(filePath),
			status: 'completed',
			candidates: 0,
			rejectedRows: 0,
			confirmed: 0,
			inserted: 0,
			rowFailures: [],
			writeFailures: [],
			trace: [],
		};
		let finalMessage = 'Agent run finished.';

		trace.log('STARTED', 'Agent run started.', { file_path: filePath });

		try {
			trace.log('LOADING', 'Initiating action: load and filter data.', {
				file_path: filePath,
				threshold: this.deps.threshold,
			});

			let batch: FilteredBatch;
			try {
				batch = loadAndFilterBatch(filePath, {
					threshold: this.deps.threshold,
					numericalFeatures: this.deps.schema.numerical,
				});
			} catch (error) {
				if (!(error instanceof BatchLoadError)) throw error;
				outcome.status = 'halted';
				outcome.haltReason = 'load_failed';
				outcome.error = error.message;
				finalMessage = 'Observation: data loading failed. Halting run.';
				return outcome;
			}

			outcome.candidates = batch.candidates.length;
			outcome.rejectedRows = batch.rejectedRows.length;
			trace.log('FILTERED', 'Observation: data loaded and filtered.', {
				total_rows: batch.totalRows,
				rejected_rows: batch.rejectedRows.length,
				potential_records: batch.candidates.length,
			});

			if (batch.candidates.length === 0) {
				outcome.status = 'halted';
				outcome.haltReason = 'no_candidates';
				finalMessage = 'Observation: no potential high-stress readings after filtering. Halting run.';
				return outcome;
			}

			trace.log('INFERRING', 'Initiating action: run model inference.', {
				candidates: batch.candidates.length,
				model_version: this.deps.classifier.version,
			});
			const inference = runInference(batch.candidates, this.deps.schema, this.deps.classifier);
			outcome.confirmed = inference.confirmed.length;
			outcome.rowFailures = inference.failures;

			if (inference.confirmed.length === 0) {
				finalMessage = 'Observation: no high-stress predictions to store.';
				return outcome;
			}

			trace.log('STORING', 'Observation: model inference complete. Initiating action: store predictions.', {
				attempted: inference.attempted,
				high_stress_predictions: inference.confirmed.length,
				row_failures: inference.failures.length,
			});
			const written = await this.deps.store.writeAlerts(inference.confirmed, batch.sourceFile);
			outcome.inserted = written.inserted;
			outcome.writeFailures = written.failures;
			finalMessage = 'Observation: storage complete.';
			return outcome;
		} catch (error) {
			const message = error instanceof Error ? error.message : String(error);
			outcome.status = 'errored';
			outcome.error = message;
			trace.log('ERRORED', 'An unexpected error occurred during the run.', { error: message });
			logger.error({
				event: 'run_failed',
				run_id: trace.runId,
				file_path: filePath,
				error: message,
			}, 'Pipeline run failed');
			finalMessage = 'Agent run finished with an error.';
			return outcome;
		} finally {
			trace.log('FINISHED', finalMessage, {
				status: outcome.status,
				halt_reason: outcome.haltReason,
				candidates: outcome.candidates,
				rejected_rows: outcome.rejectedRows,
				confirmed: outcome.confirmed,
				items_inserted: outcome.inserted,
				row_failures: outcome.rowFailures.length,
				write_failures: outcome.writeFailures.length,
				error: outcome.error,
			});
			outcome.trace = trace.snapshot();
			trace.flush(outcome.sourceFile, outcome.status);
		}
	}
}
