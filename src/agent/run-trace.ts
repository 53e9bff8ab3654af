/**
 * Ordered record of what one pipeline run did and observed.
 *
 * Created at the start of a run, appended to by every stage and flushed once
 * at the end, whether the run succeeded or not. Never persisted.
 */

import { performance } from 'node:perf_hooks';
import { logger, logRunTrace } from '../logger';
import type { RunStage, TraceEntry } from '../types';

export type Clock = () => number;

/** Epoch milliseconds that never go backwards within the process */
export const monotonicClock: Clock = () => performance.timeOrigin + performance.now();

export class RunTrace {
	private readonly entries: TraceEntry[] = [];
	private lastTimestamp = 0;
	private stage: RunStage = 'STARTED';

	constructor(
		readonly runId: string,
		private readonly clock: Clock = monotonicClock
	) {}

	get currentStage(): RunStage {
		return this.stage;
	}

	/**
	 * Append one entry and move the run to `stage`.
	 */
	log(stage: RunStage, message: string, data: Record<string, unknown> = {}): void {
		// Clamp so entries stay ordered even with an injected clock
		const timestamp = Math.max(this.clock(), this.lastTimestamp);
		this.lastTimestamp = timestamp;
		this.stage = stage;
		this.entries.push({ timestamp, stage, message, data });
		logger.debug({ event: 'run_trace_entry', run_id: this.runId, stage, ...data }, message);
	}

	snapshot(): TraceEntry[] {
		return this.entries.map((entry) => ({ ...entry, data: { ...entry.data } }));
	}

	flush(sourceFile: string, status: string): void {
		logRunTrace({ runId: this.runId, sourceFile, status, entries: this.snapshot() });
	}
}
