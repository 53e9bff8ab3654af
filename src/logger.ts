/**
 * Structured logging with Pino
 *
 * One process-wide logger. Every entry carries an `event` field so pipeline
 * runs can be filtered in whatever sink collects stdout.
 */

import pino from 'pino';
import type { LogLevel } from './config/defaults';
import type { TraceEntry } from './types';

export const logger = pino({
	level: process.env.LOG_LEVEL || 'info',
	base: { service: 'campus-stress-alerts' },
	timestamp: pino.stdTimeFunctions.isoTime,
});

export function setLogLevel(level: LogLevel): void {
	logger.level = level;
}

/**
 * Emit a finished run trace as a single structured entry.
 */
export function logRunTrace(data: {
	runId: string;
	sourceFile: string;
	status: string;
	entries: TraceEntry[];
}): void {
	logger.info({
		event: 'run_trace',
		run_id: data.runId,
		source_file: data.sourceFile,
		status: data.status,
		entry_count: data.entries.length,
		trace: data.entries,
	}, 'Pipeline run trace');
}

export function logError(error: unknown, context: string): void {
	logger.error({
		event: 'error',
		context,
		error: error instanceof Error ? {
			message: error.message,
			name: error.name,
			stack: error.stack,
		} : { message: String(error) },
	}, 'Unhandled error');
}
