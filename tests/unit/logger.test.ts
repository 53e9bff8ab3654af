import { describe, it, expect, vi, beforeEach, afterEach, type MockInstance } from 'vitest';
import { logger, logError, logRunTrace, setLogLevel } from '../../src/logger';

describe('Logger', () => {
	let infoSpy: MockInstance;
	let errorSpy: MockInstance;

	beforeEach(() => {
		infoSpy = vi.spyOn(logger, 'info').mockImplementation(() => undefined);
		errorSpy = vi.spyOn(logger, 'error').mockImplementation(() => undefined);
	});

	afterEach(() => {
		infoSpy.mockRestore();
		errorSpy.mockRestore();
		setLogLevel('silent');
	});

	describe('logger instance', () => {
		it('should be a Pino logger instance', () => {
			expect(typeof logger.info).toBe('function');
			expect(typeof logger.child).toBe('function');
		});

		it('should follow the configured level', () => {
			setLogLevel('warn');
			expect(logger.level).toBe('warn');
			expect(logger.isLevelEnabled('info')).toBe(false);
			expect(logger.isLevelEnabled('error')).toBe(true);
		});
	});

	describe('logRunTrace', () => {
		it('should emit one run_trace entry with every trace entry', () => {
			const entries = [
				{ timestamp: 1, stage: 'STARTED' as const, message: 'Agent run started.', data: {} },
				{ timestamp: 2, stage: 'FINISHED' as const, message: 'Agent run finished.', data: { items_inserted: 0 } },
			];

			logRunTrace({ runId: 'run-1', sourceFile: 'week-10.csv', status: 'halted', entries });

			expect(infoSpy).toHaveBeenCalledWith(
				{
					event: 'run_trace',
					run_id: 'run-1',
					source_file: 'week-10.csv',
					status: 'halted',
					entry_count: 2,
					trace: entries,
				},
				'Pipeline run trace'
			);
		});
	});

	describe('logError', () => {
		it('should log Error instances with name, message and stack', () => {
			const error = new TypeError('bad input');

			logError(error, 'GET /alerts');

			expect(errorSpy).toHaveBeenCalledWith(
				{
					event: 'error',
					context: 'GET /alerts',
					error: { message: 'bad input', name: 'TypeError', stack: error.stack },
				},
				'Unhandled error'
			);
		});

		it('should stringify non-Error values', () => {
			logError('plain failure', 'cli');

			expect(errorSpy).toHaveBeenCalledWith(
				{ event: 'error', context: 'cli', error: { message: 'plain failure' } },
				'Unhandled error'
			);
		});
	});
});
