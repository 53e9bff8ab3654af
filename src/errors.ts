/**
 * Pipeline error types
 *
 * Row- and record-level failures are caught and recorded by the stage that
 * raised them. Batch- and request-level failures end the invocation with a
 * status instead of an exception.
 */

/** The batch file could not be read or parsed as a whole. */
export class BatchLoadError extends Error {
	constructor(
		message: string,
		public readonly filePath: string,
	) {
		super(message);
		this.name = 'BatchLoadError';
	}
}

/** One row could not be featurized or classified. */
export class RowProcessingError extends Error {
	constructor(
		message: string,
		public readonly rowIndex: number,
	) {
		super(message);
		this.name = 'RowProcessingError';
	}
}

/** The classifier artifact does not match the configured feature layout. */
export class ModelSchemaError extends Error {
	constructor(message: string) {
		super(message);
		this.name = 'ModelSchemaError';
	}
}

/** A query request is missing a required parameter. */
export class QueryValidationError extends Error {
	constructor(
		message: string,
		public readonly parameter: string,
	) {
		super(message);
		this.name = 'QueryValidationError';
	}
}
