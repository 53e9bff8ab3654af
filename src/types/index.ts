/** Exact decimal kept as its canonical text form, e.g. "57.25" */
export type DecimalString = string;

export type Prediction = 0 | 1;

/**
 * One validated row of a batch.
 *
 * Numerical feature cells stay as raw text; they are parsed per row by the
 * feature projector so a malformed cell only costs that row.
 */
export interface Reading {
	rowIndex: number;
	locationId: number;
	timestamp: string; // YYYY-MM-DD HH:MM:SS
	stressLevel: DecimalString;
	stressScore: number;
	features: Record<string, string>;
}

export interface RejectedRow {
	rowIndex: number;
	reason: string;
}

export interface ConfirmedReading {
	reading: Reading;
	prediction: Prediction;
}

export type RowStage = 'featurize' | 'inference';

export interface RowFailure {
	rowIndex: number;
	stage: RowStage;
	error: string;
}

/**
 * Persisted alert item. Attribute names are the table's wire names.
 */
export interface AlertItem {
	PK: string;
	SK: string;
	UserID: string;
	Timestamp: string;
	SourceFile: string;
	LocationID: number;
	OriginalStressLevel: DecimalString;
	PredictedStressLabel: Prediction;
	SleepHours: DecimalString;
	MoodScore: DecimalString;
	NoiseLevelDB: DecimalString;
}

export interface WriteFailure {
	sortKey: string;
	rowIndex: number;
	error: string;
}

export interface AlertResponseItem {
	record_id: string;
	stress_score: number;
	timestamp: string | null;
}

export interface TraceEntry {
	timestamp: number;
	stage: RunStage;
	message: string;
	data: Record<string, unknown>;
}

export type RunStage =
	| 'STARTED'
	| 'LOADING'
	| 'FILTERED'
	| 'INFERRING'
	| 'STORING'
	| 'ERRORED'
	| 'FINISHED';

export type RunStatus = 'completed' | 'halted' | 'errored';

export type HaltReason = 'load_failed' | 'no_candidates';

export interface RunOutcome {
	runId: string;
	sourceFile: string;
	status: RunStatus;
	haltReason?: HaltReason;
	candidates: number;
	rejectedRows: number;
	confirmed: number;
	inserted: number;
	rowFailures: RowFailure[];
	writeFailures: WriteFailure[];
	error?: string;
	trace: TraceEntry[];
}
