/**
 * Event router
 *
 * One entry point for every way the pipeline is invoked. An inbound event is
 * matched against the known shapes in a fixed order (API request, queue
 * delivery, local run) and dispatched; anything else is rejected.
 */

import type { AppContext } from './context';
import { queryAlerts } from './api/alerts';
import { logger } from './logger';
import type { RunOutcome } from './types';

export interface ApiRequestEvent {
	httpMethod: string;
	path: string;
	queryStringParameters?: Record<string, string | undefined> | null;
}

export interface QueueRecord {
	eventSource: string;
	messageId?: string;
	body?: string;
}

export interface ObjectReference {
	bucket: string;
	key: string;
}

export type ClassifiedEvent =
	| { kind: 'api'; request: ApiRequestEvent }
	| { kind: 'queue'; records: QueueRecord[] }
	| { kind: 'local' }
	| { kind: 'unrecognized' };

export interface EventResponse {
	statusCode: number;
	headers?: Record<string, string>;
	body: string;
	/** One outcome per ingested file, for ingest events */
	runs?: RunOutcome[];
}

const QUEUE_EVENT_SOURCE = 'aws:sqs';
const JSON_HEADERS = { 'Content-Type': 'application/json' };

function isRecord(value: unknown): value is Record<string, unknown> {
	return value !== null && typeof value === 'object' && !Array.isArray(value);
}

function toQueryParameters(value: unknown): Record<string, string | undefined> | null {
	if (!isRecord(value)) return null;
	const params: Record<string, string | undefined> = {};
	for (const [key, entry] of Object.entries(value)) {
		if (typeof entry === 'string') params[key] = entry;
	}
	return params;
}

function toQueueRecord(value: unknown): QueueRecord | null {
	if (!isRecord(value)) return null;
	const { eventSource, messageId, body } = value;
	if (typeof eventSource !== 'string') return null;
	return {
		eventSource,
		messageId: typeof messageId === 'string' ? messageId : undefined,
		body: typeof body === 'string' ? body : undefined,
	};
}

/**
 * Decide which path an event takes. `runningLocally` turns every event that
 * is neither an API request nor a queue delivery into a local run.
 */
export function classifyEvent(event: unknown, runningLocally = false): ClassifiedEvent {
	if (isRecord(event)) {
		if ('httpMethod' in event) {
			const { httpMethod, path, queryStringParameters } = event;
			return {
				kind: 'api',
				request: {
					httpMethod: typeof httpMethod === 'string' ? httpMethod : '',
					path: typeof path === 'string' ? path : '',
					queryStringParameters: toQueryParameters(queryStringParameters),
				},
			};
		}

		const { Records } = event;
		if (Array.isArray(Records) && Records.length > 0) {
			const first = toQueueRecord(Records[0]);
			if (first?.eventSource === QUEUE_EVENT_SOURCE) {
				const records: QueueRecord[] = [];
				for (const raw of Records) {
					records.push(toQueueRecord(raw) ?? { eventSource: QUEUE_EVENT_SOURCE });
				}
				return { kind: 'queue', records };
			}
		}

		if (event.mode === 'local') {
			return { kind: 'local' };
		}
	}

	return runningLocally ? { kind: 'local' } : { kind: 'unrecognized' };
}

/**
 * Object references carried by one queue message body. Keys arrive
 * URL-encoded, with `+` for spaces.
 */
export function parseObjectNotification(body: string | undefined): ObjectReference[] {
	if (body === undefined) {
		throw new Error('Queue record has no body');
	}

	const notification: unknown = JSON.parse(body);
	if (!isRecord(notification) || !Array.isArray(notification.Records)) {
		throw new Error('Queue record body is not an object notification');
	}

	const references: ObjectReference[] = [];
	for (const entry of notification.Records) {
		const s3 = isRecord(entry) ? entry.s3 : undefined;
		const bucket = isRecord(s3) && isRecord(s3.bucket) ? s3.bucket.name : undefined;
		const key = isRecord(s3) && isRecord(s3.object) ? s3.object.key : undefined;
		if (typeof bucket !== 'string' || typeof key !== 'string') {
			throw new Error('Object notification entry is missing bucket name or object key');
		}
		references.push({ bucket, key: decodeURIComponent(key.replace(/\+/g, ' ')) });
	}
	return references;
}

async function handleApi(request: ApiRequestEvent, ctx: AppContext): Promise<EventResponse> {
	if (request.httpMethod !== 'GET' || request.path !== '/alerts') {
		return { statusCode: 404, headers: JSON_HEADERS, body: JSON.stringify({ error: 'Not Found' }) };
	}

	const result = await queryAlerts(request.queryStringParameters, ctx.store);
	return { statusCode: result.status, headers: JSON_HEADERS, body: JSON.stringify(result.body) };
}

async function handleQueue(records: QueueRecord[], ctx: AppContext): Promise<EventResponse> {
	const runs: RunOutcome[] = [];

	for (const [index, record] of records.entries()) {
		try {
			for (const { bucket, key } of parseObjectNotification(record.body)) {
				const localPath = await ctx.objectStore.download(bucket, key);
				runs.push(await ctx.orchestrator.run(localPath));
			}
		} catch (error) {
			logger.error({
				event: 'queue_record_failed',
				record_index: index,
				message_id: record.messageId,
				error: error instanceof Error ? error.message : String(error),
			}, 'Failed to process queue record');
		}
	}

	return { statusCode: 200, body: 'Processing complete.', runs };
}

async function handleLocal(ctx: AppContext): Promise<EventResponse> {
	logger.info({
		event: 'local_run',
		file_path: ctx.config.local.csvPath,
	}, 'Running in local mode');
	const outcome = await ctx.orchestrator.run(ctx.config.local.csvPath);
	return { statusCode: 200, body: 'Local processing complete.', runs: [outcome] };
}

export async function handleEvent(event: unknown, ctx: AppContext): Promise<EventResponse> {
	const classified = classifyEvent(event, ctx.config.local.runningLocally);
	logger.debug({ event: 'event_received', kind: classified.kind }, `Handling ${classified.kind} event`);

	switch (classified.kind) {
		case 'api':
			return handleApi(classified.request, ctx);
		case 'queue':
			return handleQueue(classified.records, ctx);
		case 'local':
			return handleLocal(ctx);
		case 'unrecognized':
			logger.warn({ event: 'event_unrecognized' }, 'Unrecognized event source');
			return { statusCode: 400, body: 'Unrecognized event source.' };
	}
}
