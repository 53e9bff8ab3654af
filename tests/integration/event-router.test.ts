import { existsSync, mkdirSync, mkdtempSync, rmSync } from 'node:fs';
import { tmpdir } from 'node:os';
import { join } from 'node:path';
import { describe, it, expect, beforeEach, afterEach } from 'vitest';
import { createContext, type AppContext } from '../../src/context';
import { ModelSchemaError } from '../../src/errors';
import { handleEvent } from '../../src/handler';
import { testConfig } from '../fixtures/context';
import { row, writeBatch } from '../fixtures/readings';

const STRESSED = { mood_score: '3', sleep_hours: '5' };

function queueEvent(...bodies: Array<string | undefined>) {
	return {
		Records: bodies.map((body, index) => ({ eventSource: 'aws:sqs', messageId: `m-${index + 1}`, body })),
	};
}

function s3Notification(bucket: string, key: string): string {
	return JSON.stringify({ Records: [{ s3: { bucket: { name: bucket }, object: { key } } }] });
}

function alertsRequest(queryStringParameters: Record<string, string> | null, path = '/alerts', httpMethod = 'GET') {
	return { httpMethod, path, queryStringParameters };
}

describe('handleEvent', () => {
	let dir: string;
	let ctx: AppContext;

	beforeEach(() => {
		dir = mkdtempSync(join(tmpdir(), 'event-router-'));
		mkdirSync(join(dir, 'buckets', 'uploads'), { recursive: true });
		ctx = createContext(testConfig(dir));
	});

	afterEach(() => {
		ctx.close();
		rmSync(dir, { recursive: true, force: true });
	});

	it('ingests queued uploads and isolates bad records', async () => {
		writeBatch(join(dir, 'buckets', 'uploads'), 'week-10.csv', [row({ stress_level: '50', ...STRESSED })]);

		const response = await handleEvent(
			queueEvent(
				'not json',
				s3Notification('uploads', 'missing.csv'),
				s3Notification('uploads', 'week-10.csv'),
				undefined
			),
			ctx
		);

		expect(response.statusCode).toBe(200);
		expect(response.body).toBe('Processing complete.');
		expect(response.runs?.map((run) => [run.sourceFile, run.status, run.inserted])).toEqual([
			['week-10.csv', 'completed', 1],
		]);
	});

	it('serves alerts stored by an earlier ingest', async () => {
		writeBatch(join(dir, 'buckets', 'uploads'), 'week-10.csv', [row({ stress_level: '57.75', ...STRESSED })]);
		await handleEvent(queueEvent(s3Notification('uploads', 'week-10.csv')), ctx);

		const response = await handleEvent(alertsRequest({ source_file: 'week-10.csv' }), ctx);

		expect(response.statusCode).toBe(200);
		expect(response.headers).toEqual({ 'Content-Type': 'application/json' });
		expect(JSON.parse(response.body)).toEqual({
			alerts: [{ record_id: 'week-10.csv', stress_score: 57, timestamp: '2024-03-04T09:00:00Z' }],
		});
	});

	it('rejects an alerts request without a source file', async () => {
		const response = await handleEvent(alertsRequest(null), ctx);

		expect(response.statusCode).toBe(400);
		expect(JSON.parse(response.body)).toEqual({ error: "The 'source_file' query parameter is required." });
	});

	it('answers unknown API routes with 404', async () => {
		const wrongPath = await handleEvent(alertsRequest({ source_file: 'a.csv' }, '/alert'), ctx);
		const wrongMethod = await handleEvent(alertsRequest({ source_file: 'a.csv' }, '/alerts', 'POST'), ctx);

		expect(wrongPath).toEqual({
			statusCode: 404,
			headers: { 'Content-Type': 'application/json' },
			body: '{"error":"Not Found"}',
		});
		expect(wrongMethod.statusCode).toBe(404);
	});

	it('runs the configured local batch', async () => {
		writeBatch(dir, 'local.csv', [row({ stress_level: '50', ...STRESSED }), row({ stress_level: '20' })]);

		const response = await handleEvent({ mode: 'local' }, ctx);

		expect(response.statusCode).toBe(200);
		expect(response.body).toBe('Local processing complete.');
		expect(response.runs?.[0]).toMatchObject({ sourceFile: 'local.csv', status: 'completed', inserted: 1 });
	});

	it('rejects events it does not recognise', async () => {
		expect(await handleEvent({ source: 'cron' }, ctx)).toEqual({
			statusCode: 400,
			body: 'Unrecognized event source.',
		});
	});
});

describe('createContext', () => {
	let dir: string;

	beforeEach(() => {
		dir = mkdtempSync(join(tmpdir(), 'context-'));
	});

	afterEach(() => {
		rmSync(dir, { recursive: true, force: true });
	});

	it('fails fast when the model artifact is missing', () => {
		expect(() => createContext(testConfig(dir, { model: { path: join(dir, 'absent.json') } }))).toThrow(
			ModelSchemaError
		);
	});

	it('fails fast when the vocabulary does not match the model', () => {
		const config = testConfig(dir, {
			features: { locationVocabulary: { version: '2024-02', categories: [101, 102, 103, 104, 105, 106] } },
		});

		expect(() => createContext(config)).toThrow(
			'Classifier stress-dt-2024-01 expects 13 input columns, configured layout (vocabulary 2024-02) has 14'
		);
	});

	it('creates the database directory for a file-backed table', () => {
		const ctx = createContext(testConfig(dir, { storage: { databasePath: join(dir, 'nested', 'alerts.db') } }));
		ctx.close();

		expect(existsSync(join(dir, 'nested', 'alerts.db'))).toBe(true);
	});
});
