import { describe, it, expect } from 'vitest';
import ingest from '../../../cli/commands/pipeline/ingest';

describe('ingest command', () => {
	it('requires --key alongside --bucket', async () => {
		await expect(ingest(['--bucket', 'uploads'])).rejects.toThrow('Missing required option: --key');
	});

	it('requires --bucket alongside --key', async () => {
		await expect(ingest(['--key', 'week-10.csv'])).rejects.toThrow('Missing required option: --bucket');
	});
});
