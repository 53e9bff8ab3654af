/**
 * Object store client
 *
 * Queue notifications reference uploaded batches by bucket and key. The
 * pipeline only ever needs one thing from the store: a local copy of the
 * object it can hand to the batch reader.
 */

import { copyFile, mkdir } from 'node:fs/promises';
import { basename, join, relative, resolve, isAbsolute } from 'node:path';
import { logger } from '../logger';

export interface ObjectStore {
	/** Copy `bucket/key` into the download directory and return the local path */
	download(bucket: string, key: string): Promise<string>;
}

/**
 * Buckets are directories under `rootDir`; keys are paths inside them.
 */
export class LocalObjectStore implements ObjectStore {
	private readonly rootDir: string;
	private readonly downloadDir: string;

	constructor(rootDir: string, downloadDir: string) {
		this.rootDir = resolve(rootDir);
		this.downloadDir = resolve(downloadDir);
	}

	private resolveObject(bucket: string, key: string): string {
		const bucketDir = resolve(this.rootDir, bucket);
		const objectPath = resolve(bucketDir, key);
		const inside = relative(bucketDir, objectPath);

		if (bucket.length === 0 || relative(this.rootDir, bucketDir).startsWith('..')) {
			throw new Error(`Invalid bucket name: "${bucket}"`);
		}
		if (inside.length === 0 || inside.startsWith('..') || isAbsolute(inside)) {
			throw new Error(`Object key escapes its bucket: "${key}"`);
		}
		return objectPath;
	}

	async download(bucket: string, key: string): Promise<string> {
		const source = this.resolveObject(bucket, key);
		const target = join(this.downloadDir, basename(key));

		await mkdir(this.downloadDir, { recursive: true });
		await copyFile(source, target);

		logger.info({
			event: 'object_downloaded',
			bucket,
			key,
			local_path: target,
		}, `Downloaded s3://${bucket}/${key}`);

		return target;
	}
}
