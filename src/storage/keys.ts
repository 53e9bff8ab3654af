/**
 * Composite key scheme for the alert table.
 *
 * All alerts from one batch share a partition, so a batch's alerts are read
 * with a single exact-match query, ordered by location and then alert id.
 */

export const PARTITION_PREFIX = 'SOURCEFILE#';

export function partitionKey(sourceFile: string): string {
	return `${PARTITION_PREFIX}${sourceFile}`;
}

export function sortKey(locationId: number, alertId: string): string {
	return `LOCATION#${locationId}#USERID#${alertId}`;
}
