/**
 * Alerts API Routes
 *
 * Read-only access to stored alerts, one source file at a time.
 */

import { Hono } from 'hono';
import { queryAlerts } from '../api/alerts';
import type { AppVariables } from '../index';

const alerts = new Hono<{ Variables: AppVariables }>();

/**
 * GET /alerts?source_file=<name>
 * Every alert stored for one batch file
 */
alerts.get('/', async (c) => {
	const result = await queryAlerts({ source_file: c.req.query('source_file') }, c.get('app').store);
	return c.json(result.body, result.status);
});

export default alerts;
