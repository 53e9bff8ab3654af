import { Hono } from 'hono';
import type { AppContext } from './context';
import { logError } from './logger';
import alertRoutes from './routes/alerts';
import pkg from '../package.json';

export type AppVariables = {
	app: AppContext;
};

/**
 * Campus stress alerts HTTP API
 *
 * - GET /alerts?source_file=<name> (alerts stored for one batch)
 * - GET /health (model and vocabulary versions)
 *
 * Ingestion does not go through HTTP; see `handleEvent` and the CLI.
 */
export function createApp(ctx: AppContext): Hono<{ Variables: AppVariables }> {
	const app = new Hono<{ Variables: AppVariables }>();

	app.use('*', async (c, next) => {
		c.set('app', ctx);
		await next();
	});

	app.route('/alerts', alertRoutes);

	app.get('/health', (c) => {
		return c.json({
			status: 'ok',
			version: pkg.version,
			modelVersion: ctx.classifier.version,
			vocabularyVersion: ctx.schema.vocabularyVersion,
		});
	});

	app.notFound((c) => c.json({ error: 'Not Found' }, 404));

	app.onError((error, c) => {
		logError(error, `${c.req.method} ${c.req.path}`);
		return c.json({ error: 'Internal Server Error' }, 500);
	});

	return app;
}
