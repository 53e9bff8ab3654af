/**
 * Node HTTP server for the alerts API.
 */

import { serve } from '@hono/node-server';
import type { AppContext } from './context';
import { createApp } from './index';
import { logger } from './logger';

export function startServer(ctx: AppContext, port = ctx.config.server.port): ReturnType<typeof serve> {
	const app = createApp(ctx);

	const server = serve({ fetch: app.fetch, port }, (info) => {
		logger.info({
			event: 'server_started',
			port: info.port,
			model_version: ctx.classifier.version,
		}, `Listening on http://localhost:${info.port}`);
	});

	const shutdown = (signal: string) => {
		logger.info({ event: 'server_stopping', signal }, 'Shutting down');
		server.close(() => {
			ctx.close();
			process.exit(0);
		});
	};
	process.once('SIGINT', () => shutdown('SIGINT'));
	process.once('SIGTERM', () => shutdown('SIGTERM'));

	return server;
}
