import { defineConfig } from 'vitest/config';

export default defineConfig({
	test: {
		environment: 'node',
		include: ['tests/**/*.test.ts'],
		// Pipeline logs go through pino; keep test output readable
		env: {
			LOG_LEVEL: 'silent',
		},
	},
});
