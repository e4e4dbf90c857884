import { defineConfig } from 'vitest/config';

export default defineConfig({
	test: {
		globals: true,
		environment: 'node',
		testTimeout: 10_000,
		include: ['test/**/*.ts'],
		exclude: ['test/helpers/**', '**/node_modules/**', '**/.{idea,git,cache,output,temp}/**']
	}
});
