import { defineConfig } from 'vitest/config'

export default defineConfig({
	test: {
		projects: ['packages/*'],
		coverage: {
			exclude: [
				'**/coverage/**',
				'**/dist/**',
				'**/vitest.*',
				'**/*.test.ts',
			],
		},
	},
})
