import { defineProject } from 'vitest/config'

export default defineProject({
	test: {
		name: 'debug',
		include: ['src/**/*.test.ts'],
		environment: 'node',
	},
})
