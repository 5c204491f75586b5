import { defineProject } from 'vitest/config'

export default defineProject({
	test: {
		name: 'type',
		include: ['src/**/*.test.ts'],
		environment: 'node',
	},
})
