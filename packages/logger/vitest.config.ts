import { defineConfig } from 'vitest/config'

export default defineConfig({
	test: {
		name: 'logger',
		include: ['src/**/*.test.ts'],
		environment: 'node',
	},
})
