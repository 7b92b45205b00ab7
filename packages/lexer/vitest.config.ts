import { defineConfig } from 'vitest/config'

export default defineConfig({
	test: {
		name: 'lexer',
		include: ['src/**/*.test.ts'],
		environment: 'node',
	},
})
