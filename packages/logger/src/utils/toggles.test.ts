import { afterEach, describe, expect, it } from 'vitest'
import {
	flattenToggleTree,
	isLoggerEnabled,
	resetLoggerToggles,
	setLoggerEnabled,
} from './toggles'

describe('logger toggles', () => {
	afterEach(() => {
		resetLoggerToggles()
	})

	it('flattens a tree into full tags', () => {
		expect(
			flattenToggleTree({
				lexer: { $self: true, compiler: false, registry: { alias: false } },
			})
		).toEqual(
			new Map([
				['lexer', true],
				['lexer:compiler', false],
				['lexer:registry:alias', false],
			])
		)
	})

	it('seeds switches from the default tree', () => {
		expect(isLoggerEnabled('lexer')).toBe(true)
		expect(isLoggerEnabled('lexer:compiler')).toBe(true)
	})

	it('unseen tags follow their closest ancestor', () => {
		resetLoggerToggles({ lexer: { $self: false, registry: true } })

		expect(isLoggerEnabled('lexer:engine')).toBe(false)
		expect(isLoggerEnabled('lexer:registry:alias')).toBe(true)
		expect(isLoggerEnabled('other')).toBe(true)
	})

	it('switching a tag switches its subtree', () => {
		setLoggerEnabled('lexer', false)

		expect(isLoggerEnabled('lexer:compiler')).toBe(false)
		expect(isLoggerEnabled('lexer:registry')).toBe(false)
	})

	it('a child can be switched back on under a disabled parent', () => {
		setLoggerEnabled('lexer', false)
		setLoggerEnabled(' lexer:registry ', true)

		expect(isLoggerEnabled('lexer')).toBe(false)
		expect(isLoggerEnabled('lexer:registry')).toBe(true)
		expect(isLoggerEnabled('lexer:compiler')).toBe(false)
	})

	it('rejects empty tags', () => {
		expect(() => setLoggerEnabled('  ', true)).toThrow(
			'Logger tag cannot be empty.'
		)
		expect(() => isLoggerEnabled('')).toThrow('Logger tag cannot be empty.')
	})
})
