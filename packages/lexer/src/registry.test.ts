import { loggers } from '@tokenflow/logger'
import { afterEach, describe, expect, test, vi } from 'vitest'
import { LexerNotFoundError } from './errors'
import { defineGrammar, rule } from './grammar'
import type { LexerDefinition } from './lexer'
import {
	findLexerDefinition,
	getLexerByName,
	getLexerForFilename,
	guessLexer,
	listLexers,
	registerLexer,
	unregisterLexer,
} from './registry'
import { Text } from './tokenType'

const customLexer: LexerDefinition = {
	name: 'custom',
	aliases: ['cst'],
	filenames: ['*.cst'],
	grammar: defineGrammar({ name: 'custom', states: { root: [rule('.+', Text)] } }),
}

describe('registry', () => {
	afterEach(() => {
		vi.restoreAllMocks()
	})

	test('registers the bundled lexers', () => {
		expect(listLexers().map(definition => definition.name)).toEqual([
			'text',
			'json',
			'ini',
			'python',
		])
	})

	test('looks lexers up by alias, ignoring case', () => {
		expect(getLexerByName('JSON').name).toBe('json')
		expect(getLexerByName('cfg').name).toBe('ini')
		expect(getLexerByName(' plain ').name).toBe('text')
		expect(getLexerByName('py').name).toBe('python')
	})

	test('unknown aliases throw', () => {
		expect(() => getLexerByName('cobol')).toThrow(LexerNotFoundError)
		expect(() => getLexerByName('cobol')).toThrow('No lexer for alias "cobol"')
	})

	test('looks lexers up by filename', () => {
		expect(getLexerForFilename('/tmp/settings.json').name).toBe('json')
		expect(getLexerForFilename('C:\\conf\\app.ini').name).toBe('ini')
		expect(getLexerForFilename('notes.txt').name).toBe('text')
		expect(getLexerForFilename('src/main.py').name).toBe('python')
		expect(() => getLexerForFilename('image.png')).toThrow(LexerNotFoundError)
	})

	test('passes options to the lexer', () => {
		expect(getLexerByName('text', { tabSize: 2 }).options.tabSize).toBe(2)
	})

	test('guesses from content', () => {
		expect(guessLexer('[section]\nkey = value\n').name).toBe('ini')
		expect(guessLexer('{"a": [1, 2]}').name).toBe('json')
		expect(guessLexer('just words').name).toBe('text')
	})

	test('registers and unregisters custom lexers', () => {
		registerLexer(customLexer)

		expect(findLexerDefinition('CST')).toBe(customLexer)
		expect(getLexerForFilename('x.cst').name).toBe('custom')
		expect(unregisterLexer('cst')).toBe(true)
		expect(findLexerDefinition('custom')).toBeUndefined()
		expect(unregisterLexer('custom')).toBe(false)
		expect(listLexers()).not.toContain(customLexer)
	})

	test('removes a lexer whose aliases all moved elsewhere', () => {
		const warn = vi
			.spyOn(loggers.lexer.withTag('registry'), 'warn')
			.mockImplementation(() => undefined)
		const first: LexerDefinition = {
			name: 'first',
			aliases: ['shared'],
			filenames: ['*.shr'],
			grammar: customLexer.grammar,
		}
		const second: LexerDefinition = {
			name: 'second',
			aliases: ['first', 'shared'],
			grammar: customLexer.grammar,
		}
		registerLexer(first)
		registerLexer(second)

		expect(warn.mock.calls).toEqual([
			['Alias "first" moves from lexer "first" to "second"'],
			['Alias "shared" moves from lexer "first" to "second"'],
		])
		expect(findLexerDefinition('first')).toBe(second)
		expect(unregisterLexer('first')).toBe(true)
		expect(listLexers()).not.toContain(first)
		expect(() => getLexerForFilename('data.shr')).toThrow(LexerNotFoundError)
		expect(findLexerDefinition('shared')).toBe(second)

		expect(unregisterLexer(second)).toBe(true)
		expect(findLexerDefinition('shared')).toBeUndefined()
		expect(unregisterLexer(second)).toBe(false)
	})
})
