import { describe, expect, test } from 'vitest'
import { compileGrammar } from './compiler'
import {
	GrammarCycleError,
	InvalidPatternError,
	UnknownStateError,
} from './errors'
import { bygroups, combined, defineGrammar, include, rule, using } from './grammar'
import { tokenize } from './tokenizer'
import { Text, Whitespace, tokenType } from './tokenType'

const Keyword = tokenType('Keyword')
const Name = tokenType('Name')

const catchError = (fn: () => unknown): unknown => {
	try {
		fn()
	} catch (error) {
		return error
	}
	return undefined
}

describe('compileGrammar', () => {
	test('flattens includes in place', () => {
		const grammar = defineGrammar({
			name: 'included',
			states: {
				common: [rule('\\s+', Whitespace)],
				root: [include('common'), rule('\\w+', Name)],
			},
		})
		const compiled = compileGrammar(grammar)
		const root = compiled.states.get('root') ?? []

		expect(root.map(r => r.regex.source)).toEqual(['\\s+', '\\w+'])
		expect(root.map(r => r.origin)).toEqual(['common', 'root'])
		expect(root[0]).toBe(compiled.states.get('common')?.[0])
	})

	test('returns the cached result for the same grammar', () => {
		const grammar = defineGrammar({
			name: 'cached',
			states: { root: [rule('.', Text)] },
		})

		expect(compileGrammar(grammar)).toBe(compileGrammar(grammar))
	})

	test('compiles sticky multiline patterns', () => {
		const plain = compileGrammar(
			defineGrammar({ name: 'plain', states: { root: [rule('abc', Keyword)] } })
		)
		const grouped = compileGrammar(
			defineGrammar({
				name: 'grouped',
				states: { root: [rule('(a)', bygroups(Keyword))] },
			})
		)

		expect(plain.states.get('root')?.[0]?.regex.flags).toBe('my')
		expect(grouped.states.get('root')?.[0]?.regex.flags).toBe('dmy')
	})

	test('ignoreCase applies to every pattern', () => {
		const grammar = defineGrammar({
			name: 'caseless',
			ignoreCase: true,
			states: { root: [rule('abc', Keyword)] },
		})
		const compiled = compileGrammar(grammar)

		expect(compiled.states.get('root')?.[0]?.regex.flags).toBe('imy')
		expect([...tokenize(compiled, 'ABC')].map(t => t.type)).toEqual([Keyword])
	})

	test('RegExp patterns keep only their dotAll and unicode flags', () => {
		const compiled = compileGrammar(
			defineGrammar({
				name: 'flags',
				states: { root: [rule(/\p{L}+/u, Name), rule(/abc/i, Keyword)] },
			})
		)

		expect(compiled.states.get('root')?.map(r => r.regex.flags)).toEqual([
			'muy',
			'my',
		])
	})

	test('builds combined states from their parts', () => {
		const compiled = compileGrammar(
			defineGrammar({
				name: 'combo',
				states: {
					root: [rule('\\{', Text, combined('a', 'b'))],
					a: [rule('a', Name)],
					b: [rule('b', Keyword)],
				},
			})
		)

		expect(
			compiled.states.get('combined(a+b)')?.map(r => r.regex.source)
		).toEqual(['a', 'b'])
		expect(compiled.states.get('root')?.[0]?.transitions).toEqual([
			{ kind: 'push', state: 'combined(a+b)' },
		])
	})

	test('compiles grammars that delegate to each other', () => {
		const states: Record<string, ReturnType<typeof rule>[]> = { root: [] }
		const first = defineGrammar({ name: 'first', states })
		const second = defineGrammar({
			name: 'second',
			states: { root: [rule('<', using(first))] },
		})
		states.root = [rule('>', using(second))]

		const compiled = compileGrammar(first)
		const delegate = compiled.states.get('root')?.[0]?.action

		expect(delegate?.kind).toBe('delegate')
		if (delegate?.kind !== 'delegate') return
		expect(delegate.grammar).toBe(compileGrammar(second))
		const back = delegate.grammar.states.get('root')?.[0]?.action
		expect(back?.kind === 'delegate' && back.grammar).toBe(compiled)
	})

	describe('errors', () => {
		test('a missing root state', () => {
			const error = catchError(() =>
				compileGrammar(
					defineGrammar({ name: 'rootless', states: { other: [] } })
				)
			)

			expect(error).toBeInstanceOf(UnknownStateError)
			expect(error).toMatchObject({ state: 'root', referencedFrom: null })
		})

		test('an unknown transition target', () => {
			const error = catchError(() =>
				compileGrammar(
					defineGrammar({
						name: 'dangling',
						states: { root: [rule('a', Text, 'missing')] },
					})
				)
			)

			expect(error).toBeInstanceOf(UnknownStateError)
			expect(error).toMatchObject({
				state: 'missing',
				referencedFrom: 'root',
				ruleIndex: 0,
				grammar: 'dangling',
			})
			expect(error).toHaveProperty(
				'message',
				'Unknown state "missing" referenced by rule 0 of state "root" (grammar "dangling")'
			)
		})

		test('an unknown include', () => {
			const error = catchError(() =>
				compileGrammar(
					defineGrammar({
						name: 'dangling',
						states: { root: [rule('x', Text), include('nowhere')] },
					})
				)
			)

			expect(error).toMatchObject({
				state: 'nowhere',
				referencedFrom: 'root',
				ruleIndex: 1,
			})
		})

		test('an unknown delegate start state', () => {
			const inner = defineGrammar({
				name: 'inner',
				states: { root: [rule('.', Text)] },
			})

			expect(() =>
				compileGrammar(
					defineGrammar({
						name: 'outer',
						states: { root: [rule('.+', using(inner, { state: 'nope' }))] },
					})
				)
			).toThrow(UnknownStateError)
		})

		test('include cycles', () => {
			const error = catchError(() =>
				compileGrammar(
					defineGrammar({
						name: 'cyclic',
						states: {
							root: [include('a')],
							a: [include('b')],
							b: [include('a')],
						},
					})
				)
			)

			expect(error).toBeInstanceOf(GrammarCycleError)
			expect(error).toHaveProperty('cycle', ['a', 'b', 'a'])
			expect(error).toHaveProperty(
				'message',
				'Include cycle: a -> b -> a (grammar "cyclic")'
			)
		})

		test('a state including itself', () => {
			const error = catchError(() =>
				compileGrammar(
					defineGrammar({
						name: 'selfish',
						states: { root: [include('root')] },
					})
				)
			)

			expect(error).toHaveProperty('cycle', ['root', 'root'])
		})

		test('an invalid pattern', () => {
			const error = catchError(() =>
				compileGrammar(
					defineGrammar({
						name: 'broken',
						states: { root: [rule('(unclosed', Text)] },
					})
				)
			)

			expect(error).toBeInstanceOf(InvalidPatternError)
			expect(error).toMatchObject({ pattern: '(unclosed', state: 'root' })
		})

		test('a failed compile is not cached', () => {
			const grammar = defineGrammar({
				name: 'broken',
				states: { root: [rule('[', Text)] },
			})

			expect(() => compileGrammar(grammar)).toThrow(InvalidPatternError)
			expect(() => compileGrammar(grammar)).toThrow(InvalidPatternError)
		})
	})
})
