/**
 * Core Lexer Tokenization Logic
 *
 * Walks text with a state stack over a compiled grammar and yields tokens
 * lazily. The first rule of the current state that matches at the position
 * wins; unmatched characters come out as `Error` tokens.
 */

import { MAX_ZERO_WIDTH_TRANSITIONS, ROOT_STATE } from './consts'
import { MalformedCompiledGrammarError, UnknownStateError } from './errors'
import { LexerState } from './state'
import { ErrorToken, Other, RootToken, TokenType } from './tokenType'
import type {
	CompiledAction,
	CompiledDelegate,
	CompiledGrammar,
	CompiledGroupEntry,
	CompiledRule,
	CompiledTransition,
	Token,
} from './types'
import { charLengthAt } from './utils'

type RuleMatch = {
	rule: CompiledRule
	match: RegExpExecArray
}

const verifiedGrammars = new WeakSet<CompiledGrammar>()

const checkGrammar = (
	grammar: CompiledGrammar,
	visiting: Set<CompiledGrammar>
): void => {
	if (verifiedGrammars.has(grammar) || visiting.has(grammar)) return
	visiting.add(grammar)

	if (!grammar.states.has(ROOT_STATE)) {
		throw new MalformedCompiledGrammarError(grammar.name, ROOT_STATE, 'as its start state')
	}

	const checkDelegate = (delegate: CompiledDelegate, rule: CompiledRule) => {
		if (delegate.stack.length === 0) {
			throw new MalformedCompiledGrammarError(
				delegate.grammar.name,
				ROOT_STATE,
				`with an empty delegate stack (rule ${rule.index} of state "${rule.origin}")`
			)
		}
		for (const state of delegate.stack) {
			if (!delegate.grammar.states.has(state)) {
				throw new MalformedCompiledGrammarError(
					delegate.grammar.name,
					state,
					`in a delegate stack (rule ${rule.index} of state "${rule.origin}")`
				)
			}
		}
		checkGrammar(delegate.grammar, visiting)
	}

	for (const rules of grammar.states.values()) {
		for (const rule of rules) {
			for (const transition of rule.transitions) {
				if (transition.kind !== 'push' && transition.kind !== 'goto') continue
				if (!grammar.states.has(transition.state)) {
					throw new MalformedCompiledGrammarError(
						grammar.name,
						transition.state,
						`(rule ${rule.index} of state "${rule.origin}")`
					)
				}
			}

			const { action } = rule
			if (action.kind === 'delegate') {
				checkDelegate(action, rule)
			} else if (action.kind === 'groups') {
				for (const entry of action.entries) {
					if (entry !== null && !(entry instanceof TokenType)) {
						checkDelegate(entry, rule)
					}
				}
			}
		}
	}
}

/**
 * Check that every state a compiled grammar (and the grammars it delegates
 * to) can reach exists. Grammars that pass are remembered.
 */
export const verifyCompiledGrammar = (grammar: CompiledGrammar): void => {
	const visiting = new Set<CompiledGrammar>()
	checkGrammar(grammar, visiting)
	for (const checked of visiting) verifiedGrammars.add(checked)
}

const findRule = (
	rules: readonly CompiledRule[],
	text: string,
	position: number
): RuleMatch | null => {
	for (const rule of rules) {
		rule.regex.lastIndex = position
		const match = rule.regex.exec(text)
		if (match) return { rule, match }
	}
	return null
}

const applyTransitions = (
	state: LexerState,
	transitions: readonly CompiledTransition[]
): void => {
	for (const transition of transitions) {
		switch (transition.kind) {
			case 'push':
				state.push(transition.state)
				break
			case 'pop':
				state.pop(transition.count)
				break
			case 'pushSame':
				state.pushSame()
				break
			case 'goto':
				state.goto(transition.state)
				break
		}
	}
}

function* delegateText(
	delegate: CompiledDelegate,
	text: string,
	offset: number
): Generator<Token> {
	const { wrap } = delegate
	for (const token of run(delegate.grammar, text, new LexerState(delegate.stack))) {
		yield {
			offset: token.offset + offset,
			type: wrap && token.type === Other ? wrap : token.type,
			value: token.value,
		}
	}
}

function* emitGroups(
	entries: readonly CompiledGroupEntry[],
	match: RegExpExecArray
): Generator<Token> {
	for (let i = 0; i < entries.length; i++) {
		const entry = entries[i]
		const value = match[i + 1]
		const span = match.indices?.[i + 1]
		if (!entry || !value || !span) continue

		if (entry instanceof TokenType) {
			yield { offset: span[0], type: entry, value }
		} else {
			yield* delegateText(entry, value, span[0])
		}
	}
}

function* emitAction(
	action: CompiledAction,
	match: RegExpExecArray
): Generator<Token> {
	const value = match[0]
	switch (action.kind) {
		case 'emit':
			if (value) yield { offset: match.index, type: action.type ?? RootToken, value }
			return
		case 'groups':
			yield* emitGroups(action.entries, match)
			return
		case 'delegate':
			if (value) yield* delegateText(action, value, match.index)
			return
	}
}

function* run(
	grammar: CompiledGrammar,
	text: string,
	state: LexerState
): Generator<Token> {
	const { length } = text
	let zeroWidthTransitions = 0

	while (state.position < length) {
		const position = state.position
		const rules = grammar.states.get(state.current) ?? []
		const found =
			zeroWidthTransitions < MAX_ZERO_WIDTH_TRANSITIONS
				? findRule(rules, text, position)
				: null

		if (found) {
			const { rule, match } = found
			const end = position + match[0].length
			const transitions = rule.transitions

			if (end > position || transitions.length > 0) {
				yield* emitAction(rule.action, match)
				applyTransitions(state, transitions)

				if (end > position) {
					state.advanceTo(end)
					zeroWidthTransitions = 0
				} else {
					zeroWidthTransitions++
				}
				continue
			}
		}

		// Nothing matched, or the match cannot make progress
		const width = charLengthAt(text, position)
		yield {
			offset: position,
			type: ErrorToken,
			value: text.slice(position, position + width),
		}
		state.advanceTo(position + width)
		zeroWidthTransitions = 0
	}
}

/**
 * Tokenize `text` with a compiled grammar. The grammar and start stack are
 * checked before the first token; after that nothing in the text can make
 * this throw. Pass a `LexerState` to start from another stack or to inspect
 * the stack once the run is over.
 */
export const tokenize = (
	grammar: CompiledGrammar,
	text: string,
	state: LexerState = new LexerState()
): Generator<Token> => {
	verifyCompiledGrammar(grammar)
	for (const entry of state.stack) {
		if (!grammar.states.has(entry)) {
			throw new UnknownStateError(grammar.name, entry)
		}
	}
	return run(grammar, text, state)
}
