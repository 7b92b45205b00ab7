/**
 * Rule Compiler
 *
 * Turns a declarative grammar into per-state lists of sticky regexes with
 * resolved actions. Includes are flattened here so the tokenizer never looks
 * them up, and every state reference is checked once.
 */

import { loggers } from '@tokenflow/logger'
import { PATTERN_FLAGS, ROOT_STATE } from './consts'
import {
	GrammarCycleError,
	InvalidPatternError,
	UnknownStateError,
} from './errors'
import { TokenType } from './tokenType'
import type {
	Action,
	CompiledAction,
	CompiledDelegate,
	CompiledGrammar,
	CompiledGroupEntry,
	CompiledRule,
	CompiledTransition,
	DelegateAction,
	Grammar,
	GroupEntry,
	RawRule,
	Rule,
	StateTransition,
} from './types'

const log = loggers.lexer.withTag('compiler')

const compiledCache = new WeakMap<Grammar, CompiledGrammar>()

/** Flags a RegExp pattern may carry over; case and line handling stay engine-owned */
const CARRIED_FLAGS = ['s', 'u'] as const

const hasState = (grammar: Grammar, state: string): boolean =>
	Object.hasOwn(grammar.states, state)

const getRawRules = (
	grammar: Grammar,
	state: string
): readonly RawRule[] | undefined =>
	hasState(grammar, state) ? grammar.states[state] : undefined

const combinedStateName = (states: readonly string[]): string =>
	`combined(${states.join('+')})`

type DelegateResolver = (grammar: Grammar) => CompiledGrammar

class GrammarCompiler {
	private readonly compiled = new Map<string, CompiledRule[]>()
	private readonly expanding: string[] = []
	private readonly combinedStates = new Map<string, readonly string[]>()

	constructor(
		private readonly grammar: Grammar,
		private readonly self: CompiledGrammar,
		private readonly resolveDelegate: DelegateResolver
	) {}

	run(): Map<string, readonly CompiledRule[]> {
		if (!hasState(this.grammar, ROOT_STATE)) {
			throw new UnknownStateError(this.grammar.name, ROOT_STATE)
		}

		for (const state of Object.keys(this.grammar.states)) {
			this.compileState(state, null, null)
		}

		const states = new Map<string, readonly CompiledRule[]>()
		for (const [state, rules] of this.compiled) {
			states.set(state, Object.freeze(rules))
		}
		// Combined states only concatenate finished lists, so they are built last
		for (const [name, parts] of this.combinedStates) {
			states.set(
				name,
				Object.freeze(parts.flatMap(part => this.compiled.get(part) ?? []))
			)
		}
		return states
	}

	private compileState(
		state: string,
		referencedFrom: string | null,
		ruleIndex: number | null
	): CompiledRule[] {
		const done = this.compiled.get(state)
		if (done) return done

		const cycleStart = this.expanding.indexOf(state)
		if (cycleStart !== -1) {
			throw new GrammarCycleError(this.grammar.name, [
				...this.expanding.slice(cycleStart),
				state,
			])
		}

		const rawRules = getRawRules(this.grammar, state)
		if (!rawRules) {
			throw new UnknownStateError(
				this.grammar.name,
				state,
				referencedFrom,
				ruleIndex
			)
		}

		this.expanding.push(state)
		const rules: CompiledRule[] = []
		rawRules.forEach((entry, index) => {
			if (entry.kind === 'include') {
				rules.push(...this.compileState(entry.state, state, index))
			} else {
				rules.push(this.compileRule(state, entry, index))
			}
		})
		this.expanding.pop()

		this.compiled.set(state, rules)
		return rules
	}

	private compileRule(state: string, rule: Rule, index: number): CompiledRule {
		return Object.freeze({
			regex: this.compilePattern(
				state,
				rule.pattern,
				rule.action.kind === 'groups'
			),
			action: this.compileAction(state, rule.action, index),
			transitions: Object.freeze(
				rule.transitions.map(transition =>
					this.compileTransition(state, transition, index)
				)
			),
			origin: state,
			index,
		})
	}

	private compilePattern(
		state: string,
		pattern: string | RegExp,
		withIndices: boolean
	): RegExp {
		let source: string
		let flags = PATTERN_FLAGS + (this.grammar.ignoreCase ? 'i' : '')
		// Group offsets come from match indices
		if (withIndices) flags += 'd'
		if (typeof pattern === 'string') {
			source = pattern
		} else {
			source = pattern.source
			for (const flag of CARRIED_FLAGS) {
				if (pattern.flags.includes(flag)) flags += flag
			}
		}

		try {
			return new RegExp(source, flags)
		} catch (error) {
			throw new InvalidPatternError(this.grammar.name, state, source, error)
		}
	}

	private requireState(state: string, from: string, index: number): void {
		if (!hasState(this.grammar, state)) {
			throw new UnknownStateError(this.grammar.name, state, from, index)
		}
	}

	private compileTransition(
		state: string,
		transition: StateTransition,
		index: number
	): CompiledTransition {
		switch (transition.kind) {
			case 'push':
			case 'goto':
				this.requireState(transition.state, state, index)
				return transition
			case 'pop':
			case 'pushSame':
				return transition
			case 'combined': {
				for (const part of transition.states) {
					this.requireState(part, state, index)
				}
				const name = combinedStateName(transition.states)
				this.combinedStates.set(name, [...transition.states])
				return { kind: 'push', state: name }
			}
		}
	}

	private compileAction(
		state: string,
		action: Action,
		index: number
	): CompiledAction {
		switch (action.kind) {
			case 'emit':
				return action
			case 'groups':
				return {
					kind: 'groups',
					entries: Object.freeze(
						action.entries.map(entry =>
							this.compileGroupEntry(state, entry, index)
						)
					),
				}
			case 'delegate':
				return this.compileDelegate(state, action, index)
		}
	}

	private compileGroupEntry(
		state: string,
		entry: GroupEntry,
		index: number
	): CompiledGroupEntry {
		if (entry === null || entry instanceof TokenType) return entry
		return this.compileDelegate(state, entry, index)
	}

	private compileDelegate(
		state: string,
		action: DelegateAction,
		index: number
	): CompiledDelegate {
		const target = action.grammar ?? this.grammar
		for (const entry of action.stack) {
			if (!hasState(target, entry)) {
				throw new UnknownStateError(target.name, entry, state, index)
			}
		}
		if (action.stack.length === 0) {
			throw new UnknownStateError(target.name, ROOT_STATE, state, index)
		}

		const delegate: CompiledDelegate = {
			kind: 'delegate',
			grammar:
				action.grammar === null ? this.self : this.resolveDelegate(action.grammar),
			stack: Object.freeze([...action.stack]),
			wrap: action.wrap,
		}
		return Object.freeze(delegate)
	}
}

const compileInto = (
	grammar: Grammar,
	pending: Map<Grammar, CompiledGrammar>
): CompiledGrammar => {
	const states = new Map<string, readonly CompiledRule[]>()
	const result: CompiledGrammar = Object.freeze({ name: grammar.name, states })
	// Registered before compiling so grammars that delegate to each other resolve
	pending.set(grammar, result)

	const resolveDelegate: DelegateResolver = target =>
		compiledCache.get(target) ??
		pending.get(target) ??
		compileInto(target, pending)

	const compiler = new GrammarCompiler(grammar, result, resolveDelegate)
	for (const [state, rules] of compiler.run()) {
		states.set(state, rules)
	}

	log.debug(
		`Compiled grammar "${grammar.name}": ${states.size} states, ${countRules(result)} rules`
	)
	return result
}

const countRules = (compiled: CompiledGrammar): number => {
	let total = 0
	for (const rules of compiled.states.values()) total += rules.length
	return total
}

/**
 * Compile a grammar. Results are cached per grammar object and hold no run
 * state, so one compiled grammar can serve any number of tokenizer runs.
 */
export const compileGrammar = (grammar: Grammar): CompiledGrammar => {
	const cached = compiledCache.get(grammar)
	if (cached) return cached

	const pending = new Map<Grammar, CompiledGrammar>()
	const compiled = compileInto(grammar, pending)
	for (const [source, result] of pending) {
		compiledCache.set(source, result)
	}
	return compiled
}
