/**
 * Lexer Types
 */

import type { TokenType } from './tokenType'

/**
 * Lexer token output
 */
export type Token = {
	/** UTF-16 offset of `value` in the lexed text */
	offset: number
	type: TokenType
	value: string
}

/**
 * State stack mutations a rule can request
 */
export type StateTransition =
	| { kind: 'push'; state: string }
	| { kind: 'pop'; count: number }
	| { kind: 'pushSame' }
	| { kind: 'goto'; state: string }
	/** Push an anonymous state holding the rules of `states`, in order */
	| { kind: 'combined'; states: readonly string[] }

/**
 * Re-lex the matched text with another grammar (`null` = the grammar the rule
 * belongs to), starting from `stack`. With `wrap` set, tokens the delegate
 * classifies as `Other` come out as `wrap`.
 */
export type DelegateAction = {
	kind: 'delegate'
	grammar: Grammar | null
	stack: readonly string[]
	wrap: TokenType | null
}

export type GroupEntry = TokenType | DelegateAction | null

export type Action =
	| { kind: 'emit'; type: TokenType | null }
	| { kind: 'groups'; entries: readonly GroupEntry[] }
	| DelegateAction

export type Rule = {
	kind: 'rule'
	pattern: string | RegExp
	action: Action
	transitions: readonly StateTransition[]
}

export type Include = {
	kind: 'include'
	state: string
}

export type RawRule = Rule | Include

/**
 * Declarative lexer description. `states.root` is where lexing starts.
 */
export type Grammar = {
	name: string
	states: Readonly<Record<string, readonly RawRule[]>>
	/** Compile every pattern case-insensitively */
	ignoreCase?: boolean
}

export type CompiledTransition =
	| { kind: 'push'; state: string }
	| { kind: 'pop'; count: number }
	| { kind: 'pushSame' }
	| { kind: 'goto'; state: string }

export type CompiledDelegate = {
	kind: 'delegate'
	grammar: CompiledGrammar
	stack: readonly string[]
	wrap: TokenType | null
}

export type CompiledGroupEntry = TokenType | CompiledDelegate | null

export type CompiledAction =
	| { kind: 'emit'; type: TokenType | null }
	| { kind: 'groups'; entries: readonly CompiledGroupEntry[] }
	| CompiledDelegate

export type CompiledRule = {
	/** Sticky, so `exec` only matches at `lastIndex` */
	regex: RegExp
	action: CompiledAction
	transitions: readonly CompiledTransition[]
	/** State the rule was declared in (differs from the owner when included) */
	origin: string
	index: number
}

export type CompiledGrammar = {
	name: string
	states: ReadonlyMap<string, readonly CompiledRule[]>
}
