/**
 * Grammar authoring helpers
 *
 * Builders for the declarative grammar model. State directives written as
 * strings (`'#pop'`, `'#pop:2'`, `'#push'`, `'#pop#push:name'`) are parsed
 * here, once, into structured transitions.
 */

import { ROOT_STATE } from './consts'
import { InvalidDirectiveError } from './errors'
import { TokenType } from './tokenType'
import type {
	Action,
	DelegateAction,
	Grammar,
	GroupEntry,
	Include,
	Rule,
	StateTransition,
} from './types'
import { escapeRegExp } from './utils'

export type ActionInput = TokenType | Action | null

export type StateDirective =
	| string
	| StateTransition
	| readonly (string | StateTransition)[]

const POP_COUNT = /^#pop:(\d+)$/
const POP_PUSH = /^#pop#push:(.+)$/

export const push = (state: string): StateTransition => ({ kind: 'push', state })

export const pop = (count = 1): StateTransition => {
	if (!Number.isInteger(count) || count < 1) {
		throw new InvalidDirectiveError(`#pop:${count}`)
	}
	return { kind: 'pop', count }
}

export const pushSame = (): StateTransition => ({ kind: 'pushSame' })

export const goto = (state: string): StateTransition => ({ kind: 'goto', state })

export const combined = (...states: string[]): StateTransition => ({
	kind: 'combined',
	states,
})

const isDirectiveList = (
	directive: StateDirective
): directive is readonly (string | StateTransition)[] => Array.isArray(directive)

const parseDirectiveString = (directive: string): StateTransition => {
	if (directive === '#pop') return pop(1)
	if (directive === '#push') return pushSame()

	const popCount = POP_COUNT.exec(directive)
	if (popCount) return pop(Number(popCount[1]))

	const popPush = POP_PUSH.exec(directive)
	if (popPush?.[1]) return goto(popPush[1])

	if (directive.length === 0 || directive.startsWith('#')) {
		throw new InvalidDirectiveError(directive)
	}
	return push(directive)
}

/**
 * Turn a state directive into transitions. Arrays apply left to right:
 * `['#pop', 'value']` pops once, then pushes `value`.
 */
export const parseStateDirective = (
	directive: StateDirective
): StateTransition[] => {
	if (typeof directive === 'string') return [parseDirectiveString(directive)]
	if (!isDirectiveList(directive)) return [directive]
	return directive.map(entry =>
		typeof entry === 'string' ? parseDirectiveString(entry) : entry
	)
}

export const emit = (type: TokenType | null): Action => ({ kind: 'emit', type })

const toAction = (action: ActionInput): Action => {
	if (action === null || action instanceof TokenType) return emit(action)
	return action
}

export const rule = (
	pattern: string | RegExp,
	action: ActionInput,
	next?: StateDirective
): Rule => ({
	kind: 'rule',
	pattern,
	action: toAction(action),
	transitions: next === undefined ? [] : parseStateDirective(next),
})

export const include = (state: string): Include => ({ kind: 'include', state })

/**
 * Zero-width rule that only moves the state stack, for "anything else"
 * fallbacks at the end of a state
 */
export const defaultState = (next: StateDirective): Rule => rule('', null, next)

/**
 * One token per capturing group. `null` entries leave their group out, and
 * text outside the groups is not emitted.
 */
export const bygroups = (...entries: GroupEntry[]): Action => ({
	kind: 'groups',
	entries,
})

export type UsingOptions = {
	/** Start state (pushed on top of `root`) or a full start stack */
	state?: string | readonly string[]
	wrap?: TokenType
}

/**
 * Delegate the matched text to another grammar. `null` re-lexes with the
 * grammar the rule belongs to, which makes sense with a `state`.
 */
export const using = (
	grammar: Grammar | null,
	options: UsingOptions = {}
): DelegateAction => {
	const { state, wrap } = options
	let stack: readonly string[]
	if (state === undefined) {
		stack = [ROOT_STATE]
	} else if (typeof state === 'string') {
		stack = state === ROOT_STATE ? [ROOT_STATE] : [ROOT_STATE, state]
	} else {
		stack = [...state]
	}
	return { kind: 'delegate', grammar, stack, wrap: wrap ?? null }
}

export type WordsOptions = {
	prefix?: string
	suffix?: string
}

/**
 * Pattern matching any of `list`. Longer words are tried first so that a word
 * never loses to one of its own prefixes.
 */
export const words = (
	list: readonly string[],
	options: WordsOptions = {}
): string => {
	const { prefix = '', suffix = '' } = options
	const alternatives = [...new Set(list)]
		.sort((a, b) => b.length - a.length || a.localeCompare(b))
		.map(escapeRegExp)
	return `${prefix}(?:${alternatives.join('|')})${suffix}`
}

/**
 * Identity helper that checks a grammar literal against the model
 */
export const defineGrammar = (grammar: Grammar): Grammar => grammar
