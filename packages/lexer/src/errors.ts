/**
 * Lexer errors
 *
 * Everything here is raised while building a lexer (compiling a grammar,
 * validating options, looking a lexer up). Lexing text never throws; input the
 * grammar cannot match becomes `Error` tokens.
 */

export abstract class LexerError extends Error {
	/** Name of the grammar involved, when there is one */
	readonly grammar: string | null

	constructor(message: string, grammar: string | null = null, options?: ErrorOptions) {
		super(grammar ? `${message} (grammar "${grammar}")` : message, options)
		this.name = this.constructor.name
		this.grammar = grammar
	}
}

/**
 * Thrown when a rule pattern is not a valid regular expression
 */
export class InvalidPatternError extends LexerError {
	readonly pattern: string
	readonly state: string

	constructor(grammar: string, state: string, pattern: string, cause: unknown) {
		const reason = cause instanceof Error ? `: ${cause.message}` : ''
		super(`Invalid pattern /${pattern}/ in state "${state}"${reason}`, grammar, {
			cause,
		})
		this.pattern = pattern
		this.state = state
	}
}

/**
 * Thrown when a transition, include or delegate names a state the grammar
 * does not define
 */
export class UnknownStateError extends LexerError {
	readonly state: string
	/** State holding the offending rule; `null` for missing start states */
	readonly referencedFrom: string | null
	readonly ruleIndex: number | null

	constructor(
		grammar: string,
		state: string,
		referencedFrom: string | null = null,
		ruleIndex: number | null = null
	) {
		const location =
			referencedFrom === null
				? ''
				: ` referenced by rule ${ruleIndex ?? '?'} of state "${referencedFrom}"`
		super(`Unknown state "${state}"${location}`, grammar)
		this.state = state
		this.referencedFrom = referencedFrom
		this.ruleIndex = ruleIndex
	}
}

/**
 * Thrown when states include each other in a loop
 */
export class GrammarCycleError extends LexerError {
	/** Include chain, starting and ending with the same state */
	readonly cycle: readonly string[]

	constructor(grammar: string, cycle: readonly string[]) {
		super(`Include cycle: ${cycle.join(' -> ')}`, grammar)
		this.cycle = cycle
	}
}

/**
 * Thrown when the engine is handed a compiled grammar that references states
 * it does not contain
 */
export class MalformedCompiledGrammarError extends LexerError {
	readonly state: string

	constructor(grammar: string, state: string, detail: string) {
		super(`Compiled grammar references missing state "${state}" ${detail}`, grammar)
		this.state = state
	}
}

export class LexerOptionsError extends LexerError {}

export class LexerNotFoundError extends LexerError {
	readonly query: string

	constructor(message: string, query: string) {
		super(message)
		this.query = query
	}
}

/**
 * Thrown while authoring a grammar when a state directive string cannot be
 * parsed (`'#pop:x'`, an unknown `#` keyword)
 */
export class InvalidDirectiveError extends LexerError {
	readonly directive: string

	constructor(directive: string) {
		super(`Invalid state directive "${directive}"`)
		this.directive = directive
	}
}
