/**
 * @tokenflow/lexer
 *
 * Stateful, regex-driven lexer engine with a hierarchical token taxonomy.
 */

// Main class export
export { Lexer, estimateConfidence, type LexerDefinition } from './lexer'

// Token taxonomy
export {
	TokenType,
	RootToken,
	Text,
	Whitespace,
	ErrorToken,
	Other,
	tokenType,
	internTokenType,
	internedTokenTypeCount,
	isSubtypeOf,
	shortName,
	type StandardTokenPath,
} from './tokenType'

// Grammar authoring
export {
	bygroups,
	combined,
	defaultState,
	defineGrammar,
	emit,
	goto,
	include,
	parseStateDirective,
	pop,
	push,
	pushSame,
	rule,
	using,
	words,
	type ActionInput,
	type StateDirective,
	type UsingOptions,
	type WordsOptions,
} from './grammar'

// Type exports
export type {
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
	Include,
	RawRule,
	Rule,
	StateTransition,
	Token,
} from './types'

// Compiler and tokenizer (for advanced use)
export { compileGrammar } from './compiler'
export { tokenize, verifyCompiledGrammar } from './tokenizer'
export { LexerState } from './state'
export { MAX_ZERO_WIDTH_TRANSITIONS, ROOT_STATE } from './consts'

// Options
export {
	lexerOptionsSchema,
	parseLexerOptions,
	type LexerOptions,
	type LexerOptionsInput,
} from './options'
export { decodeInput, detectBom } from './decode'

// Errors
export {
	LexerError,
	InvalidPatternError,
	InvalidDirectiveError,
	UnknownStateError,
	GrammarCycleError,
	MalformedCompiledGrammarError,
	LexerOptionsError,
	LexerNotFoundError,
} from './errors'

// Registry and bundled grammars
export {
	findLexerDefinition,
	getLexerByName,
	getLexerForFilename,
	guessLexer,
	listLexers,
	registerLexer,
	unregisterLexer,
} from './registry'
export {
	BUILTIN_LEXERS,
	iniGrammar,
	iniLexer,
	jsonGrammar,
	jsonLexer,
	pythonGrammar,
	pythonLexer,
	textGrammar,
	textLexer,
} from './grammars'
