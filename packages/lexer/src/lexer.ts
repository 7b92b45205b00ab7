/**
 * Lexer
 *
 * Wraps a compiled grammar with input normalization and the public token
 * iterators. Normalization happens once per call, before the tokenizer sees
 * the text.
 */

import { compileGrammar } from './compiler'
import { decodeInput } from './decode'
import {
	parseLexerOptions,
	type LexerOptions,
	type LexerOptionsInput,
} from './options'
import { LexerState } from './state'
import { tokenize } from './tokenizer'
import type { CompiledGrammar, Grammar, Token } from './types'
import { expandTabs } from './utils'

/**
 * Everything needed to build a lexer for one language
 */
export type LexerDefinition = {
	name: string
	aliases?: readonly string[]
	/** Filename globs (`*.json`) */
	filenames?: readonly string[]
	mimetypes?: readonly string[]
	grammar: Grammar
	/** How sure the definition is that `text` is its language; higher is surer */
	estimateConfidence?: (text: string) => number
}

const BYTE_ORDER_MARK = '\ufeff'
const LINE_BREAKS = /\r\n?/g
const OUTER_NEWLINES = /^\n+|\n+$/g

/**
 * Confidence of `definition` for `text`, clamped to [0, 1]. Definitions
 * without a heuristic, and heuristics returning NaN, score 0.
 */
export const estimateConfidence = (
	definition: LexerDefinition,
	text: string
): number => {
	const heuristic = definition.estimateConfidence
	if (!heuristic) return 0

	const score = heuristic(text)
	if (Number.isNaN(score)) return 0
	return Math.min(1, Math.max(0, score))
}

export class Lexer {
	readonly definition: LexerDefinition
	readonly options: Readonly<LexerOptions>
	private readonly compiled: CompiledGrammar

	private constructor(definition: LexerDefinition, options: LexerOptions) {
		this.definition = definition
		this.options = Object.freeze(options)
		this.compiled = compileGrammar(definition.grammar)
	}

	/**
	 * Create a lexer. Options are validated and the grammar compiled here, so
	 * configuration problems surface before any text is read.
	 */
	static create(
		definition: LexerDefinition,
		options: LexerOptionsInput = {}
	): Lexer {
		return new Lexer(definition, parseLexerOptions(options, definition.name))
	}

	get name(): string {
		return this.definition.name
	}

	get grammar(): CompiledGrammar {
		return this.compiled
	}

	/**
	 * Apply the configured normalization: decode bytes, drop a byte order
	 * mark, unify line breaks, strip, expand tabs, ensure a final newline.
	 */
	preprocess(input: string | Uint8Array): string {
		const { stripAll, stripNewlines, tabSize, ensureNewline, inputEncoding } =
			this.options

		let text =
			typeof input === 'string' ? input : decodeInput(input, inputEncoding)

		if (text.startsWith(BYTE_ORDER_MARK)) {
			text = text.slice(BYTE_ORDER_MARK.length)
		}

		text = text.replace(LINE_BREAKS, '\n')

		if (stripAll) {
			text = text.trim()
		} else if (stripNewlines) {
			text = text.replace(OUTER_NEWLINES, '')
		}

		if (tabSize > 0) {
			text = expandTabs(text, tabSize)
		}

		if (ensureNewline && !text.endsWith('\n')) {
			text += '\n'
		}

		return text
	}

	/**
	 * Tokens of the normalized input. Offsets refer to the normalized text.
	 */
	getTokens(input: string | Uint8Array): Generator<Token> {
		return tokenize(this.compiled, this.preprocess(input))
	}

	/**
	 * Tokens of `text` exactly as given, optionally from another start stack
	 */
	getTokensUnprocessed(
		text: string,
		stack?: readonly string[]
	): Generator<Token> {
		return tokenize(this.compiled, text, new LexerState(stack))
	}

	estimateConfidence(text: string): number {
		return estimateConfidence(this.definition, text)
	}
}
