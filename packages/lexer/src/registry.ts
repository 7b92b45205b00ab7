/**
 * Lexer registry
 *
 * Lookup of lexer definitions by alias or filename, and a confidence-based
 * guess for unlabeled text. The bundled definitions register on load.
 */

import { loggers } from '@tokenflow/logger'
import { LexerNotFoundError } from './errors'
import { BUILTIN_LEXERS } from './grammars'
import { Lexer, estimateConfidence, type LexerDefinition } from './lexer'
import type { LexerOptionsInput } from './options'
import { baseName, globToRegExp } from './utils'

const log = loggers.lexer.withTag('registry')

const FALLBACK_LEXER = 'text'

const registered: LexerDefinition[] = []
const byAlias = new Map<string, LexerDefinition>()

const normalizeAlias = (alias: string): string => alias.trim().toLowerCase()

const aliasesOf = (definition: LexerDefinition): string[] => [
	...new Set(
		[definition.name, ...(definition.aliases ?? [])].map(normalizeAlias)
	),
]

export const registerLexer = (definition: LexerDefinition): void => {
	for (const alias of aliasesOf(definition)) {
		const existing = byAlias.get(alias)
		if (existing && existing !== definition) {
			log.warn(
				`Alias "${alias}" moves from lexer "${existing.name}" to "${definition.name}"`
			)
		}
		byAlias.set(alias, definition)
	}

	if (!registered.includes(definition)) {
		registered.push(definition)
	}
	log.debug(`Registered lexer "${definition.name}"`)
}

const findRegistered = (name: string): LexerDefinition | undefined => {
	const key = normalizeAlias(name)
	return (
		registered.find(definition => normalizeAlias(definition.name) === key) ??
		byAlias.get(key)
	)
}

/**
 * Remove a definition and every alias still pointing at it. Strings match a
 * registered name first, then an alias. Returns whether anything was removed.
 */
export const unregisterLexer = (target: string | LexerDefinition): boolean => {
	const definition =
		typeof target === 'string' ? findRegistered(target) : target
	const index = definition ? registered.indexOf(definition) : -1
	if (!definition || index === -1) return false

	for (const [alias, owner] of byAlias) {
		if (owner === definition) byAlias.delete(alias)
	}
	registered.splice(index, 1)
	log.debug(`Unregistered lexer "${definition.name}"`)
	return true
}

export const listLexers = (): readonly LexerDefinition[] => [...registered]

export const findLexerDefinition = (
	alias: string
): LexerDefinition | undefined => byAlias.get(normalizeAlias(alias))

export const getLexerByName = (
	alias: string,
	options?: LexerOptionsInput
): Lexer => {
	const definition = findLexerDefinition(alias)
	if (!definition) {
		throw new LexerNotFoundError(`No lexer for alias "${alias}"`, alias)
	}
	return Lexer.create(definition, options)
}

/**
 * First registered lexer whose filename globs match the base name of
 * `filename`
 */
export const getLexerForFilename = (
	filename: string,
	options?: LexerOptionsInput
): Lexer => {
	const name = baseName(filename)
	const definition = registered.find(candidate =>
		(candidate.filenames ?? []).some(glob => globToRegExp(glob).test(name))
	)
	if (!definition) {
		throw new LexerNotFoundError(`No lexer for filename "${filename}"`, filename)
	}
	return Lexer.create(definition, options)
}

/**
 * Lexer whose confidence for `text` is highest. Ties go to the earlier
 * registration; with no opinion at all the plain text lexer is used.
 */
export const guessLexer = (
	text: string,
	options?: LexerOptionsInput
): Lexer => {
	let best: LexerDefinition | undefined
	let bestScore = 0

	for (const definition of registered) {
		const score = estimateConfidence(definition, text)
		if (score === 1) return Lexer.create(definition, options)
		if (score > bestScore) {
			best = definition
			bestScore = score
		}
	}

	if (best) return Lexer.create(best, options)
	return getLexerByName(FALLBACK_LEXER, options)
}

for (const definition of BUILTIN_LEXERS) {
	registerLexer(definition)
}
