import { defineGrammar, rule } from '../grammar'
import type { LexerDefinition } from '../lexer'
import { Text } from '../tokenType'

export const textGrammar = defineGrammar({
	name: 'text',
	states: {
		root: [rule('[\\s\\S]+', Text)],
	},
})

/**
 * Plain text: one `Text` token. Scores just above zero so any other
 * language with an opinion wins a guess.
 */
export const textLexer: LexerDefinition = {
	name: 'text',
	aliases: ['text', 'plain', 'txt'],
	filenames: ['*.txt'],
	mimetypes: ['text/plain'],
	grammar: textGrammar,
	estimateConfidence: () => 0.01,
}
