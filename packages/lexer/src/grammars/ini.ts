import { bygroups, defaultState, defineGrammar, rule } from '../grammar'
import type { LexerDefinition } from '../lexer'
import { Whitespace, tokenType } from '../tokenType'

const Keyword = tokenType('Keyword')
const CommentSingle = tokenType('Comment.Single')
const NameAttribute = tokenType('Name.Attribute')
const Operator = tokenType('Operator')
const LiteralString = tokenType('Literal.String')

export const iniGrammar = defineGrammar({
	name: 'ini',
	states: {
		root: [
			rule('\\s+', Whitespace),
			rule('[;#].*', CommentSingle),
			rule('\\[[^\\]\\n]*\\]', Keyword),
			rule(
				'([^=;#\\s][^=\\n]*?)([ \\t]*)(=)([ \\t]*)',
				bygroups(NameAttribute, Whitespace, Operator, Whitespace),
				'value'
			),
		],
		value: [rule('[^\\n]+', LiteralString), defaultState('#pop')],
	},
})

/** A first line that is a `[section]` header */
const estimateIniConfidence = (text: string): number => {
	const end = text.indexOf('\n')
	if (end < 3) return 0
	return text.startsWith('[') && text[end - 1] === ']' ? 1 : 0
}

export const iniLexer: LexerDefinition = {
	name: 'ini',
	aliases: ['ini', 'cfg', 'dosini'],
	filenames: ['*.ini', '*.cfg', '*.inf'],
	mimetypes: ['text/x-ini'],
	grammar: iniGrammar,
	estimateConfidence: estimateIniConfidence,
}
