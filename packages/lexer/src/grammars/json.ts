import { bygroups, defineGrammar, include, rule, words } from '../grammar'
import type { LexerDefinition } from '../lexer'
import { Whitespace, tokenType } from '../tokenType'

const Punctuation = tokenType('Punctuation')
const KeywordConstant = tokenType('Keyword.Constant')
const NumberInteger = tokenType('Literal.Number.Integer')
const NumberFloat = tokenType('Literal.Number.Float')
const StringDouble = tokenType('Literal.String.Double')
const StringEscape = tokenType('Literal.String.Escape')
const NameTag = tokenType('Name.Tag')

const INTEGER = '-?(?:0|[1-9]\\d*)'

export const jsonGrammar = defineGrammar({
	name: 'json',
	states: {
		whitespace: [rule('\\s+', Whitespace)],
		value: [
			include('whitespace'),
			rule(`${INTEGER}(?:\\.\\d+(?:[eE][+-]?\\d+)?|[eE][+-]?\\d+)`, NumberFloat),
			rule(INTEGER, NumberInteger),
			rule(words(['true', 'false', 'null'], { suffix: '\\b' }), KeywordConstant),
			rule('"', StringDouble, 'string'),
			rule('\\{', Punctuation, 'object'),
			rule('\\[', Punctuation, 'array'),
		],
		root: [include('value')],
		string: [
			rule('[^"\\\\]+', StringDouble),
			rule('\\\\(?:["\\\\/bfnrt]|u[0-9a-fA-F]{4})', StringEscape),
			rule('"', StringDouble, '#pop'),
		],
		object: [
			include('whitespace'),
			rule(
				'("(?:[^"\\\\\\n]|\\\\.)*")(\\s*)(:)',
				bygroups(NameTag, Whitespace, Punctuation)
			),
			rule(',', Punctuation),
			rule('\\}', Punctuation, '#pop'),
			include('value'),
		],
		array: [
			rule(',', Punctuation),
			rule('\\]', Punctuation, '#pop'),
			include('value'),
		],
	},
})

const STRUCTURED_START = /^\s*[[{]/

const estimateJsonConfidence = (text: string): number => {
	if (!STRUCTURED_START.test(text)) return 0
	try {
		JSON.parse(text)
		return 1
	} catch {
		return 0.3
	}
}

export const jsonLexer: LexerDefinition = {
	name: 'json',
	aliases: ['json'],
	filenames: ['*.json', '*.jsonl', 'Pipfile.lock'],
	mimetypes: ['application/json'],
	grammar: jsonGrammar,
	estimateConfidence: estimateJsonConfidence,
}
