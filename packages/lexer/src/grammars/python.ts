import { bygroups, defineGrammar, include, rule, words } from '../grammar'
import type { LexerDefinition } from '../lexer'
import { ErrorToken, Whitespace, tokenType } from '../tokenType'

const Keyword = tokenType('Keyword')
const KeywordConstant = tokenType('Keyword.Constant')
const Name = tokenType('Name')
const NameBuiltin = tokenType('Name.Builtin')
const NameClass = tokenType('Name.Class')
const NameDecorator = tokenType('Name.Decorator')
const NameFunction = tokenType('Name.Function')
const CommentSingle = tokenType('Comment.Single')
const Operator = tokenType('Operator')
const Punctuation = tokenType('Punctuation')
const StringAffix = tokenType('String.Affix')
const StringDouble = tokenType('String.Double')
const StringSingle = tokenType('String.Single')
const StringEscape = tokenType('String.Escape')
const StringInterpol = tokenType('String.Interpol')
const NumberFloat = tokenType('Number.Float')
const NumberHex = tokenType('Number.Hex')
const NumberInteger = tokenType('Number.Integer')

const KEYWORDS = [
	'and', 'as', 'assert', 'async', 'await', 'break', 'class', 'continue',
	'def', 'del', 'elif', 'else', 'except', 'finally', 'for', 'from', 'global',
	'if', 'import', 'in', 'is', 'lambda', 'nonlocal', 'not', 'or', 'pass',
	'raise', 'return', 'try', 'while', 'with', 'yield',
]

const BUILTINS = [
	'abs', 'all', 'any', 'bool', 'dict', 'enumerate', 'float', 'int',
	'isinstance', 'len', 'list', 'max', 'min', 'open', 'print', 'range', 'repr',
	'set', 'sorted', 'str', 'sum', 'super', 'tuple', 'type', 'zip',
]

const STRING_PREFIX = '([rRbBuU]{0,2})'
const ESCAPE =
	'\\\\(?:[\\\\\'"abfnrtv\\n]|x[0-9a-fA-F]{2}|u[0-9a-fA-F]{4}|U[0-9a-fA-F]{8}|N\\{[^}\\n]*\\}|[0-7]{1,3})'

export const pythonGrammar = defineGrammar({
	name: 'python',
	states: {
		root: [
			rule('#.*', CommentSingle),
			rule('@[A-Za-z_][\\w.]*', NameDecorator),
			rule('(def)(\\s+)([A-Za-z_]\\w*)', bygroups(Keyword, Whitespace, NameFunction)),
			rule('(class)(\\s+)([A-Za-z_]\\w*)', bygroups(Keyword, Whitespace, NameClass)),
			include('expr'),
		],
		expr: [
			rule('\\s+', Whitespace),
			include('strings'),
			rule(words(KEYWORDS, { suffix: '\\b' }), Keyword),
			rule(words(['True', 'False', 'None'], { suffix: '\\b' }), KeywordConstant),
			rule(words(BUILTINS, { suffix: '\\b' }), NameBuiltin),
			rule('(?:\\d+\\.\\d*|\\.\\d+)(?:[eE][+-]?\\d+)?', NumberFloat),
			rule('0[xX][0-9a-fA-F]+', NumberHex),
			rule('\\d+', NumberInteger),
			rule('[A-Za-z_]\\w*', Name),
			rule('\\*\\*=?|//=?|->|[-+*/%@&|^~<>!=]=?', Operator),
			rule('[()\\[\\]{},:;.]', Punctuation),
		],
		strings: [
			rule('([fF])(")', bygroups(StringAffix, StringDouble), 'fstring-double'),
			rule("([fF])(')", bygroups(StringAffix, StringSingle), 'fstring-single'),
			rule(`${STRING_PREFIX}(""")`, bygroups(StringAffix, StringDouble), 'triple-double'),
			rule(`${STRING_PREFIX}(''')`, bygroups(StringAffix, StringSingle), 'triple-single'),
			rule(`${STRING_PREFIX}(")`, bygroups(StringAffix, StringDouble), 'string-double'),
			rule(`${STRING_PREFIX}(')`, bygroups(StringAffix, StringSingle), 'string-single'),
		],
		escape: [rule(ESCAPE, StringEscape)],
		'string-double': [
			include('escape'),
			rule('[^"\\\\\\n]+', StringDouble),
			rule('"', StringDouble, '#pop'),
			rule('\\\\', StringDouble),
			// Unterminated at the end of the line
			rule('\\n', ErrorToken, '#pop'),
		],
		'string-single': [
			include('escape'),
			rule("[^'\\\\\\n]+", StringSingle),
			rule("'", StringSingle, '#pop'),
			rule('\\\\', StringSingle),
			rule('\\n', ErrorToken, '#pop'),
		],
		'triple-double': [
			include('escape'),
			rule('[^"\\\\]+', StringDouble),
			rule('"""', StringDouble, '#pop'),
			rule('["\\\\]', StringDouble),
		],
		'triple-single': [
			include('escape'),
			rule("[^'\\\\]+", StringSingle),
			rule("'''", StringSingle, '#pop'),
			rule("['\\\\]", StringSingle),
		],
		'fstring-double': [
			include('fstring-common'),
			rule('[^"\\\\{}\\n]+', StringDouble),
			rule('"', StringDouble, '#pop'),
			rule('[\\\\}]', StringDouble),
			rule('\\n', ErrorToken, '#pop'),
		],
		'fstring-single': [
			include('fstring-common'),
			rule("[^'\\\\{}\\n]+", StringSingle),
			rule("'", StringSingle, '#pop'),
			rule('[\\\\}]', StringSingle),
			rule('\\n', ErrorToken, '#pop'),
		],
		'fstring-common': [
			rule('\\{\\{|\\}\\}', StringEscape),
			rule('\\{', StringInterpol, 'fstring-expr'),
			include('escape'),
		],
		'fstring-expr': [
			rule('\\}', StringInterpol, '#pop'),
			rule('\\{', Punctuation, 'fstring-brace'),
			rule('![rsa]', StringInterpol),
			// Format spec; brackets excluded so slices stay punctuation
			rule(':[^{}\\[\\]()\\n\'"]*(?=\\})', StringInterpol),
			include('expr'),
		],
		'fstring-brace': [
			rule('\\}', Punctuation, '#pop'),
			rule('\\{', Punctuation, '#push'),
			include('expr'),
		],
	},
})

const SHEBANG = /^#!.*\bpython[\d.]*\b/

const estimatePythonConfidence = (text: string): number =>
	SHEBANG.test(text) ? 1 : 0

export const pythonLexer: LexerDefinition = {
	name: 'python',
	aliases: ['python', 'py', 'python3', 'py3'],
	filenames: ['*.py', '*.pyw', '*.pyi'],
	mimetypes: ['text/x-python', 'application/x-python'],
	grammar: pythonGrammar,
	estimateConfidence: estimatePythonConfidence,
}
