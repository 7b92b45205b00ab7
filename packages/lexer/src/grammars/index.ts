import { iniLexer } from './ini'
import { jsonLexer } from './json'
import { pythonLexer } from './python'
import { textLexer } from './text'

export { iniGrammar, iniLexer } from './ini'
export { jsonGrammar, jsonLexer } from './json'
export { pythonGrammar, pythonLexer } from './python'
export { textGrammar, textLexer } from './text'

export const BUILTIN_LEXERS = [textLexer, jsonLexer, iniLexer, pythonLexer] as const
