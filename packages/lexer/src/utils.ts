/**
 * Lexer Utility Functions
 */

const REGEX_SPECIAL = /[.*+?^${}()|[\]\\]/g

/**
 * Escape text for literal use inside a regular expression
 */
export const escapeRegExp = (text: string): string =>
	text.replace(REGEX_SPECIAL, '\\$&')

/**
 * Expand tabs to the next multiple of `tabSize` columns. Columns restart
 * after every newline.
 */
export const expandTabs = (text: string, tabSize: number): string => {
	if (tabSize <= 0 || !text.includes('\t')) return text

	let result = ''
	let column = 0
	for (const char of text) {
		if (char === '\t') {
			const width = tabSize - (column % tabSize)
			result += ' '.repeat(width)
			column += width
		} else if (char === '\n' || char === '\r') {
			result += char
			column = 0
		} else {
			result += char
			column++
		}
	}
	return result
}

/**
 * Length in UTF-16 units of the character starting at `index`
 */
export const charLengthAt = (text: string, index: number): number => {
	const code = text.charCodeAt(index)
	if (code >= 0xd800 && code <= 0xdbff && index + 1 < text.length) {
		const next = text.charCodeAt(index + 1)
		if (next >= 0xdc00 && next <= 0xdfff) return 2
	}
	return 1
}

/**
 * Anchored matcher for a filename glob where `*` is any run of characters and
 * `?` one character
 */
export const globToRegExp = (glob: string): RegExp => {
	const source = glob
		.split('')
		.map(char => {
			if (char === '*') return '.*'
			if (char === '?') return '.'
			return escapeRegExp(char)
		})
		.join('')
	return new RegExp(`^${source}$`)
}

/**
 * Last path segment, for either separator
 */
export const baseName = (path: string): string =>
	path.split(/[/\\]/).pop() ?? path
