/**
 * Token Type Taxonomy
 *
 * Token types form a tree addressed by dotted paths (`Keyword.Constant`).
 * Every node is interned, so a path always resolves to the same object.
 */

import standardTypes from './standardTypes.json'

/** Dotted paths of the built-in token types */
export type StandardTokenPath = keyof typeof standardTypes

const internTable = new Map<string, TokenType>()

const SHORT_NAMES = new Map<string, string>(Object.entries(standardTypes))

/** Top-level shorthands for branches that live under `Literal` */
const LITERAL_BRANCHES = new Set(['String', 'Number'])

const normalizeSegments = (segments: readonly string[]): string[] => {
	const parts = segments.flatMap(segment =>
		segment.split('.').filter(part => part.length > 0)
	)
	const [head] = parts
	return head !== undefined && LITERAL_BRANCHES.has(head)
		? ['Literal', ...parts]
		: parts
}

export class TokenType {
	readonly segments: readonly string[]
	readonly parent: TokenType | null
	readonly path: string

	private constructor(segments: readonly string[], parent: TokenType | null) {
		this.segments = Object.freeze([...segments])
		this.parent = parent
		this.path = segments.join('.')
		Object.freeze(this)
	}

	/**
	 * Canonical node for a path. Missing ancestors are created and linked on
	 * the way down.
	 */
	static intern(segments: readonly string[]): TokenType {
		const normalized = normalizeSegments(segments)
		const existing = internTable.get(normalized.join('.'))
		if (existing) return existing

		let node = internTable.get('')
		if (!node) {
			node = new TokenType([], null)
			internTable.set('', node)
		}

		for (let depth = 1; depth <= normalized.length; depth++) {
			const prefix = normalized.slice(0, depth)
			const key = prefix.join('.')
			let next = internTable.get(key)
			if (!next) {
				next = new TokenType(prefix, node)
				internTable.set(key, next)
			}
			node = next
		}

		return node
	}

	get depth(): number {
		return this.segments.length
	}

	get isRoot(): boolean {
		return this.segments.length === 0
	}

	child(name: string): TokenType {
		return TokenType.intern([...this.segments, name])
	}

	/** Whole-segment prefix test: `Name.Function` is a subtype of `Name` */
	isSubtypeOf(other: TokenType): boolean {
		if (other.segments.length > this.segments.length) return false
		for (let i = 0; i < other.segments.length; i++) {
			if (this.segments[i] !== other.segments[i]) return false
		}
		return true
	}

	contains(other: TokenType): boolean {
		return other.isSubtypeOf(this)
	}

	equals(other: TokenType): boolean {
		return this.path === other.path
	}

	toString(): string {
		return this.isRoot ? 'Token' : `Token.${this.path}`
	}
}

export const internTokenType = (segments: readonly string[]): TokenType =>
	TokenType.intern(segments)

/**
 * Look up a token type by dotted path. A leading `Token` segment is accepted
 * and ignored, so `Token.Keyword` and `Keyword` are the same node. `String`
 * and `Number` resolve under `Literal`.
 */
export const tokenType = (path: StandardTokenPath | (string & {})): TokenType => {
	const segments = path.split('.').filter(part => part.length > 0)
	if (segments[0] === 'Token') segments.shift()
	return TokenType.intern(segments)
}

export const isSubtypeOf = (type: TokenType, other: TokenType): boolean =>
	type.isSubtypeOf(other)

/**
 * Short class name for a token type. Types without their own entry take the
 * closest ancestor's name followed by the missing segments:
 * `Name.Function.Custom` → `nf-Custom`.
 */
export const shortName = (type: TokenType): string => {
	let suffix = ''
	let node: TokenType | null = type

	while (node) {
		const name = SHORT_NAMES.get(node.path)
		if (name !== undefined) return name + suffix
		suffix = `-${node.segments[node.segments.length - 1]}${suffix}`
		node = node.parent
	}

	return suffix
}

/** Number of interned nodes, root included */
export const internedTokenTypeCount = (): number => internTable.size

export const RootToken = TokenType.intern([])
export const Text = tokenType('Text')
export const Whitespace = tokenType('Text.Whitespace')
export const ErrorToken = tokenType('Error')
export const Other = tokenType('Other')
