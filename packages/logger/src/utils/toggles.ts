import {
	LOGGER_TOGGLE_TREE,
	type LoggerToggleNode,
	type LoggerToggleTree,
} from './toggleDefaults'

const TAG_SEPARATOR = ':'

/** Tags with no switch of their own or on any ancestor */
const ENABLED_BY_DEFAULT = true

const switches = new Map<string, boolean>()

export const normalizeTag = (tag: string): string => {
	const normalized = tag.trim()
	if (!normalized) {
		throw new Error('Logger tag cannot be empty.')
	}
	return normalized
}

const flattenNode = (
	tag: string,
	node: LoggerToggleNode | undefined,
	target: Map<string, boolean>
): void => {
	if (node === undefined) return
	if (typeof node === 'boolean') {
		target.set(tag, node)
		return
	}

	if (node.$self !== undefined) target.set(tag, node.$self)
	for (const [scope, child] of Object.entries(node)) {
		if (scope === '$self') continue
		flattenNode(`${tag}${TAG_SEPARATOR}${scope}`, child, target)
	}
}

/**
 * Explicit switches of a toggle tree, keyed by full tag
 * (`{ lexer: { compiler: false } }` → `lexer:compiler`)
 */
export const flattenToggleTree = (
	tree: LoggerToggleTree
): Map<string, boolean> => {
	const flat = new Map<string, boolean>()
	for (const [scope, node] of Object.entries(tree)) {
		flattenNode(scope, node, flat)
	}
	return flat
}

/** Replace every switch with the ones in `tree` */
export const resetLoggerToggles = (
	tree: LoggerToggleTree = LOGGER_TOGGLE_TREE
): void => {
	switches.clear()
	for (const [tag, enabled] of flattenToggleTree(tree)) {
		switches.set(tag, enabled)
	}
}

/**
 * Whether `tag` logs: its own switch, else the closest ancestor's
 */
export const isLoggerEnabled = (tag: string): boolean => {
	let current = normalizeTag(tag)
	for (;;) {
		const enabled = switches.get(current)
		if (enabled !== undefined) return enabled

		const cut = current.lastIndexOf(TAG_SEPARATOR)
		if (cut === -1) return ENABLED_BY_DEFAULT
		current = current.slice(0, cut)
	}
}

/**
 * Switch `tag` on or off. Switches set on its descendants are dropped, so the
 * whole subtree follows.
 */
export const setLoggerEnabled = (tag: string, enabled: boolean): void => {
	const normalized = normalizeTag(tag)
	const prefix = `${normalized}${TAG_SEPARATOR}`
	for (const key of [...switches.keys()]) {
		if (key.startsWith(prefix)) switches.delete(key)
	}
	switches.set(normalized, enabled)
}

resetLoggerToggles()
