/**
 * A toggle node is either a switch for one tag or a branch whose keys are
 * child scopes. `$self` switches the branch's own tag; a branch without it
 * follows its parent.
 */
export type LoggerToggleNode =
	| boolean
	| {
			$self?: boolean
			[scope: string]: LoggerToggleNode | undefined
	  }

export type LoggerToggleTree = Readonly<Record<string, LoggerToggleNode>>

export const LOGGER_TOGGLE_TREE: LoggerToggleTree = {
	lexer: {
		$self: true,
		compiler: true,
		registry: true,
	},
}
