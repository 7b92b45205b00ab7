export { ScopedLogger, loggers } from './utils/loggers'
export type { Logger, LoggerKey } from './utils/loggers'

export {
	flattenToggleTree,
	isLoggerEnabled,
	resetLoggerToggles,
	setLoggerEnabled,
} from './utils/toggles'
export type { LoggerToggleNode, LoggerToggleTree } from './utils/toggleDefaults'

export { loggerEnv, parseLoggerEnv } from './env'
export type { LoggerEnv } from './env'
