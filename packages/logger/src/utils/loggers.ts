import { consola, type ConsolaInstance } from './consola'
import { isLoggerEnabled, normalizeTag } from './toggles'

type LogLevel = 'debug' | 'info' | 'warn' | 'error'

/**
 * consola logger bound to one `:`-joined tag. Calls are dropped while the
 * tag is switched off.
 */
export class ScopedLogger {
	readonly tag: string
	private readonly base: ConsolaInstance
	private readonly output: ConsolaInstance
	private readonly children = new Map<string, ScopedLogger>()

	constructor(tag: string, base: ConsolaInstance = consola) {
		this.tag = normalizeTag(tag)
		this.base = base
		this.output = base.withTag(this.tag)
	}

	get enabled(): boolean {
		return isLoggerEnabled(this.tag)
	}

	/** Child logger for `tag:scope`; the same scope returns the same logger */
	withTag(scope: string): ScopedLogger {
		const child = normalizeTag(scope)
		let logger = this.children.get(child)
		if (!logger) {
			logger = new ScopedLogger(`${this.tag}:${child}`, this.base)
			this.children.set(child, logger)
		}
		return logger
	}

	debug(message: unknown, ...args: unknown[]): void {
		this.write('debug', message, args)
	}

	info(message: unknown, ...args: unknown[]): void {
		this.write('info', message, args)
	}

	warn(message: unknown, ...args: unknown[]): void {
		this.write('warn', message, args)
	}

	error(message: unknown, ...args: unknown[]): void {
		this.write('error', message, args)
	}

	private write(level: LogLevel, message: unknown, args: unknown[]): void {
		if (!this.enabled) return
		this.output[level](message, ...args)
	}
}

export type Logger = ScopedLogger

export const loggers = Object.freeze({
	lexer: new ScopedLogger('lexer'),
})

export type LoggerKey = keyof typeof loggers
