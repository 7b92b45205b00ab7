import { z } from 'zod'

type EnvRecord = Record<string, string | undefined>

const getProcessEnv = (): EnvRecord => {
	if (typeof process === 'undefined') return {}
	return process.env
}

const parseLevel = (value: unknown): number | undefined => {
	if (typeof value === 'number') return value
	if (typeof value === 'string' && value.trim().length > 0) {
		const parsed = Number.parseInt(value, 10)
		return Number.isNaN(parsed) ? undefined : parsed
	}
	return undefined
}

const envSchema = z.object({
	LOGGER_LEVEL: z.preprocess(
		parseLevel,
		z.number().int().min(0).max(5).optional()
	),
	NODE_ENV: z.enum(['development', 'production', 'test']).optional(),
})

type LoggerEnvData = z.infer<typeof envSchema>

const parseLoggerEnv = (env: EnvRecord): LoggerEnvData => {
	const result = envSchema.safeParse(env)
	if (!result.success) {
		throw new Error(z.prettifyError(result.error))
	}
	return result.data
}

const envData = parseLoggerEnv(getProcessEnv())

const nodeEnv = envData.NODE_ENV ?? 'development'

export const loggerEnv = {
	nodeEnv,
	isDev: nodeEnv === 'development',
	loggerLevel: envData.LOGGER_LEVEL,
}

export { parseLoggerEnv }
export type LoggerEnv = typeof loggerEnv
