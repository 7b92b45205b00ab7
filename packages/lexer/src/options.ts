import { z } from 'zod'
import { LexerOptionsError } from './errors'

export const lexerOptionsSchema = z.strictObject({
	/** Drop leading and trailing newlines */
	stripNewlines: z.boolean().default(true),
	/** Drop all leading and trailing whitespace (wins over `stripNewlines`) */
	stripAll: z.boolean().default(false),
	/** Make sure the text ends with a newline */
	ensureNewline: z.boolean().default(true),
	/** Expand tabs to this many columns; 0 keeps them */
	tabSize: z.number().int().min(0).default(0),
	/** Encoding for byte input: a TextDecoder label, or `guess` */
	inputEncoding: z.string().trim().min(1).default('guess'),
})

export type LexerOptionsInput = z.input<typeof lexerOptionsSchema>
export type LexerOptions = z.output<typeof lexerOptionsSchema>

export const GUESS_ENCODING = 'guess'

export const parseLexerOptions = (
	input: LexerOptionsInput = {},
	grammar: string | null = null
): LexerOptions => {
	const result = lexerOptionsSchema.safeParse(input)
	if (!result.success) {
		throw new LexerOptionsError(z.prettifyError(result.error), grammar)
	}

	const options = result.data
	if (options.inputEncoding !== GUESS_ENCODING) {
		try {
			new TextDecoder(options.inputEncoding)
		} catch (error) {
			throw new LexerOptionsError(
				`Unknown input encoding "${options.inputEncoding}"`,
				grammar,
				{ cause: error }
			)
		}
	}
	return options
}
