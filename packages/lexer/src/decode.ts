/**
 * Byte input decoding
 */

import { GUESS_ENCODING } from './options'

type DetectedEncoding = 'utf-8' | 'utf-16le' | 'utf-16be'

type ByteOrderMark = {
	encoding: DetectedEncoding
	length: number
}

const BOM_MARKERS: readonly [DetectedEncoding, readonly number[]][] = [
	['utf-8', [0xef, 0xbb, 0xbf]],
	['utf-16le', [0xff, 0xfe]],
	['utf-16be', [0xfe, 0xff]],
]

export const detectBom = (bytes: Uint8Array): ByteOrderMark | undefined => {
	for (const [encoding, signature] of BOM_MARKERS) {
		if (signature.length > bytes.length) continue
		let matches = true
		for (let i = 0; i < signature.length; i++) {
			if (bytes[i] !== signature[i]) {
				matches = false
				break
			}
		}
		if (matches) {
			return { encoding, length: signature.length }
		}
	}
	return undefined
}

const guessDecode = (bytes: Uint8Array): string => {
	const bom = detectBom(bytes)
	if (bom) {
		return new TextDecoder(bom.encoding).decode(bytes.subarray(bom.length))
	}

	try {
		return new TextDecoder('utf-8', { fatal: true }).decode(bytes)
	} catch {
		// Not UTF-8: every byte maps to some character in latin1
		return new TextDecoder('latin1').decode(bytes)
	}
}

/**
 * Decode raw input. `guess` follows a byte order mark when there is one,
 * then tries strict UTF-8, then latin1.
 */
export const decodeInput = (bytes: Uint8Array, encoding: string): string =>
	encoding === GUESS_ENCODING
		? guessDecode(bytes)
		: new TextDecoder(encoding).decode(bytes)
