import { describe, expect, test } from 'vitest'
import { decodeInput, detectBom } from './decode'

describe('detectBom', () => {
	test('recognizes byte order marks', () => {
		expect(detectBom(new Uint8Array([0xef, 0xbb, 0xbf, 0x61]))).toEqual({
			encoding: 'utf-8',
			length: 3,
		})
		expect(detectBom(new Uint8Array([0xff, 0xfe]))).toEqual({
			encoding: 'utf-16le',
			length: 2,
		})
		expect(detectBom(new Uint8Array([0xfe, 0xff, 0x00]))).toEqual({
			encoding: 'utf-16be',
			length: 2,
		})
	})

	test('returns undefined without one', () => {
		expect(detectBom(new Uint8Array([0x61, 0x62]))).toBeUndefined()
		expect(detectBom(new Uint8Array([]))).toBeUndefined()
	})
})

describe('decodeInput', () => {
	test('guess follows the byte order mark', () => {
		expect(
			decodeInput(new Uint8Array([0xff, 0xfe, 0x68, 0x00, 0x69, 0x00]), 'guess')
		).toBe('hi')
	})

	test('guess prefers UTF-8', () => {
		expect(decodeInput(new Uint8Array([0x63, 0xc3, 0xa9]), 'guess')).toBe('cé')
	})

	test('guess falls back to latin1', () => {
		expect(decodeInput(new Uint8Array([0x63, 0x61, 0x66, 0xe9]), 'guess')).toBe(
			'café'
		)
	})

	test('uses a named encoding as given', () => {
		expect(decodeInput(new Uint8Array([0x00, 0x68]), 'utf-16be')).toBe('h')
	})
})
