import fc from 'fast-check'
import { describe, expect, it } from 'vitest'
import { RootToken, internTokenType } from './tokenType'

const segmentsArb = fc.array(fc.constantFrom('A', 'B', 'C'), { maxLength: 4 })

describe('TokenType properties', () => {
	it('subtyping is transitive', () => {
		fc.assert(
			fc.property(segmentsArb, segmentsArb, segmentsArb, (a, b, c) => {
				const [x, y, z] = [internTokenType(a), internTokenType(b), internTokenType(c)]
				if (x.isSubtypeOf(y) && y.isSubtypeOf(z)) {
					expect(x.isSubtypeOf(z)).toBe(true)
				}
			}),
			{ numRuns: 300 }
		)
	})

	it('every node is under the root and only the root is under every node', () => {
		fc.assert(
			fc.property(segmentsArb, segments => {
				const node = internTokenType(segments)
				expect(node.isSubtypeOf(RootToken)).toBe(true)
				expect(RootToken.isSubtypeOf(node)).toBe(segments.length === 0)
			})
		)
	})

	it('equal paths intern to one node', () => {
		fc.assert(
			fc.property(segmentsArb, segments => {
				expect(internTokenType([...segments])).toBe(internTokenType(segments))
				expect(internTokenType(segments).path).toBe(segments.join('.'))
			})
		)
	})
})
