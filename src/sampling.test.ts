import { describe, expect, it } from 'vitest'
import { createRandomSource, randomIndex, weightedPick } from './sampling'

const fixed = (value: number) => () => value

describe('weightedPick', () => {
	const items = [
		{ item: 'a', weight: 1 },
		{ item: 'b', weight: 3 },
	]

	it('maps the draw onto cumulative weight bounds', () => {
		expect(weightedPick(items, fixed(0))).toBe('a')
		expect(weightedPick(items, fixed(0.2))).toBe('a')
		expect(weightedPick(items, fixed(0.25))).toBe('b')
		expect(weightedPick(items, fixed(0.999))).toBe('b')
	})

	it('skips items without positive weight', () => {
		const withZero = [{ item: 'zero', weight: 0 }, { item: 'neg', weight: -2 }, ...items]
		expect(weightedPick(withZero, fixed(0))).toBe('a')
	})

	it('returns undefined when nothing is eligible', () => {
		expect(weightedPick([], fixed(0.5))).toBeUndefined()
		expect(weightedPick([{ item: 'a', weight: 0 }], fixed(0.5))).toBeUndefined()
	})

	it('falls back to the last eligible item when the draw hits the total', () => {
		expect(weightedPick(items, fixed(1))).toBe('b')
	})
})

describe('createRandomSource', () => {
	it('repeats the same sequence for the same seed', () => {
		const a = createRandomSource({ seed: 'period-3' })
		const b = createRandomSource({ seed: 'period-3' })
		const seqA = Array.from({ length: 5 }, () => a())
		const seqB = Array.from({ length: 5 }, () => b())
		expect(seqA).toEqual(seqB)
		for (const v of seqA) {
			expect(v).toBeGreaterThanOrEqual(0)
			expect(v).toBeLessThan(1)
		}
	})
})

describe('randomIndex', () => {
	it('stays inside [0, size)', () => {
		expect(randomIndex(6, fixed(0))).toBe(0)
		expect(randomIndex(6, fixed(0.5))).toBe(3)
		expect(randomIndex(6, fixed(0.9999999))).toBe(5)
		expect(randomIndex(0, fixed(0.5))).toBe(0)
	})
})
