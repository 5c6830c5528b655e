import seedrandom from 'seedrandom'

export interface WeightedItem<T> {
	item: T
	weight: number
}

export interface SamplerOptions {
	seed?: string
}

/** Uniform source over [0, 1) */
export type RandomSource = () => number

export function createRandomSource(options?: SamplerOptions): RandomSource {
	const rng = seedrandom(options?.seed ?? undefined)
	return () => rng.quick()
}

export function randomIndex(size: number, random: RandomSource): number {
	if (size <= 0) return 0
	return Math.min(Math.floor(random() * size), size - 1)
}

/**
 * Single weighted draw: cumulative bounds over the positive weights, one
 * uniform sample over [0, total). Items with weight <= 0 are never chosen.
 */
export function weightedPick<T>(items: WeightedItem<T>[], random: RandomSource): T | undefined {
	const eligible = items.filter((it) => it.weight > 0)
	if (eligible.length === 0) return undefined
	const bounds: number[] = []
	let total = 0
	for (const it of eligible) {
		total += it.weight
		bounds.push(total)
	}
	const r = random() * total
	for (let j = 0; j < eligible.length; j++) {
		if (r < bounds[j]) return eligible[j].item
	}
	// r can only reach total through rounding
	return eligible[eligible.length - 1].item
}
