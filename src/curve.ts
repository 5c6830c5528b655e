import type { SpinDelays } from './types'

// Millisecond bounds at speed 0 (slow) and speed 100 (fast)
export const SLOW_DELAYS: SpinDelays = { minDelay: 80, maxDelay: 400 }
export const FAST_DELAYS: SpinDelays = { minDelay: 10, maxDelay: 80 }

export const MIN_SPEED = 0
export const MAX_SPEED = 100

export function lerp(from: number, to: number, t: number): number {
	return from + (to - from) * t
}

export function clampSpeed(speed: number): number {
	if (!Number.isFinite(speed)) return MIN_SPEED
	return Math.min(Math.max(speed, MIN_SPEED), MAX_SPEED)
}

export function speedToDelays(speed: number): SpinDelays {
	const t = clampSpeed(speed) / MAX_SPEED
	return {
		minDelay: Math.floor(lerp(SLOW_DELAYS.minDelay, FAST_DELAYS.minDelay, t)),
		maxDelay: Math.floor(lerp(SLOW_DELAYS.maxDelay, FAST_DELAYS.maxDelay, t)),
	}
}

/** Quadratic ease-in: fast at the start, slowest right before landing */
export function stepDelay(step: number, total: number, delays: SpinDelays): number {
	const progress = total > 0 ? step / total : 1
	return Math.floor(delays.minDelay + (delays.maxDelay - delays.minDelay) * progress ** 2)
}
