import { speedToDelays, stepDelay } from './curve'
import { createRandomSource, randomIndex } from './sampling'
import type { RandomSource } from './sampling'
import type { SpinDelays, SpinPhase, SpinRenderEvent, Student } from './types'

export const DEFAULT_SLOT_COUNT = 7
export const STRIP_REPEAT = 10
export const FULL_SPINS = 2

export type CancelTimer = () => void

export interface TimerScheduler {
	schedule(callback: () => void, delayMs: number): CancelTimer
}

export const realTimers: TimerScheduler = {
	schedule(callback, delayMs) {
		const handle = setTimeout(callback, delayMs)
		return () => clearTimeout(handle)
	},
}

export interface SpinPlan {
	totalSteps: number
	forwardDistance: number
	landsOnTarget: boolean
}

export interface SpinTimeline {
	strip: string[]
	target: Student
	centerIndex: number
	stepIndex: number
	totalSteps: number
	delays: SpinDelays
}

export interface SpinCallbacks {
	onRender?: (event: SpinRenderEvent) => void
	onLanded?: (student: Student) => void
}

export interface SpinSchedulerOptions extends SpinCallbacks {
	slotCount?: number
	speed?: number
	timers?: TimerScheduler
	random?: RandomSource
}

export function buildStrip(names: string[], repeat = STRIP_REPEAT): string[] {
	if (names.length === 0) return []
	const strip: string[] = []
	for (let i = 0; i < repeat; i++) strip.push(...names)
	return strip
}

export function forwardDistance(targetIndex: number, startIndex: number, size: number): number {
	return (((targetIndex - startIndex) % size) + size) % size
}

export function planSpin(strip: string[], targetName: string, startIndex: number, fullSpins = FULL_SPINS): SpinPlan {
	const size = strip.length
	if (size === 0) return { totalSteps: 0, forwardDistance: 0, landsOnTarget: false }
	let closest: number | undefined
	strip.forEach((name, idx) => {
		if (name !== targetName) return
		const d = forwardDistance(idx, startIndex, size)
		if (closest === undefined || d < closest) closest = d
	})
	if (closest === undefined) {
		return { totalSteps: fullSpins * size, forwardDistance: 0, landsOnTarget: false }
	}
	return { totalSteps: fullSpins * size + closest, forwardDistance: closest, landsOnTarget: true }
}

export function visibleWindow(strip: string[], centerIndex: number, slotCount = DEFAULT_SLOT_COUNT): string[] {
	const size = strip.length
	if (size === 0) return []
	const centerSlot = Math.floor(slotCount / 2)
	const names: string[] = []
	for (let slot = 0; slot < slotCount; slot++) {
		names.push(strip[forwardDistance(centerIndex + slot - centerSlot, 0, size)])
	}
	return names
}

/**
 * Drives one spin at a time over the name strip. Steps are chained through the
 * injected timers, each one scheduled after the previous render returned.
 */
export class SpinScheduler {
	private readonly slotCount: number
	private readonly timers: TimerScheduler
	private readonly random: RandomSource
	private readonly callbacks: SpinCallbacks
	private strip: string[] = []
	private centerIndex = 0
	private delays: SpinDelays
	private phase: SpinPhase = 'idle'
	private timeline?: SpinTimeline
	private landedName?: string
	private cancelPending?: CancelTimer

	constructor(options: SpinSchedulerOptions = {}) {
		this.slotCount = options.slotCount ?? DEFAULT_SLOT_COUNT
		this.timers = options.timers ?? realTimers
		this.random = options.random ?? createRandomSource()
		this.callbacks = { onRender: options.onRender, onLanded: options.onLanded }
		this.delays = speedToDelays(options.speed ?? 50)
	}

	setNames(names: string[]): void {
		this.strip = buildStrip(names)
		this.centerIndex = 0
		if (this.phase === 'landed') this.phase = 'idle'
		this.landedName = undefined
	}

	/** Applies to the next spin; a running timeline keeps its captured delays */
	setSpeed(speed: number): void {
		this.delays = speedToDelays(speed)
	}

	getDelays(): SpinDelays {
		return { ...this.delays }
	}

	getStrip(): readonly string[] {
		return this.strip
	}

	getPhase(): SpinPhase {
		return this.phase
	}

	isSpinning(): boolean {
		return this.phase === 'spinning'
	}

	getTimeline(): Readonly<SpinTimeline> | undefined {
		return this.timeline
	}

	currentWindow(): string[] {
		const names = visibleWindow(this.strip, this.centerIndex, this.slotCount)
		if (this.phase === 'landed' && this.landedName !== undefined && names.length > 0) {
			names[Math.floor(this.slotCount / 2)] = this.landedName
		}
		return names
	}

	/** Returns false when a spin is already running; the request is dropped */
	start(target: Student): boolean {
		if (this.phase === 'spinning') return false
		const strip = this.strip.slice()
		this.landedName = undefined
		if (strip.length === 0) {
			this.phase = 'idle'
			return true
		}
		const startIndex = randomIndex(strip.length, this.random)
		const plan = planSpin(strip, target.name, startIndex)
		this.timeline = {
			strip,
			target,
			centerIndex: startIndex,
			stepIndex: 0,
			totalSteps: plan.totalSteps,
			delays: { ...this.delays },
		}
		this.phase = 'spinning'
		this.step()
		return true
	}

	dispose(): void {
		this.cancelPending?.()
		this.cancelPending = undefined
		this.timeline = undefined
		this.landedName = undefined
		this.phase = 'idle'
	}

	private step(): void {
		this.cancelPending = undefined
		const timeline = this.timeline
		if (!timeline) return
		if (timeline.stepIndex >= timeline.totalSteps) {
			this.land(timeline)
			return
		}
		timeline.centerIndex = (timeline.centerIndex + 1) % timeline.strip.length
		this.centerIndex = timeline.centerIndex
		this.callbacks.onRender?.({
			visibleNames: visibleWindow(timeline.strip, timeline.centerIndex, this.slotCount),
			centerIndex: timeline.centerIndex,
			isFinalStep: false,
		})
		const delay = stepDelay(timeline.stepIndex, timeline.totalSteps, timeline.delays)
		timeline.stepIndex += 1
		this.cancelPending = this.timers.schedule(() => this.step(), delay)
	}

	private land(timeline: SpinTimeline): void {
		this.phase = 'landed'
		this.centerIndex = timeline.centerIndex
		const visibleNames = visibleWindow(timeline.strip, timeline.centerIndex, this.slotCount)
		// force the center slot even if the strip arithmetic drifted
		visibleNames[Math.floor(this.slotCount / 2)] = timeline.target.name
		this.callbacks.onRender?.({ visibleNames, centerIndex: timeline.centerIndex, isFinalStep: true })
		this.timeline = undefined
		this.landedName = timeline.target.name
		this.callbacks.onLanded?.(timeline.target)
	}
}
