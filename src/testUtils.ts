import type { CancelTimer, TimerScheduler } from './spin'

interface Entry {
	at: number
	seq: number
	callback: () => void
}

/** Manually advanced clock for driving timer-based code in tests */
export class VirtualClock implements TimerScheduler {
	now = 0
	readonly delays: number[] = []
	private queue: Entry[] = []
	private seq = 0

	schedule(callback: () => void, delayMs: number): CancelTimer {
		const entry: Entry = { at: this.now + delayMs, seq: this.seq++, callback }
		this.queue.push(entry)
		this.delays.push(delayMs)
		return () => {
			this.queue = this.queue.filter((e) => e !== entry)
		}
	}

	pending(): number {
		return this.queue.length
	}

	/** Runs callbacks due within the next `ms`, including ones they schedule */
	advance(ms: number): void {
		const until = this.now + ms
		for (;;) {
			const next = this.nextDue()
			if (!next || next.at > until) break
			this.fire(next)
		}
		this.now = until
	}

	runAll(limit = 100_000): void {
		for (let i = 0; i < limit; i++) {
			const next = this.nextDue()
			if (!next) return
			this.fire(next)
		}
		throw new Error(`VirtualClock still busy after ${limit} callbacks`)
	}

	private nextDue(): Entry | undefined {
		let next: Entry | undefined
		for (const e of this.queue) {
			if (!next || e.at < next.at || (e.at === next.at && e.seq < next.seq)) next = e
		}
		return next
	}

	private fire(entry: Entry): void {
		this.queue = this.queue.filter((e) => e !== entry)
		this.now = entry.at
		entry.callback()
	}
}

export function sequentialIds(prefix = 'id'): () => string {
	let n = 0
	return () => `${prefix}-${++n}`
}
