export type AppearanceMode = 'dark' | 'light'

export type RosterFileType = 'json' | 'csv'

export interface Student {
	id: string
	name: string
	/**
	 * Relative likelihood of being picked; decays on every pick, floored at 0
	 */
	weight: number
	/**
	 * Picks since the last reset-all
	 */
	count: number
}

export type PickResult = { status: 'picked'; student: Student } | { status: 'exhausted' }

export type SpinPhase = 'idle' | 'spinning' | 'landed'

export interface SpinRenderEvent {
	/**
	 * Names in the visible slots, left to right
	 */
	visibleNames: string[]
	centerIndex: number
	isFinalStep: boolean
}

export interface SpinDelays {
	minDelay: number
	maxDelay: number
}

export interface AppSettings {
	appearanceMode: AppearanceMode
	colorTheme: string
	weightDecreaseAmount: number
	spinnerSpeedValue: number
	selectedClassFileName: string
}

export interface ClassFile {
	fileName: string
	path: string
	type: RosterFileType
}
