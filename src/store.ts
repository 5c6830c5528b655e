import { createStore } from 'zustand/vanilla'
import type { StoreApi } from 'zustand/vanilla'
import { DEFAULT_WEIGHT, RosterModel } from './roster'
import type { RandomSource } from './sampling'
import { DEFAULT_SETTINGS, describeError, parseSpinnerSpeed, parseWeightDecrease, saveSettings } from './settings'
import type { AppPaths } from './settings'
import { SpinScheduler } from './spin'
import type { TimerScheduler } from './spin'
import type { AppearanceMode, AppSettings, ClassFile, PickResult, SpinPhase, Student } from './types'
import { listClassFiles, loadStudentsFromFile, saveStudentsToFile } from './utils/rosterFile'

export interface SpinView {
	visibleNames: string[]
	centerIndex: number
	phase: SpinPhase
	landedName?: string
}

interface UIState {
	students: Student[]
	classFiles: ClassFile[]
	currentClassFile?: ClassFile
	settings: AppSettings
	lastPick?: Student
	spin: SpinView
	/**
	 * Set once every weight reached 0; cleared by either reset
	 */
	picksDisabled: boolean
	isLoading: boolean
	error?: string
}

interface Actions {
	refreshClassFiles: () => Promise<ClassFile[]>
	loadClassFile: (fileName: string) => Promise<boolean>
	autoLoadSavedClass: () => Promise<boolean>
	pickInstant: () => PickResult | undefined
	spin: () => PickResult | undefined
	resetAllStudents: () => void
	resetWeights: () => void
	applyWeightDecrease: (input: string | number) => Promise<boolean>
	setSpinnerSpeed: (input: string | number) => Promise<boolean>
	setAppearance: (mode: AppearanceMode) => Promise<void>
	setColorTheme: (theme: string) => Promise<void>
	saveRoster: () => Promise<boolean>
	clearError: () => void
	shutdown: () => Promise<void>
}

export type PickerState = UIState & Actions
export type PickerStore = StoreApi<PickerState>

export interface PickerStoreDeps {
	paths: AppPaths
	settings?: AppSettings
	random?: RandomSource
	timers?: TimerScheduler
	makeId?: () => string
}

export const NO_STUDENTS_MESSAGE = 'No students loaded. Choose a class list first.'

export function createPickerStore(deps: PickerStoreDeps): PickerStore {
	const initialSettings: AppSettings = { ...(deps.settings ?? DEFAULT_SETTINGS) }
	const roster = new RosterModel([], {
		weightDecreaseAmount: initialSettings.weightDecreaseAmount,
		random: deps.random,
	})

	return createStore<PickerState>((set, get) => {
		const spinner = new SpinScheduler({
			speed: initialSettings.spinnerSpeedValue,
			timers: deps.timers,
			random: deps.random,
			onRender(event) {
				set({ spin: { ...get().spin, visibleNames: event.visibleNames, centerIndex: event.centerIndex, phase: spinner.getPhase() } })
			},
			onLanded(student) {
				console.log('[Store]', 'Spin landed', { name: student.name })
				set({ spin: { ...get().spin, phase: 'landed', landedName: student.name } })
			},
		})

		function snapshot(): Pick<UIState, 'students' | 'picksDisabled'> {
			return {
				students: roster.getStudents().map((s) => ({ ...s })),
				picksDisabled: roster.allWeightsZero(),
			}
		}

		function idleSpinView(): SpinView {
			return { visibleNames: spinner.currentWindow(), centerIndex: 0, phase: spinner.getPhase() }
		}

		async function persistSettings(patch: Partial<AppSettings>): Promise<void> {
			const settings = { ...get().settings, ...patch }
			set({ settings })
			try {
				await saveSettings(deps.paths.settingsFile, settings)
			} catch (e) {
				console.warn('[Store]', 'Could not save settings', { error: describeError(e) })
			}
		}

		function pickWith(start?: (student: Student) => void): PickResult | undefined {
			if (roster.isEmpty()) {
				set({ error: NO_STUDENTS_MESSAGE })
				return undefined
			}
			const result = roster.pickRandomStudent()
			if (result.status === 'exhausted') {
				console.log('[Store]', 'All weights are 0; picks disabled')
				set({ picksDisabled: true, lastPick: undefined })
				return result
			}
			set({ ...snapshot(), lastPick: { ...result.student }, error: undefined })
			start?.(result.student)
			return result
		}

		function afterReset(): void {
			if (!spinner.isSpinning()) spinner.setNames(roster.getStudentNameList())
			set({ ...snapshot(), picksDisabled: false, spin: spinner.isSpinning() ? get().spin : idleSpinView() })
		}

		return {
			students: [],
			classFiles: [],
			settings: initialSettings,
			spin: { visibleNames: [], centerIndex: 0, phase: 'idle' },
			picksDisabled: false,
			isLoading: false,

			async refreshClassFiles() {
				const classFiles = await listClassFiles(deps.paths.classesDir)
				set({ classFiles })
				return classFiles
			},

			async loadClassFile(fileName) {
				set({ isLoading: true, error: undefined })
				try {
					let classFile = get().classFiles.find((f) => f.fileName === fileName)
					if (!classFile) {
						classFile = (await get().refreshClassFiles()).find((f) => f.fileName === fileName)
					}
					if (!classFile) throw new Error(`Class file not found: ${fileName}`)
					const students = await loadStudentsFromFile(classFile.path, deps.makeId)
					roster.setStudentsFromList(students)
					spinner.dispose()
					spinner.setNames(roster.getStudentNameList())
					console.log('[Store]', 'Loaded class file', { fileName, count: students.length })
					set({ ...snapshot(), currentClassFile: classFile, lastPick: undefined, spin: idleSpinView() })
					await persistSettings({ selectedClassFileName: classFile.fileName })
					return true
				} catch (e) {
					console.error('[Store]', 'Error loading students', { fileName, error: describeError(e) })
					set({ error: `Could not load students: ${describeError(e)}` })
					return false
				} finally {
					set({ isLoading: false })
				}
			},

			async autoLoadSavedClass() {
				const saved = get().settings.selectedClassFileName
				if (!saved) return false
				const classFiles = await get().refreshClassFiles()
				if (!classFiles.some((f) => f.fileName === saved)) return false
				return get().loadClassFile(saved)
			},

			pickInstant() {
				return pickWith()
			},

			spin() {
				if (!roster.isEmpty() && spinner.isSpinning()) return undefined
				return pickWith((student) => {
					set({ spin: { ...get().spin, phase: 'spinning', landedName: undefined } })
					spinner.start(student)
				})
			},

			resetAllStudents() {
				roster.resetAllStudents(DEFAULT_WEIGHT)
				afterReset()
			},

			resetWeights() {
				roster.resetAllWeights(DEFAULT_WEIGHT)
				afterReset()
			},

			async applyWeightDecrease(input) {
				let amount: number
				try {
					amount = parseWeightDecrease(input)
				} catch (e) {
					set({ error: describeError(e) })
					return false
				}
				roster.setWeightDecreaseAmount(amount)
				set({ error: undefined })
				await persistSettings({ weightDecreaseAmount: amount })
				return true
			},

			async setSpinnerSpeed(input) {
				let speed: number
				try {
					speed = parseSpinnerSpeed(input)
				} catch (e) {
					set({ error: describeError(e) })
					return false
				}
				spinner.setSpeed(speed)
				set({ error: undefined })
				await persistSettings({ spinnerSpeedValue: speed })
				return true
			},

			async setAppearance(mode) {
				await persistSettings({ appearanceMode: mode })
			},

			async setColorTheme(theme) {
				await persistSettings({ colorTheme: theme })
			},

			async saveRoster() {
				const classFile = get().currentClassFile
				if (!classFile) return false
				try {
					await saveStudentsToFile(classFile.path, roster.getStudents())
					console.log('[Store]', 'Saved class file', { fileName: classFile.fileName })
					return true
				} catch (e) {
					console.error('[Store]', 'Error saving students', { fileName: classFile.fileName, error: describeError(e) })
					set({ error: `Could not save students: ${describeError(e)}` })
					return false
				}
			},

			clearError() {
				set({ error: undefined })
			},

			async shutdown() {
				spinner.dispose()
				await persistSettings({})
			},
		}
	})
}
