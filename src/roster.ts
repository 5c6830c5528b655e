import { createRandomSource, weightedPick } from './sampling'
import type { RandomSource } from './sampling'
import type { PickResult, Student } from './types'

export const DEFAULT_WEIGHT = 0.5
export const DEFAULT_WEIGHT_DECREASE = 0.1

const WEIGHT_EPSILON = 1e-9
const NAME_WIDTH = 20
const PICKS_WIDTH = 7
const WEIGHT_WIDTH = 8

export class RosterModel {
	private students: Student[]
	private weightDecreaseAmount: number
	private readonly random: RandomSource

	constructor(students: Student[] = [], options?: { weightDecreaseAmount?: number; random?: RandomSource }) {
		this.students = students.slice()
		this.weightDecreaseAmount = options?.weightDecreaseAmount ?? DEFAULT_WEIGHT_DECREASE
		this.random = options?.random ?? createRandomSource()
	}

	pickRandomStudent(): PickResult {
		const selected = weightedPick(
			this.students.map((student) => ({ item: student, weight: student.weight })),
			this.random,
		)
		if (!selected) return { status: 'exhausted' }
		selected.count += 1
		const next = selected.weight - this.weightDecreaseAmount
		// Remainders within rounding error of the step count as spent
		selected.weight = next <= this.weightDecreaseAmount * WEIGHT_EPSILON ? 0 : next
		return { status: 'picked', student: selected }
	}

	resetAllStudents(defaultWeight = DEFAULT_WEIGHT): void {
		for (const student of this.students) {
			student.count = 0
			student.weight = defaultWeight
		}
	}

	resetAllWeights(defaultWeight = DEFAULT_WEIGHT): void {
		for (const student of this.students) student.weight = defaultWeight
	}

	setStudentsFromList(students: Student[]): void {
		this.students = students.slice()
	}

	allWeightsZero(): boolean {
		if (this.students.length === 0) return false
		return this.students.every((student) => student.weight <= 0)
	}

	getStudents(): readonly Student[] {
		return this.students
	}

	getStudentNameList(): string[] {
		return this.students.map((student) => student.name)
	}

	isEmpty(): boolean {
		return this.students.length === 0
	}

	/** Callers validate the amount first (see parseWeightDecrease) */
	setWeightDecreaseAmount(amount: number): void {
		this.weightDecreaseAmount = amount
	}

	getStudentSummaryLines(): string[] {
		return this.students.map((s) => `${s.name}: picks=${s.count}, weight=${s.weight.toFixed(2)}`)
	}
}

export function formatStatsTable(students: readonly Student[]): string {
	const header = `${'Name'.padEnd(NAME_WIDTH)} ${'Picks'.padStart(PICKS_WIDTH)} ${'Weight'.padStart(WEIGHT_WIDTH)}`
	const lines = [header, '─'.repeat(header.length)]
	for (const s of students) {
		lines.push(
			`${s.name.padEnd(NAME_WIDTH)} ${String(s.count).padStart(PICKS_WIDTH)} ${s.weight.toFixed(2).padStart(WEIGHT_WIDTH)}`,
		)
	}
	return lines.join('\n')
}
