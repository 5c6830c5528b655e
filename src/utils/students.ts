import { v4 as uuidv4 } from 'uuid'
import { DEFAULT_WEIGHT } from '../roster'
import type { Student } from '../types'

export const DEFAULT_COUNT = 0

/** One roster entry as read from a file, before defaults are applied */
export interface RosterRecord {
	name?: unknown
	weight?: unknown
	count?: unknown
}

export function parseWeight(raw: unknown): number {
	const value = typeof raw === 'string' ? (raw.trim() === '' ? NaN : Number(raw)) : raw
	if (typeof value !== 'number' || !Number.isFinite(value)) return DEFAULT_WEIGHT
	return Math.max(value, 0)
}

export function parseCount(raw: unknown): number {
	let value: number | undefined
	if (typeof raw === 'number' && Number.isFinite(raw)) value = Math.trunc(raw)
	else if (typeof raw === 'string' && /^[+-]?\d+$/.test(raw.trim())) value = parseInt(raw.trim(), 10)
	if (value === undefined || value < 0) return DEFAULT_COUNT
	return value
}

export function toStudents(records: RosterRecord[], makeId: () => string = uuidv4): Student[] {
	const students: Student[] = []
	for (const r of records) {
		const name = typeof r.name === 'string' || typeof r.name === 'number' ? String(r.name).trim() : ''
		if (!name) continue
		students.push({ id: makeId(), name, weight: parseWeight(r.weight), count: parseCount(r.count) })
	}
	return students
}
