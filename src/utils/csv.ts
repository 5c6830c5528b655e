import Papa from 'papaparse'
import type { ParseResult } from 'papaparse'
import type { Student } from '../types'
import { toStudents } from './students'
import type { RosterRecord } from './students'

export const ROSTER_CSV_FIELDS = ['name', 'weight', 'count']

export interface RosterRow {
	name?: string
	weight?: string
	count?: string
}

export function parseRosterCsv(text: string): RosterRow[] {
	const res: ParseResult<RosterRow> = Papa.parse<RosterRow>(text, {
		header: true,
		skipEmptyLines: true,
		transformHeader: (h) => h.trim().toLowerCase(),
	})
	return res.data
}

export function studentsFromCsv(text: string, makeId?: () => string): Student[] {
	const records: RosterRecord[] = parseRosterCsv(text).map((r) => ({ name: r.name, weight: r.weight, count: r.count }))
	const students = toStudents(records, makeId)
	if (students.length === 0) {
		throw new Error(
			"No valid students found in CSV file. Make sure it has a 'name' column and optionally 'weight' and 'count' columns.",
		)
	}
	return students
}

export function studentsToCsv(students: readonly Student[]): string {
	return Papa.unparse({ fields: ROSTER_CSV_FIELDS, data: students.map((s) => [s.name, s.weight, s.count]) })
}
