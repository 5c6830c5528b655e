import { promises as fs } from 'fs'
import path from 'path'
import type { ClassFile, RosterFileType, Student } from '../types'
import { studentsFromCsv, studentsToCsv } from './csv'
import { toStudents } from './students'
import type { RosterRecord } from './students'

export function rosterFileType(fileName: string): RosterFileType | undefined {
	const ext = path.extname(fileName).toLowerCase()
	if (ext === '.json') return 'json'
	if (ext === '.csv') return 'csv'
	return undefined
}

export function studentsFromJson(text: string, makeId?: () => string): Student[] {
	const raw: unknown = JSON.parse(text)
	const items: unknown[] = Array.isArray(raw) ? raw : typeof raw === 'object' && raw !== null ? Object.values(raw) : []
	const records: RosterRecord[] = items.map((item) => {
		if (typeof item === 'object' && item !== null && !Array.isArray(item)) {
			return {
				name: 'name' in item ? item.name : undefined,
				weight: 'weight' in item ? item.weight : undefined,
				count: 'count' in item ? item.count : undefined,
			}
		}
		return { name: item }
	})
	const students = toStudents(records, makeId)
	if (students.length === 0) {
		throw new Error("No valid students found in JSON file. Each item should have at least a 'name'.")
	}
	return students
}

export function studentsToJson(students: readonly Student[]): string {
	return JSON.stringify(
		students.map((s) => ({ name: s.name, weight: s.weight, count: s.count })),
		null,
		4,
	)
}

export async function loadStudentsFromFile(filePath: string, makeId?: () => string): Promise<Student[]> {
	const type = rosterFileType(filePath)
	if (!type) throw new Error('Unsupported file type. Please use a .json or .csv file.')
	const text = await fs.readFile(filePath, 'utf-8')
	return type === 'json' ? studentsFromJson(text, makeId) : studentsFromCsv(text, makeId)
}

export async function saveStudentsToFile(filePath: string, students: readonly Student[]): Promise<void> {
	const type = rosterFileType(filePath)
	if (!type) throw new Error('Unsupported file type. Please use a .json or .csv file.')
	const text = type === 'json' ? studentsToJson(students) : studentsToCsv(students)
	await fs.writeFile(filePath, text, 'utf-8')
}

export async function listClassFiles(classesDir: string): Promise<ClassFile[]> {
	await fs.mkdir(classesDir, { recursive: true })
	const entries = await fs.readdir(classesDir, { withFileTypes: true })
	const files: ClassFile[] = []
	for (const entry of entries) {
		if (!entry.isFile()) continue
		const type = rosterFileType(entry.name)
		if (type) files.push({ fileName: entry.name, path: path.join(classesDir, entry.name), type })
	}
	return files.sort((a, b) => (a.fileName < b.fileName ? -1 : a.fileName > b.fileName ? 1 : 0))
}
