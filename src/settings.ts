import { promises as fs } from 'fs'
import os from 'os'
import path from 'path'
import { z } from 'zod'
import { clampSpeed } from './curve'
import type { AppSettings } from './types'

export const DEFAULT_SETTINGS: AppSettings = {
	appearanceMode: 'dark',
	colorTheme: 'blue',
	weightDecreaseAmount: 0.1,
	spinnerSpeedValue: 50,
	selectedClassFileName: '',
}

// each field falls back on its own so one bad value does not reset the rest
export const appSettingsSchema = z.object({
	appearanceMode: z.enum(['dark', 'light']).catch(DEFAULT_SETTINGS.appearanceMode),
	colorTheme: z.string().min(1).catch(DEFAULT_SETTINGS.colorTheme),
	weightDecreaseAmount: z.coerce.number().finite().positive().catch(DEFAULT_SETTINGS.weightDecreaseAmount),
	spinnerSpeedValue: z.coerce.number().finite().min(0).max(100).catch(DEFAULT_SETTINGS.spinnerSpeedValue),
	selectedClassFileName: z.string().catch(DEFAULT_SETTINGS.selectedClassFileName),
})

const weightDecreaseSchema = z.coerce.number().finite().positive()

export const WEIGHT_DECREASE_ERROR = 'Weight decrease must be a positive number.'

export function parseWeightDecrease(input: string | number): number {
	if (typeof input === 'string' && input.trim() === '') throw new Error(WEIGHT_DECREASE_ERROR)
	const parsed = weightDecreaseSchema.safeParse(input)
	if (!parsed.success) throw new Error(WEIGHT_DECREASE_ERROR)
	return parsed.data
}

const spinnerSpeedSchema = z.coerce.number().finite()

export const SPINNER_SPEED_ERROR = 'Spinner speed must be a number between 0 and 100.'

/** Out-of-range numbers are clamped; anything non-numeric throws */
export function parseSpinnerSpeed(input: string | number): number {
	if (typeof input === 'string' && input.trim() === '') throw new Error(SPINNER_SPEED_ERROR)
	const parsed = spinnerSpeedSchema.safeParse(input)
	if (!parsed.success) throw new Error(SPINNER_SPEED_ERROR)
	return clampSpeed(parsed.data)
}

export interface AppPaths {
	baseDir: string
	settingsFile: string
	classesDir: string
}

export function resolveAppPaths(env: NodeJS.ProcessEnv = process.env): AppPaths {
	const baseDir = env.STUDENT_PICKER_HOME || path.join(os.homedir(), 'Documents', 'randomStudentPicker')
	return {
		baseDir,
		settingsFile: path.join(baseDir, 'settings.json'),
		classesDir: path.join(baseDir, 'classes'),
	}
}

export function normalizeSettings(raw: unknown): AppSettings {
	const source = typeof raw === 'object' && raw !== null ? raw : {}
	return appSettingsSchema.parse(source)
}

export async function loadSettings(settingsFile: string): Promise<AppSettings> {
	let text: string
	try {
		text = await fs.readFile(settingsFile, 'utf-8')
	} catch (e) {
		if (isMissingFile(e)) return { ...DEFAULT_SETTINGS }
		console.error('[Settings]', 'Could not read settings file', { settingsFile, error: describeError(e) })
		return { ...DEFAULT_SETTINGS }
	}
	try {
		return normalizeSettings(JSON.parse(text))
	} catch (e) {
		console.error('[Settings]', 'Invalid settings file, using defaults', { settingsFile, error: describeError(e) })
		return { ...DEFAULT_SETTINGS }
	}
}

export async function saveSettings(settingsFile: string, settings: AppSettings): Promise<void> {
	await fs.mkdir(path.dirname(settingsFile), { recursive: true })
	await fs.writeFile(settingsFile, JSON.stringify(settings, null, 4), 'utf-8')
}

export function isMissingFile(e: unknown): boolean {
	return typeof e === 'object' && e !== null && 'code' in e && e.code === 'ENOENT'
}

export function describeError(e: unknown): string {
	return e instanceof Error ? e.message : String(e)
}
