import type { ClassFile, PickResult, SpinRenderEvent } from '../types'

export const EXHAUSTED_MESSAGE = 'All student weights are 0.\nNo one left to pick!'

export const HELP_TEXT = [
	'Commands:',
	'  classes           list class files',
	'  load <file>       load a class file',
	'  pick              pick a student instantly',
	'  spin              pick a student with the spinner',
	'  stats             show picks and weights',
	'  reset             reset weights and counts',
	'  reset-weights     reset weights only',
	'  decay <amount>    set the weight decrease per pick',
	'  speed <0-100>     set the spinner speed',
	'  save              write stats back to the class file',
	'  help              show this help',
	'  quit              exit',
].join('\n')

export function formatPickResult(result: PickResult): string {
	if (result.status === 'exhausted') return EXHAUSTED_MESSAGE
	return `Selected: ${result.student.name}`
}

/** One terminal line per frame; the center slot is bracketed */
export function formatSpinWindow(event: Pick<SpinRenderEvent, 'visibleNames'>): string {
	const center = Math.floor(event.visibleNames.length / 2)
	return event.visibleNames.map((name, i) => (i === center ? `[${name}]` : ` ${name} `)).join(' ')
}

export function formatClassFiles(files: ClassFile[], selected?: string): string {
	if (files.length === 0) return 'No class files found'
	return files.map((f) => `${f.fileName === selected ? '*' : ' '} ${f.fileName}`).join('\n')
}

export function formatSettingChange(label: string, value: number): string {
	return `${label} set to ${value}`
}
