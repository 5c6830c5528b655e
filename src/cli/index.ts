import readline from 'readline'
import { formatStatsTable } from '../roster'
import { describeError, loadSettings, resolveAppPaths } from '../settings'
import { createPickerStore } from '../store'
import type { PickerStore } from '../store'
import { formatClassFiles, formatPickResult, formatSettingChange, formatSpinWindow, HELP_TEXT } from './render'

function ask(rl: readline.Interface, prompt: string): Promise<string> {
	return new Promise((resolve) => rl.question(prompt, resolve))
}

function waitForSpin(store: PickerStore): Promise<void> {
	return new Promise((resolve) => {
		if (store.getState().spin.phase !== 'spinning') {
			resolve()
			return
		}
		const unsubscribe = store.subscribe((state) => {
			if (state.spin.phase === 'spinning') return
			unsubscribe()
			resolve()
		})
	})
}

function printError(store: PickerStore): void {
	const { error, clearError } = store.getState()
	if (!error) return
	console.log(`\n${error}\n`)
	clearError()
}

async function runCommand(store: PickerStore, line: string): Promise<boolean> {
	const [command = '', ...rest] = line.trim().split(/\s+/)
	const arg = rest.join(' ')
	const state = store.getState()

	switch (command) {
		case '':
			return true
		case 'help':
			console.log(HELP_TEXT)
			return true
		case 'classes': {
			const files = await state.refreshClassFiles()
			console.log(formatClassFiles(files, state.currentClassFile?.fileName))
			return true
		}
		case 'load':
			if (await state.loadClassFile(arg)) {
				console.log(`Loaded ${store.getState().students.length} students from ${arg}`)
			}
			return true
		case 'pick':
		case 'spin': {
			if (state.picksDisabled) {
				console.log(formatPickResult({ status: 'exhausted' }))
				return true
			}
			const result = command === 'pick' ? state.pickInstant() : state.spin()
			if (!result) return true
			if (command === 'spin' && result.status === 'picked') {
				await waitForSpin(store)
				process.stdout.write('\n')
			}
			console.log(formatPickResult(result))
			if (store.getState().picksDisabled) console.log("Type 'reset-weights' to pick again.")
			return true
		}
		case 'stats':
			console.log(state.students.length ? formatStatsTable(state.students) : 'No students loaded.')
			return true
		case 'reset':
			state.resetAllStudents()
			console.log('Weights and counts reset.')
			return true
		case 'reset-weights':
			state.resetWeights()
			console.log('Weights reset.')
			return true
		case 'decay':
			if (await state.applyWeightDecrease(arg)) {
				console.log(formatSettingChange('Weight decrease', store.getState().settings.weightDecreaseAmount))
			}
			return true
		case 'speed':
			if (await state.setSpinnerSpeed(arg)) {
				console.log(formatSettingChange('Spinner speed', store.getState().settings.spinnerSpeedValue))
			}
			return true
		case 'save':
			if (await state.saveRoster()) console.log('Saved.')
			return true
		case 'quit':
		case 'exit':
			return false
		default:
			console.log(`Unknown command: ${command}. Type 'help' for a list.`)
			return true
	}
}

async function main(): Promise<void> {
	const paths = resolveAppPaths()
	const settings = await loadSettings(paths.settingsFile)
	const store = createPickerStore({ paths, settings })

	store.subscribe((state, prev) => {
		if (state.spin === prev.spin || state.spin.visibleNames.length === 0) return
		if (state.spin.phase === 'idle') return
		process.stdout.write(`\r${formatSpinWindow(state.spin)}\u001b[K`)
	})

	await store.getState().refreshClassFiles()
	if (await store.getState().autoLoadSavedClass()) {
		console.log(`Loaded ${store.getState().currentClassFile?.fileName}`)
	} else {
		console.log(`No class loaded. Put .json or .csv class lists in ${paths.classesDir}`)
	}
	console.log("Type 'help' for commands.")

	const rl = readline.createInterface({ input: process.stdin, output: process.stdout })
	try {
		for (;;) {
			const line = await ask(rl, '> ')
			const keepGoing = await runCommand(store, line)
			printError(store)
			if (!keepGoing) break
		}
		const classFile = store.getState().currentClassFile
		if (classFile) {
			const answer = await ask(rl, `Save current weights and stats back to '${classFile.fileName}'? (y/n) `)
			if (answer.trim().toLowerCase().startsWith('y')) {
				await store.getState().saveRoster()
				printError(store)
			}
		}
	} finally {
		rl.close()
		await store.getState().shutdown()
	}
}

main().catch((e) => {
	console.error('[CLI]', describeError(e))
	process.exitCode = 1
})
