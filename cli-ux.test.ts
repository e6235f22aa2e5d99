import { test, expect } from 'vitest'
import { mkdir, mkdtemp, rm, writeFile } from 'node:fs/promises'
import path from 'node:path'
import { tmpdir } from 'node:os'
import {
	PromptCancelled,
	createPathPicker,
	createTrimProgressReporter,
	formatProgressBar,
	formatProgressLine,
	isInteractive,
	promptForTimestamp,
	resolveOptionalString,
} from './cli-ux'
import type { PromptChoice, Prompter } from './cli-ux'

async function withTempDir(callback: (dir: string) => Promise<void>) {
	const dir = await mkdtemp(path.join(tmpdir(), 'trimline-ux-'))
	try {
		await callback(dir)
	} finally {
		await rm(dir, { recursive: true, force: true })
	}
}

type ScriptedPrompter = Prompter & { messages: string[] }

/**
 * Answers select prompts by choice name, in order.
 */
function createScriptedPrompter(
	selections: string[],
	inputs: string[] = [],
): ScriptedPrompter {
	const messages: string[] = []
	return {
		messages,
		async select<T>(message: string, choices: PromptChoice<T>[]): Promise<T> {
			messages.push(message)
			const name = selections.shift()
			const choice = choices.find((entry) => entry.name === name)
			if (!choice) {
				throw new Error(`No choice named ${String(name)}`)
			}
			return choice.value
		},
		async input(message, options) {
			messages.push(message)
			const value = inputs.shift() ?? ''
			const verdict = await options?.validate?.(value)
			if (verdict !== undefined && verdict !== true) {
				throw new Error(verdict)
			}
			return value
		},
		async confirm() {
			throw new Error('confirm not expected')
		},
	}
}

test('pickExistingFile walks into directories and filters by extension', async () => {
	await withTempDir(async (dir) => {
		await mkdir(path.join(dir, 'clips'))
		const videoPath = path.join(dir, 'clips', 'talk.mp4')
		await writeFile(videoPath, 'video')
		await writeFile(path.join(dir, 'clips', 'notes.txt'), 'notes')

		const prompter = createScriptedPrompter(['clips/', 'talk.mp4'])
		const picker = createPathPicker(prompter)
		const selected = await picker.pickExistingFile({
			message: 'Select input video file',
			startDir: dir,
			extensions: ['.mp4'],
		})
		expect(selected).toBe(videoPath)
		expect(prompter.messages).toEqual([
			`Select input video file (${dir})`,
			`Select input video file (${path.join(dir, 'clips')})`,
		])
	})
})

test('pickExistingFile hides files without a matching extension', async () => {
	await withTempDir(async (dir) => {
		await writeFile(path.join(dir, 'notes.txt'), 'notes')
		const picker = createPathPicker(createScriptedPrompter(['notes.txt']))
		await expect(
			picker.pickExistingFile({
				message: 'Select input video file',
				startDir: dir,
				extensions: ['.mp4'],
			}),
		).rejects.toThrow('No choice named notes.txt')
	})
})

test('pickExistingDirectory can select the current directory', async () => {
	await withTempDir(async (dir) => {
		const picker = createPathPicker(
			createScriptedPrompter(['./ (select this directory)']),
		)
		expect(
			await picker.pickExistingDirectory({ message: 'Output', startDir: dir }),
		).toBe(dir)
	})
})

test('manual path entry resolves relative to the current directory', async () => {
	await withTempDir(async (dir) => {
		await writeFile(path.join(dir, 'clip.mkv'), 'video')
		const picker = createPathPicker(
			createScriptedPrompter(['Enter path manually'], ['clip.mkv']),
		)
		expect(
			await picker.pickExistingFile({ message: 'Input', startDir: dir }),
		).toBe(path.join(dir, 'clip.mkv'))
	})
})

test('choosing Cancel raises PromptCancelled', async () => {
	await withTempDir(async (dir) => {
		const picker = createPathPicker(createScriptedPrompter(['Cancel']))
		await expect(
			picker.pickExistingFile({ message: 'Input', startDir: dir }),
		).rejects.toBeInstanceOf(PromptCancelled)
	})
})

test('promptForTimestamp validates with the timestamp rules', async () => {
	expect(
		await promptForTimestamp(createScriptedPrompter([], [' 00:01:02.500 ']), 'Start'),
	).toBe('00:01:02.500')
	await expect(
		promptForTimestamp(createScriptedPrompter([], ['00:99:00']), 'Start'),
	).rejects.toThrow('Invalid time values (minutes/seconds must be < 60)')
})

test('isInteractive honours the force flag and CI', () => {
	expect(isInteractive({ TRIMLINE_FORCE_INTERACTIVE: '1', CI: 'true' })).toBe(true)
	expect(isInteractive({ CI: 'true' })).toBe(false)
})

test('resolveOptionalString trims and drops empty values', () => {
	expect(resolveOptionalString('  a ')).toBe('a')
	expect(resolveOptionalString('   ')).toBeUndefined()
	expect(resolveOptionalString(3)).toBeUndefined()
})

test('formatProgressBar and formatProgressLine render percentages', () => {
	expect(formatProgressBar(50, 10)).toBe('[#####-----]')
	expect(formatProgressBar(250, 4)).toBe('[####]')
	expect(
		formatProgressLine({
			action: 'Trimming talk.mp4',
			percentage: 41.6,
			label: 'Segment 1',
			currentTime: '00:00:05',
			speed: '1.5x',
		}),
	).toBe(
		'Trimming talk.mp4 | 42% [########------------] | Segment 1 | 00:00:05 | 1.5x',
	)
})

test('createTrimProgressReporter skips repeated text', () => {
	const lines: string[] = []
	const reporter = createTrimProgressReporter('Trim', (text) => lines.push(text))
	reporter.update({ percentage: 10 })
	reporter.update({ percentage: 10 })
	reporter.finish()
	expect(lines).toEqual([
		'Trim | 10% [##------------------]',
		'Trim | 100% [####################] | Complete',
	])
})
