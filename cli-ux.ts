import path from 'node:path'
import { readdir, stat } from 'node:fs/promises'
import inquirer from 'inquirer'
import ora, { type Ora } from 'ora'
import type { TrimProgressReporter } from './progress-reporter'
import { clamp } from './utils'
import { validateTimestamp } from './trim/validator'

export type PromptChoice<T> = {
	name: string
	value: T
	short?: string
	description?: string
}

export type Prompter = {
	select<T>(message: string, choices: PromptChoice<T>[]): Promise<T>
	input(
		message: string,
		options?: {
			defaultValue?: string
			validate?: (value: string) => true | string | Promise<true | string>
		},
	): Promise<string>
	confirm(
		message: string,
		options?: { defaultValue?: boolean },
	): Promise<boolean>
}

export type PathPicker = {
	pickExistingFile(options: {
		message: string
		startDir?: string
		extensions?: string[]
	}): Promise<string>
	pickExistingDirectory(options: {
		message: string
		startDir?: string
	}): Promise<string>
}

export class PromptCancelled extends Error {
	constructor(message = 'Prompt cancelled.') {
		super(message)
		this.name = 'PromptCancelled'
	}
}

function isExitPromptError(error: unknown) {
	if (error instanceof Error) {
		return (
			error.name === 'ExitPromptError' ||
			error.message.includes('User force closed the prompt')
		)
	}
	return (
		error !== null &&
		typeof error === 'object' &&
		'name' in error &&
		error.name === 'ExitPromptError'
	)
}

function handlePromptError(error: unknown): never {
	if (error instanceof PromptCancelled) {
		throw error
	}
	if (isExitPromptError(error)) {
		throw new PromptCancelled()
	}
	throw error
}

async function runPrompt<T>(action: () => Promise<T>): Promise<T> {
	try {
		return await action()
	} catch (error) {
		return handlePromptError(error)
	}
}

export function resolveOptionalString(value: unknown) {
	if (typeof value !== 'string') {
		return undefined
	}
	const trimmed = value.trim()
	return trimmed.length > 0 ? trimmed : undefined
}

export function isInteractive(
	env: Record<string, string | undefined> = process.env,
) {
	if (env.TRIMLINE_FORCE_INTERACTIVE === '1') {
		return true
	}
	if (env.CI) {
		return false
	}
	return Boolean(process.stdin.isTTY && process.stdout.isTTY)
}

let activeSpinner: Ora | null = null

export function pauseActiveSpinner() {
	if (activeSpinner?.isSpinning) {
		activeSpinner.stop()
	}
}

export function resumeActiveSpinner() {
	if (activeSpinner && !activeSpinner.isSpinning) {
		activeSpinner.start()
	}
}

export function setActiveSpinnerText(text: string) {
	if (activeSpinner) {
		activeSpinner.text = text
	}
}

const PROGRESS_BAR_WIDTH = 20
const PROGRESS_LABEL_MAX = 32

function clampPercentage(value: number) {
	if (!Number.isFinite(value)) return 0
	return clamp(value, 0, 100)
}

export function formatProgressBar(percentage: number, width = PROGRESS_BAR_WIDTH) {
	const filled = Math.round((clampPercentage(percentage) / 100) * width)
	return `[${'#'.repeat(filled)}${'-'.repeat(width - filled)}]`
}

function truncateLabel(value: string, maxLength: number) {
	const trimmed = value.trim()
	if (trimmed.length <= maxLength) {
		return trimmed
	}
	return `${trimmed.slice(0, Math.max(0, maxLength - 3))}...`
}

/**
 * One spinner line: `Trimming talk.mp4 | 42% [########------------] | Segment 1 | 00:00:05 | 1.5x`.
 */
export function formatProgressLine(options: {
	action: string
	percentage: number
	label?: string
	currentTime?: string
	speed?: string
}) {
	const percentage = clampPercentage(options.percentage)
	const parts = [
		options.action,
		`${Math.round(percentage)}% ${formatProgressBar(percentage)}`,
	]
	const label = options.label ? truncateLabel(options.label, PROGRESS_LABEL_MAX) : ''
	if (label) parts.push(label)
	if (options.currentTime) parts.push(options.currentTime)
	if (options.speed) parts.push(options.speed)
	return parts.join(' | ')
}

export function createTrimProgressReporter(
	action: string,
	render: (text: string) => void = setActiveSpinnerText,
): TrimProgressReporter {
	let lastText = ''
	const update = (text: string) => {
		if (text === lastText) return
		lastText = text
		render(text)
	}
	return {
		update({ percentage, label, currentTime, speed }) {
			update(formatProgressLine({ action, percentage, label, currentTime, speed }))
		},
		finish(label = 'Complete') {
			update(formatProgressLine({ action, percentage: 100, label }))
		},
	}
}

export async function withSpinner<T>(
	text: string,
	action: () => Promise<T>,
	options?: {
		successText?: string
		failText?: string
		enabled?: boolean
	},
): Promise<T> {
	const enabled = options?.enabled ?? isInteractive()
	if (!enabled) {
		return action()
	}
	const spinner = ora({ text }).start()
	activeSpinner = spinner
	try {
		const result = await action()
		spinner.succeed(options?.successText ?? `${text} done`)
		return result
	} catch (error) {
		spinner.fail(options?.failText ?? `${text} failed`)
		throw error
	} finally {
		if (activeSpinner === spinner) {
			activeSpinner = null
		}
	}
}

export function createInquirerPrompter(): Prompter {
	return {
		async select<T>(message: string, choices: PromptChoice<T>[]) {
			return runPrompt(async () => {
				const { result } = await inquirer.prompt<{ result: T }>([
					{
						type: 'list',
						name: 'result',
						message,
						choices,
					},
				])
				return result
			})
		},
		async input(message, options) {
			return runPrompt(async () => {
				const { result } = await inquirer.prompt<{ result: string }>([
					{
						type: 'input',
						name: 'result',
						message,
						default: options?.defaultValue,
						validate: options?.validate,
					},
				])
				return result
			})
		},
		async confirm(message, options) {
			return runPrompt(async () => {
				const { result } = await inquirer.prompt<{ result: boolean }>([
					{
						type: 'confirm',
						name: 'result',
						message,
						default: options?.defaultValue ?? false,
					},
				])
				return result
			})
		},
	}
}

/**
 * Ask for a timestamp until it parses as `HH:MM:SS.mmm` or decimal seconds.
 */
export async function promptForTimestamp(
	prompter: Prompter,
	message: string,
	defaultValue?: string,
) {
	const value = await prompter.input(message, {
		defaultValue,
		validate: (text) => {
			const result = validateTimestamp(text)
			return result.valid ? true : result.message
		},
	})
	return value.trim()
}

type FileExplorerChoice =
	| { kind: 'up' }
	| { kind: 'manual' }
	| { kind: 'cancel' }
	| { kind: 'dir'; path: string }
	| { kind: 'file'; path: string }
	| { kind: 'select-dir'; path: string }

const DEFAULT_IGNORED_DIRS = new Set(['node_modules', '.git', '.cache'])

export function createPathPicker(prompter: Prompter): PathPicker {
	let lastDir: string | undefined
	return {
		async pickExistingFile(options) {
			const selectedPath = await promptForPath(prompter, {
				kind: 'file',
				message: options.message,
				startDir: options.startDir ?? lastDir,
				extensions: options.extensions,
			})
			lastDir = path.dirname(selectedPath)
			return selectedPath
		},
		async pickExistingDirectory(options) {
			const selectedPath = await promptForPath(prompter, {
				kind: 'directory',
				message: options.message,
				startDir: options.startDir ?? lastDir,
			})
			lastDir = selectedPath
			return selectedPath
		},
	}
}

async function promptForPath(
	prompter: Prompter,
	options: {
		kind: 'file' | 'directory'
		message: string
		startDir?: string
		extensions?: string[]
	},
): Promise<string> {
	let currentDir = await resolveStartDir(options.startDir)
	while (true) {
		const choices = await buildExplorerChoices(currentDir, options)
		const selection = await prompter.select(
			`${options.message} (${currentDir})`,
			choices,
		)
		switch (selection.kind) {
			case 'up':
				currentDir = path.dirname(currentDir)
				break
			case 'dir':
				currentDir = selection.path
				break
			case 'select-dir':
			case 'file':
				return selection.path
			case 'manual':
				return promptForManualPath(prompter, options.kind, currentDir)
			case 'cancel':
				throw new PromptCancelled()
		}
	}
}

async function resolveStartDir(startDir?: string) {
	const candidate = startDir ?? process.cwd()
	const stats = await stat(candidate).catch(() => null)
	if (stats?.isDirectory()) {
		return candidate
	}
	if (stats?.isFile()) {
		return path.dirname(candidate)
	}
	return process.cwd()
}

async function promptForManualPath(
	prompter: Prompter,
	kind: 'file' | 'directory',
	currentDir: string,
) {
	const manual = await prompter.input('Enter path manually', {
		validate: async (value) => validateManualPath(value, kind, currentDir),
	})
	return resolveManualPath(manual.trim(), currentDir)
}

function resolveManualPath(value: string, currentDir: string) {
	return path.isAbsolute(value) ? value : path.resolve(currentDir, value)
}

async function validateManualPath(
	value: string,
	kind: 'file' | 'directory',
	currentDir: string,
) {
	const trimmed = resolveOptionalString(value)
	if (!trimmed) {
		return 'Enter a path.'
	}
	const resolved = resolveManualPath(trimmed, currentDir)
	const stats = await stat(resolved).catch(() => null)
	if (!stats) {
		return `Path not found: ${resolved}`
	}
	if (kind === 'file' && !stats.isFile()) {
		return 'Select a file path.'
	}
	if (kind === 'directory' && !stats.isDirectory()) {
		return 'Select a directory path.'
	}
	return true
}

async function buildExplorerChoices(
	currentDir: string,
	options: {
		kind: 'file' | 'directory'
		extensions?: string[]
	},
): Promise<PromptChoice<FileExplorerChoice>[]> {
	const entries = await listEntries(currentDir)
	const choices: PromptChoice<FileExplorerChoice>[] = []
	const parent = path.dirname(currentDir)
	if (parent !== currentDir) {
		choices.push({ name: '../ (up)', value: { kind: 'up' } })
	}
	if (options.kind === 'directory') {
		choices.push({
			name: './ (select this directory)',
			value: { kind: 'select-dir', path: currentDir },
		})
	}
	for (const entry of entries.directories) {
		choices.push({
			name: `${entry.name}/`,
			value: { kind: 'dir', path: entry.path },
		})
	}
	if (options.kind === 'file') {
		for (const entry of entries.files) {
			if (!matchesExtensions(entry.name, options.extensions)) {
				continue
			}
			choices.push({
				name: entry.name,
				value: { kind: 'file', path: entry.path },
			})
		}
	}
	choices.push({ name: 'Enter path manually', value: { kind: 'manual' } })
	choices.push({ name: 'Cancel', value: { kind: 'cancel' } })
	return choices
}

function matchesExtensions(name: string, extensions?: string[]) {
	if (!extensions || extensions.length === 0) {
		return true
	}
	const lower = name.toLowerCase()
	return extensions.some((extension) => lower.endsWith(extension.toLowerCase()))
}

async function listEntries(currentDir: string) {
	const dirEntries = await readdir(currentDir, { withFileTypes: true })
	const directories = dirEntries
		.filter((entry) => entry.isDirectory())
		.filter((entry) => !DEFAULT_IGNORED_DIRS.has(entry.name))
		.map((entry) => ({
			name: entry.name,
			path: path.join(currentDir, entry.name),
		}))
	const files = dirEntries
		.filter((entry) => entry.isFile())
		.map((entry) => ({
			name: entry.name,
			path: path.join(currentDir, entry.name),
		}))
	directories.sort((a, b) => a.name.localeCompare(b.name))
	files.sort((a, b) => a.name.localeCompare(b.name))
	return { directories, files }
}
