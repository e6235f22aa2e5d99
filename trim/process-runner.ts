import { spawn } from 'node:child_process'
import { ProcessLaunchError } from './errors'
import { runCommand, type CommandResult } from '../utils'

export type SpawnOptions = {
	onLine: (line: string, stream: 'stdout' | 'stderr') => void
	signal?: AbortSignal
}

export type SpawnedProcess = {
	exited: Promise<number>
}

/**
 * Spawn boundary for ffmpeg and ffprobe. `run` collects output; `spawn`
 * streams it line by line. Aborting `signal` sends SIGTERM.
 */
export type ProcessRunner = {
	run(argv: string[]): Promise<CommandResult>
	spawn(argv: string[], options: SpawnOptions): SpawnedProcess
}

/**
 * Buffers text chunks and hands out complete lines. ffmpeg redraws its stats
 * line with `\r`, so both `\n` and `\r` end a line.
 */
export function createLineSplitter(onLine: (line: string) => void) {
	let buffer = ''
	const emit = (line: string) => {
		const trimmed = line.trim()
		if (trimmed) onLine(trimmed)
	}
	return {
		push(chunk: string) {
			buffer += chunk
			const lines = buffer.split(/\r\n|\r|\n/)
			buffer = lines.pop() ?? ''
			for (const line of lines) emit(line)
		},
		flush() {
			const trailing = buffer
			buffer = ''
			emit(trailing)
		},
	}
}

function isAbortError(error: Error) {
	return error.name === 'AbortError'
}

export function createNodeProcessRunner(): ProcessRunner {
	return {
		run(argv) {
			return runCommand(argv, { allowFailure: true })
		},
		spawn(argv, { onLine, signal }) {
			const [file, ...args] = argv
			if (!file) {
				return { exited: Promise.reject(new ProcessLaunchError('empty command')) }
			}
			const exited = new Promise<number>((resolve, reject) => {
				const proc = spawn(file, args, {
					stdio: ['ignore', 'pipe', 'pipe'],
					signal,
					killSignal: 'SIGTERM',
				})
				const stdout = createLineSplitter((line) => onLine(line, 'stdout'))
				const stderr = createLineSplitter((line) => onLine(line, 'stderr'))
				proc.stdout.setEncoding('utf8')
				proc.stderr.setEncoding('utf8')
				proc.stdout.on('data', (chunk: string) => stdout.push(chunk))
				proc.stderr.on('data', (chunk: string) => stderr.push(chunk))
				let settled = false
				proc.once('error', (error) => {
					// An abort still ends with 'close'.
					if (isAbortError(error) || settled) return
					settled = true
					reject(new ProcessLaunchError(error.message))
				})
				proc.once('close', (code) => {
					if (settled) return
					settled = true
					stdout.flush()
					stderr.flush()
					resolve(code ?? -1)
				})
			})
			return { exited }
		},
	}
}
