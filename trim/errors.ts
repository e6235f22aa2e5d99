// Errors raised inside a trim job; the driver turns them into a failed status.
import type { JobErrorKind } from './types'

export class TrimJobError extends Error {
	constructor(
		message: string,
		public readonly kind: JobErrorKind,
	) {
		super(message)
		this.name = 'TrimJobError'
	}
}

export class ToolNotFoundError extends TrimJobError {
	constructor(public readonly toolPath: string) {
		super(
			`ffmpeg not found (${toolPath}). Install it and ensure it is on PATH.`,
			'ToolNotFound',
		)
		this.name = 'ToolNotFoundError'
	}
}

export class InputMissingError extends TrimJobError {
	constructor(public readonly inputPath: string) {
		super(`Input file does not exist: ${inputPath}`, 'InputMissing')
		this.name = 'InputMissingError'
	}
}

export class OutputDirError extends TrimJobError {
	constructor(
		public readonly outputDir: string,
		detail: string,
	) {
		super(
			`Failed to create output directory ${outputDir}: ${detail}`,
			'OutputDirUnwritable',
		)
		this.name = 'OutputDirError'
	}
}

export class ProcessLaunchError extends TrimJobError {
	constructor(detail: string) {
		super(`Failed to launch ffmpeg: ${detail}`, 'ProcessLaunchFailed')
		this.name = 'ProcessLaunchError'
	}
}

export class NonZeroExitError extends TrimJobError {
	constructor(public readonly exitCode: number) {
		super(`ffmpeg exited with code ${exitCode}`, 'NonZeroExit')
		this.name = 'NonZeroExitError'
	}
}

export class DriverBusyError extends Error {
	constructor() {
		super('A trim job is already running on this driver.')
		this.name = 'DriverBusyError'
	}
}

export class BatchBusyError extends Error {
	constructor() {
		super('A batch is already running.')
		this.name = 'BatchBusyError'
	}
}

export class PathSafetyError extends Error {
	constructor(public readonly path: string) {
		super(`Path contains dangerous characters: ${JSON.stringify(path)}`)
		this.name = 'PathSafetyError'
	}
}

export function describeError(error: unknown) {
	return error instanceof Error ? error.message : String(error)
}
