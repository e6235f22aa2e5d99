import { test, expect } from 'vitest'
import {
	DriverBusyError,
	InputMissingError,
	NonZeroExitError,
	OutputDirError,
	PathSafetyError,
	ProcessLaunchError,
	ToolNotFoundError,
	TrimJobError,
	describeError,
} from './errors'

test('ToolNotFoundError carries its kind and tool path', () => {
	const error = new ToolNotFoundError('/opt/ffmpeg')
	expect(error).toBeInstanceOf(TrimJobError)
	expect(error.name).toBe('ToolNotFoundError')
	expect(error.kind).toBe('ToolNotFound')
	expect(error.toolPath).toBe('/opt/ffmpeg')
	expect(error.message).toBe(
		'ffmpeg not found (/opt/ffmpeg). Install it and ensure it is on PATH.',
	)
})

test('InputMissingError names the input path', () => {
	const error = new InputMissingError('/videos/a.mp4')
	expect(error.kind).toBe('InputMissing')
	expect(error.message).toBe('Input file does not exist: /videos/a.mp4')
})

test('OutputDirError includes the underlying detail', () => {
	const error = new OutputDirError('/out', 'EACCES')
	expect(error.kind).toBe('OutputDirUnwritable')
	expect(error.message).toBe('Failed to create output directory /out: EACCES')
})

test('ProcessLaunchError wraps the spawn failure', () => {
	const error = new ProcessLaunchError('spawn ffmpeg ENOENT')
	expect(error.kind).toBe('ProcessLaunchFailed')
	expect(error.message).toBe('Failed to launch ffmpeg: spawn ffmpeg ENOENT')
})

test('NonZeroExitError formats the exit code', () => {
	const error = new NonZeroExitError(183)
	expect(error.kind).toBe('NonZeroExit')
	expect(error.exitCode).toBe(183)
	expect(error.message).toBe('ffmpeg exited with code 183')
})

test('DriverBusyError and PathSafetyError use custom names', () => {
	expect(new DriverBusyError().name).toBe('DriverBusyError')
	const error = new PathSafetyError('a;b')
	expect(error.name).toBe('PathSafetyError')
	expect(error.message).toBe('Path contains dangerous characters: "a;b"')
})

test('describeError handles non-Error values', () => {
	expect(describeError(new Error('boom'))).toBe('boom')
	expect(describeError('plain')).toBe('plain')
})
