import path from 'node:path'
import os from 'node:os'
import { mkdir, mkdtemp, rm, writeFile } from 'node:fs/promises'
import { test, expect } from 'vitest'
import {
	containsDangerousChars,
	hasSufficientDiskSpace,
	isMp4Container,
	sanitizeFilename,
	validateDiskSpace,
	validateInputFile,
	validateOutputPath,
	validatePathSafety,
	validateTimeRange,
	validateTimestamp,
} from './validator'

async function withTempDir(callback: (dir: string) => Promise<void>) {
	const dir = await mkdtemp(path.join(os.tmpdir(), 'validator-'))
	try {
		await callback(dir)
	} finally {
		await rm(dir, { recursive: true, force: true })
	}
}

test('validateTimestamp returns a result instead of throwing', () => {
	expect(validateTimestamp('00:00:01.000')).toEqual({
		valid: true,
		errorKind: null,
		message: '',
	})
	expect(validateTimestamp('abc')).toEqual({
		valid: false,
		errorKind: 'InvalidTimestamp',
		message: 'Invalid timestamp format. Use HH:MM:SS.mmm or decimal seconds',
	})
})

test('validateTimeRange rejects a start after the end', () => {
	const result = validateTimeRange('00:00:10.000', '00:00:05.000')
	expect(result.valid).toBe(false)
	expect(result.errorKind).toBe('StartTimeAfterEndTime')
	expect(result.message).toBe('Start time must be less than end time')
})

test('validateTimeRange rejects equal start and end', () => {
	const result = validateTimeRange('00:00:05.000', '00:00:05.000')
	expect(result.errorKind).toBe('StartTimeAfterEndTime')
})

test('validateTimeRange accepts mixed formats in order', () => {
	expect(validateTimeRange('4.5', '00:00:05.000').valid).toBe(true)
})

test('validateTimeRange reports the first malformed timestamp', () => {
	const result = validateTimeRange('00:00:01.000', '00:99:00')
	expect(result.errorKind).toBe('InvalidTimestamp')
	expect(result.message).toBe(
		'Invalid time values (minutes/seconds must be < 60)',
	)
})

test('validateInputFile accepts a readable regular file', async () => {
	await withTempDir(async (dir) => {
		const filePath = path.join(dir, 'clip.mp4')
		await writeFile(filePath, 'video')
		expect((await validateInputFile(filePath)).valid).toBe(true)
	})
})

test('validateInputFile reports missing files', async () => {
	await withTempDir(async (dir) => {
		const filePath = path.join(dir, 'missing.mp4')
		expect(await validateInputFile(filePath)).toEqual({
			valid: false,
			errorKind: 'FileNotFound',
			message: `File not found: ${filePath}`,
		})
	})
})

test('validateInputFile rejects directories', async () => {
	await withTempDir(async (dir) => {
		const result = await validateInputFile(dir)
		expect(result.errorKind).toBe('InvalidFormat')
	})
})

test('validateOutputPath accepts a path inside an existing directory', async () => {
	await withTempDir(async (dir) => {
		const result = await validateOutputPath(path.join(dir, 'out.mp4'))
		expect(result.valid).toBe(true)
	})
})

test('validateOutputPath rejects a missing parent directory', async () => {
	await withTempDir(async (dir) => {
		const parent = path.join(dir, 'nope')
		const result = await validateOutputPath(path.join(parent, 'out.mp4'))
		expect(result).toEqual({
			valid: false,
			errorKind: 'OutputNotWritable',
			message: `Output directory does not exist: ${parent}`,
		})
	})
})

test('validateOutputPath rejects a parent that is a file', async () => {
	await withTempDir(async (dir) => {
		const blocker = path.join(dir, 'blocker')
		await writeFile(blocker, '')
		const result = await validateOutputPath(path.join(blocker, 'out.mp4'))
		expect(result.errorKind).toBe('OutputNotWritable')
	})
})

test('sanitizeFilename replaces each dangerous character', () => {
	expect(sanitizeFilename('a;b|c$d')).toBe('a_b_c_d')
	expect(sanitizeFilename('x&y`z\n\r')).toBe('x_y_z__')
	expect(sanitizeFilename('plain name (1).mp4')).toBe('plain name (1).mp4')
})

test('containsDangerousChars finds backticks and newlines', () => {
	expect(containsDangerousChars('clip`whoami`.mp4')).toBe(true)
	expect(containsDangerousChars('line\nbreak')).toBe(true)
	expect(containsDangerousChars('safe-name.mp4')).toBe(false)
})

test('validatePathSafety uses the dangerous characters kind', () => {
	expect(validatePathSafety('a;b').errorKind).toBe('PathContainsDangerousChars')
	expect(validatePathSafety('/videos/a.mp4').valid).toBe(true)
})

test('hasSufficientDiskSpace answers for an existing directory', async () => {
	await withTempDir(async (dir) => {
		expect(await hasSufficientDiskSpace(dir, 0)).toBe(true)
		expect(
			await hasSufficientDiskSpace(dir, Number.MAX_SAFE_INTEGER),
		).toBe(false)
	})
})

test('hasSufficientDiskSpace fails closed when the query fails', async () => {
	await withTempDir(async (dir) => {
		const missing = path.join(dir, 'missing', 'deeper')
		expect(await hasSufficientDiskSpace(missing, 0)).toBe(false)
		expect((await validateDiskSpace(missing, 1)).errorKind).toBe(
			'InsufficientDiskSpace',
		)
	})
})

test('isMp4Container checks for the ftyp box', async () => {
	await withTempDir(async (dir) => {
		const mp4Path = path.join(dir, 'real.mp4')
		const textPath = path.join(dir, 'fake.mp4')
		const shortPath = path.join(dir, 'short.mp4')
		await writeFile(
			mp4Path,
			Buffer.from([0, 0, 0, 0x18, 0x66, 0x74, 0x79, 0x70, 0x69, 0x73, 0x6f, 0x6d]),
		)
		await writeFile(textPath, 'not a video file at all')
		await writeFile(shortPath, 'ftyp')
		await mkdir(path.join(dir, 'dir.mp4'))
		expect(await isMp4Container(mp4Path)).toBe(true)
		expect(await isMp4Container(textPath)).toBe(false)
		expect(await isMp4Container(shortPath)).toBe(false)
		expect(await isMp4Container(path.join(dir, 'dir.mp4'))).toBe(false)
	})
})
