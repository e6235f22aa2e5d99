import path from 'node:path'
import { constants, type Stats } from 'node:fs'
import { access, open, stat, statfs } from 'node:fs/promises'
import { formatBytes } from '../utils'
import { parseTimestamp } from './time-codec'
import type { ValidationErrorKind, ValidationResult } from './types'

export const DANGEROUS_CHARS = [';', '&', '|', '$', '`', '\n', '\r'] as const

const VALID: ValidationResult = { valid: true, errorKind: null, message: '' }

function fail(errorKind: ValidationErrorKind, message: string): ValidationResult {
	return { valid: false, errorKind, message }
}

function isErrnoCode(error: unknown, code: string) {
	return (
		typeof error === 'object' &&
		error !== null &&
		'code' in error &&
		error.code === code
	)
}

export function validateTimestamp(text: string): ValidationResult {
	const parsed = parseTimestamp(text)
	return parsed.ok ? VALID : fail('InvalidTimestamp', parsed.message)
}

/**
 * Both timestamps must parse and start must be strictly before end.
 */
export function validateTimeRange(
	startText: string,
	endText: string,
): ValidationResult {
	const start = parseTimestamp(startText)
	if (!start.ok) {
		return fail('InvalidTimestamp', start.message)
	}
	const end = parseTimestamp(endText)
	if (!end.ok) {
		return fail('InvalidTimestamp', end.message)
	}
	if (start.seconds >= end.seconds) {
		return fail('StartTimeAfterEndTime', 'Start time must be less than end time')
	}
	return VALID
}

export async function validateInputFile(filePath: string): Promise<ValidationResult> {
	let stats: Stats
	try {
		stats = await stat(filePath)
	} catch (error) {
		if (isErrnoCode(error, 'ENOENT') || isErrnoCode(error, 'ENOTDIR')) {
			return fail('FileNotFound', `File not found: ${filePath}`)
		}
		return fail('FileNotReadable', `File is not readable: ${filePath}`)
	}
	if (!stats.isFile()) {
		return fail('InvalidFormat', `Path is not a regular file: ${filePath}`)
	}
	try {
		const handle = await open(filePath, 'r')
		await handle.close()
	} catch {
		return fail('FileNotReadable', `File is not readable: ${filePath}`)
	}
	return VALID
}

export async function validateOutputPath(
	outputPath: string,
): Promise<ValidationResult> {
	const parent = path.dirname(path.resolve(outputPath))
	try {
		const stats = await stat(parent)
		if (!stats.isDirectory()) {
			return fail(
				'OutputNotWritable',
				`Output directory is not a directory: ${parent}`,
			)
		}
	} catch {
		return fail('OutputNotWritable', `Output directory does not exist: ${parent}`)
	}
	try {
		await access(parent, constants.W_OK)
	} catch {
		return fail('OutputNotWritable', `Output directory is not writable: ${parent}`)
	}
	return VALID
}

export function sanitizeFilename(text: string) {
	let sanitized = ''
	for (const char of text) {
		sanitized += containsDangerousChars(char) ? '_' : char
	}
	return sanitized
}

export function containsDangerousChars(text: string) {
	return DANGEROUS_CHARS.some((char) => text.includes(char))
}

export function validatePathSafety(value: string): ValidationResult {
	if (containsDangerousChars(value)) {
		return fail(
			'PathContainsDangerousChars',
			`Path contains dangerous characters: ${JSON.stringify(value)}`,
		)
	}
	return VALID
}

/**
 * Fail-closed: any error while querying the filesystem counts as "not enough".
 */
export async function hasSufficientDiskSpace(dir: string, requiredBytes: number) {
	try {
		const stats = await statfs(dir)
		return stats.bavail * stats.bsize >= requiredBytes
	} catch {
		return false
	}
}

export async function validateDiskSpace(
	dir: string,
	requiredBytes: number,
): Promise<ValidationResult> {
	if (await hasSufficientDiskSpace(dir, requiredBytes)) {
		return VALID
	}
	return fail(
		'InsufficientDiskSpace',
		`Not enough free space in ${dir} (${formatBytes(requiredBytes)} required)`,
	)
}

/**
 * Checks for the `ftyp` box that opens every ISO base media (mp4/mov) file.
 */
export async function isMp4Container(filePath: string) {
	try {
		const handle = await open(filePath, 'r')
		try {
			const buffer = Buffer.alloc(12)
			const { bytesRead } = await handle.read(buffer, 0, 12, 0)
			if (bytesRead < 12) {
				return false
			}
			return buffer.toString('latin1', 4, 8) === 'ftyp'
		} finally {
			await handle.close()
		}
	} catch {
		return false
	}
}
