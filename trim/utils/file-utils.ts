import { readdir, rm, rmdir, unlink } from 'node:fs/promises'
import { describeError } from '../errors'
import { logWarn } from '../logging'

function hasErrorCode(error: unknown, ...codes: string[]) {
	return (
		error !== null &&
		typeof error === 'object' &&
		'code' in error &&
		typeof error.code === 'string' &&
		codes.includes(error.code)
	)
}

/**
 * Delete a file, ignoring ENOENT. Other failures are logged, not thrown.
 */
export async function safeUnlink(filePath: string): Promise<boolean> {
	try {
		await unlink(filePath)
		return true
	} catch (error) {
		if (hasErrorCode(error, 'ENOENT')) {
			return false
		}
		logWarn(`Failed to delete ${filePath}: ${describeError(error)}`)
		return false
	}
}

/**
 * Remove a directory if it exists and is empty.
 */
export async function removeDirIfEmpty(dirPath: string): Promise<boolean> {
	try {
		const entries = await readdir(dirPath)
		if (entries.length > 0) {
			return false
		}
	} catch (error) {
		if (!hasErrorCode(error, 'ENOENT')) {
			logWarn(`Failed to read directory ${dirPath}: ${describeError(error)}`)
		}
		return false
	}

	try {
		await rmdir(dirPath)
		return true
	} catch (error) {
		if (!hasErrorCode(error, 'ENOENT', 'ENOTEMPTY')) {
			logWarn(`Failed to remove directory ${dirPath}: ${describeError(error)}`)
		}
		return false
	}
}

/**
 * Remove the listed files, then the directory and anything left in it.
 */
export async function cleanupTempFiles(tempDir: string, files: string[]) {
	for (const file of files) {
		await safeUnlink(file)
	}
	if (await removeDirIfEmpty(tempDir)) {
		return
	}
	try {
		await rm(tempDir, { recursive: true, force: true })
	} catch (error) {
		logWarn(`Failed to remove temp directory ${tempDir}: ${describeError(error)}`)
	}
}
