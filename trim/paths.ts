import path from 'node:path'
import { stat } from 'node:fs/promises'
import { TRIM_CONFIG } from './config'
import { sanitizeFilename } from './validator'

function pad(value: number) {
	return String(value).padStart(2, '0')
}

export function formatFileTimestamp(date: Date) {
	return (
		`${date.getFullYear()}${pad(date.getMonth() + 1)}${pad(date.getDate())}` +
		`_${pad(date.getHours())}${pad(date.getMinutes())}${pad(date.getSeconds())}`
	)
}

export function applyNamingPattern(
	pattern: string,
	values: { name: string; timestamp: string },
) {
	return pattern
		.replaceAll('{name}', values.name)
		.replaceAll('{timestamp}', values.timestamp)
}

async function pathExists(filePath: string) {
	try {
		await stat(filePath)
		return true
	} catch {
		return false
	}
}

/**
 * Build `<outputDir>/<pattern><ext>`, adding `_1`, `_2`, ... until the name
 * is free.
 */
export async function generateOutputPath(options: {
	inputPath: string
	outputDir: string
	pattern?: string
	now?: Date
	// Paths already handed out but not yet written.
	reserved?: ReadonlySet<string>
}) {
	const parsed = path.parse(options.inputPath)
	const baseName = sanitizeFilename(
		applyNamingPattern(options.pattern ?? TRIM_CONFIG.defaultNamingPattern, {
			name: parsed.name,
			timestamp: formatFileTimestamp(options.now ?? new Date()),
		}),
	)
	let candidate = path.join(options.outputDir, `${baseName}${parsed.ext}`)
	let counter = 1
	while (options.reserved?.has(candidate) || (await pathExists(candidate))) {
		candidate = path.join(
			options.outputDir,
			`${baseName}_${counter}${parsed.ext}`,
		)
		counter += 1
	}
	return candidate
}

/**
 * Numbered output for separate-file export: `clip.mp4` -> `clip_02_intro.mp4`.
 */
export function buildSegmentOutputPath(
	outputBasePath: string,
	segmentNumber: number,
	segmentName = '',
) {
	const parsed = path.parse(outputBasePath)
	const slug = sanitizeFilename(segmentName.trim()).replace(/[\s/\\]+/g, '-')
	const suffix = slug
		? `${String(segmentNumber).padStart(2, '0')}_${slug}`
		: String(segmentNumber).padStart(2, '0')
	return path.join(parsed.dir, `${parsed.name}_${suffix}${parsed.ext}`)
}

export function buildTempSegmentPath(
	tempDir: string,
	segmentNumber: number,
	extension: string,
) {
	return path.join(
		tempDir,
		`segment-${String(segmentNumber).padStart(2, '0')}${extension}`,
	)
}

export function buildConcatListPath(tempDir: string) {
	return path.join(tempDir, 'concat-list.txt')
}

export function buildBatchLogPath(outputDir: string) {
	return path.join(outputDir, TRIM_CONFIG.batchLogName)
}
