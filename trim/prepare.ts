import path from 'node:path'
import { stat } from 'node:fs/promises'
import { logWarn } from './logging'
import { generateOutputPath } from './paths'
import { SegmentList } from './segments'
import { toSeconds } from './time-codec'
import type {
	ExportMode,
	RangeTrimJob,
	Segment,
	SegmentTrimJob,
	ValidationErrorKind,
	ValidationResult,
} from './types'
import {
	isMp4Container,
	validateDiskSpace,
	validateInputFile,
	validateOutputPath,
	validatePathSafety,
	validateTimeRange,
} from './validator'

export type PrepareFailure = {
	ok: false
	errorKind: ValidationErrorKind | 'NoEnabledSegments'
	message: string
}

export type PrepareResult<T> = { ok: true; job: T } | PrepareFailure

type Check = () => ValidationResult | Promise<ValidationResult>

const VALID: ValidationResult = { valid: true, errorKind: null, message: '' }

async function firstFailure(checks: Check[]): Promise<PrepareFailure | null> {
	for (const check of checks) {
		const result = await check()
		if (!result.valid) {
			return { ok: false, errorKind: result.errorKind, message: result.message }
		}
	}
	return null
}

async function findExistingAncestor(dir: string) {
	let current = path.resolve(dir)
	while (true) {
		const stats = await stat(current).catch(() => null)
		if (stats?.isDirectory()) return current
		const parent = path.dirname(current)
		if (parent === current) return null
		current = parent
	}
}

async function validateOutputTarget(
	inputPath: string,
	outputPath: string,
): Promise<ValidationResult> {
	if (path.resolve(inputPath) === path.resolve(outputPath)) {
		return {
			valid: false,
			errorKind: 'OutputNotWritable',
			message: 'Output path must be different from input.',
		}
	}
	const outputDir = path.dirname(path.resolve(outputPath))
	const parentStats = await stat(outputDir).catch(() => null)
	if (parentStats) {
		return validateOutputPath(outputPath)
	}
	return validatePathSafety(outputPath)
}

async function validateFreeSpace(
	inputPath: string,
	outputPath: string,
): Promise<ValidationResult> {
	const dir = await findExistingAncestor(path.dirname(outputPath))
	const inputStats = await stat(inputPath).catch(() => null)
	if (!dir || !inputStats) {
		return VALID
	}
	// Stream copy never writes more than the input holds.
	return validateDiskSpace(dir, inputStats.size)
}

const MP4_EXTENSIONS = new Set(['.mp4', '.m4v', '.mov'])

async function warnOnContainerMismatch(
	inputPath: string,
	outputPath: string,
	copyCodec: boolean,
) {
	if (!copyCodec) return
	if (!MP4_EXTENSIONS.has(path.extname(outputPath).toLowerCase())) return
	if (await isMp4Container(inputPath)) return
	logWarn(
		`${path.basename(inputPath)} is not an MP4 container; stream copy into ${path.extname(outputPath)} may fail (use --reencode).`,
	)
}

async function resolveOutputPath(request: {
	inputPath: string
	outputPath?: string | null
	outputDir: string
	pattern: string
	now?: Date
}) {
	if (request.outputPath) {
		return path.resolve(request.outputPath)
	}
	return generateOutputPath({
		inputPath: request.inputPath,
		outputDir: request.outputDir,
		pattern: request.pattern,
		now: request.now,
	})
}

export type RangeJobRequest = {
	inputPath: string
	start: string
	end: string
	outputPath?: string | null
	outputDir: string
	pattern: string
	copyCodec: boolean
	now?: Date
}

/**
 * Validate a single-range request and build its job. Nothing is spawned or
 * written here.
 */
export async function prepareRangeJob(
	request: RangeJobRequest,
): Promise<PrepareResult<RangeTrimJob>> {
	const inputPath = path.resolve(request.inputPath)
	const inputFailure = await firstFailure([
		() => validatePathSafety(inputPath),
		() => validateInputFile(inputPath),
		() => validateTimeRange(request.start, request.end),
	])
	if (inputFailure) return inputFailure

	const outputPath = await resolveOutputPath({ ...request, inputPath })
	const outputFailure = await firstFailure([
		() => validatePathSafety(outputPath),
		() => validateOutputTarget(inputPath, outputPath),
		() => validateFreeSpace(inputPath, outputPath),
	])
	if (outputFailure) return outputFailure
	await warnOnContainerMismatch(inputPath, outputPath, request.copyCodec)

	return {
		ok: true,
		job: {
			kind: 'range',
			inputPath,
			outputPath,
			range: {
				start: toSeconds(request.start) ?? 0,
				end: toSeconds(request.end) ?? 0,
			},
			copyCodec: request.copyCodec,
		},
	}
}

export type SegmentJobRequest = {
	inputPath: string
	segments: Segment[]
	exportMode: ExportMode
	outputPath?: string | null
	outputDir: string
	pattern: string
	copyCodec: boolean
	now?: Date
}

export async function prepareSegmentJob(
	request: SegmentJobRequest,
): Promise<PrepareResult<SegmentTrimJob>> {
	const inputPath = path.resolve(request.inputPath)
	const inputFailure = await firstFailure([
		() => validatePathSafety(inputPath),
		() => validateInputFile(inputPath),
	])
	if (inputFailure) return inputFailure

	const list = new SegmentList(request.segments)
	list.exportMode = request.exportMode
	const enabled = list.enabled()
	if (enabled.length === 0) {
		return {
			ok: false,
			errorKind: 'NoEnabledSegments',
			message: 'Add at least one enabled segment.',
		}
	}
	for (const [index, segment] of list.all().entries()) {
		if (!segment.enabled) continue
		const result = list.validateSegment(segment)
		const range = validateTimeRange(segment.start, segment.end)
		if (!result.valid || !range.valid) {
			return {
				ok: false,
				errorKind: range.valid ? 'InvalidTimestamp' : range.errorKind,
				message: `Segment ${index + 1}: ${result.message || range.message}`,
			}
		}
	}
	if (list.checkOverlaps()) {
		logWarn('Some enabled segments overlap; overlapping footage will repeat.')
	}

	const outputPath = await resolveOutputPath({ ...request, inputPath })
	const outputFailure = await firstFailure([
		() => validatePathSafety(outputPath),
		() => validateOutputTarget(inputPath, outputPath),
		() => validateFreeSpace(inputPath, outputPath),
	])
	if (outputFailure) return outputFailure
	await warnOnContainerMismatch(inputPath, outputPath, request.copyCodec)

	return {
		ok: true,
		job: {
			kind: 'segments',
			inputPath,
			outputPath,
			segments: enabled,
			copyCodec: request.copyCodec,
			exportMode: list.exportMode,
		},
	}
}
