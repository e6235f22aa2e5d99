import path from 'node:path'
import { PathSafetyError } from './errors'
import { buildConcatListPath, buildSegmentOutputPath, buildTempSegmentPath } from './paths'
import { formatTimestampPrecise, toSeconds } from './time-codec'
import { containsDangerousChars } from './validator'
import type { Segment, TimeRange, TrimJob } from './types'

export type PlannedCommand = {
	args: string[]
	label: string
	outputPath: string
	// Expected output length; null for the concat pass.
	range: TimeRange | null
}

export type CommandPlan = {
	steps: PlannedCommand[]
	outputs: string[]
	tempPaths: string[]
	concatList: { path: string; body: string } | null
}

const PROGRESS_ARGS = ['-progress', 'pipe:1']

function assertSafePath(value: string) {
	if (containsDangerousChars(value)) {
		throw new PathSafetyError(value)
	}
}

export function requireSegmentRange(segment: Segment): TimeRange {
	const start = toSeconds(segment.start)
	const end = toSeconds(segment.end)
	if (start === null || end === null || start >= end) {
		throw new Error(
			`Invalid segment range (${segment.start || '?'} -> ${segment.end || '?'})`,
		)
	}
	return { start, end }
}

export function buildTrimArgs(options: {
	toolPath: string
	inputPath: string
	outputPath: string
	range: TimeRange
	copyCodec: boolean
}) {
	assertSafePath(options.inputPath)
	assertSafePath(options.outputPath)
	const args = [
		options.toolPath,
		'-hide_banner',
		'-y',
		...PROGRESS_ARGS,
		'-ss',
		formatTimestampPrecise(options.range.start),
		'-to',
		formatTimestampPrecise(options.range.end),
		'-i',
		options.inputPath,
	]
	if (options.copyCodec) {
		args.push('-c', 'copy')
	}
	args.push(options.outputPath)
	return args
}

export function buildConcatArgs(options: {
	toolPath: string
	listPath: string
	outputPath: string
}) {
	assertSafePath(options.listPath)
	assertSafePath(options.outputPath)
	return [
		options.toolPath,
		'-hide_banner',
		'-y',
		...PROGRESS_ARGS,
		'-f',
		'concat',
		'-safe',
		'0',
		'-i',
		options.listPath,
		'-c',
		'copy',
		options.outputPath,
	]
}

/**
 * Body for the concat demuxer list file, one `file '<path>'` line per entry.
 */
export function buildConcatListBody(paths: string[]) {
	return paths
		.map((entry) => `file '${entry.replace(/'/g, "'\\''")}'`)
		.join('\n')
		.concat(paths.length > 0 ? '\n' : '')
}

function describeSegment(segment: Segment, number: number) {
	const name = segment.name.trim()
	return name ? `Segment ${number} (${name})` : `Segment ${number}`
}

export function buildRangePlan(options: {
	toolPath: string
	inputPath: string
	outputPath: string
	range: TimeRange
	copyCodec: boolean
}): CommandPlan {
	return {
		steps: [
			{
				args: buildTrimArgs(options),
				label: 'Trimming',
				outputPath: options.outputPath,
				range: options.range,
			},
		],
		outputs: [options.outputPath],
		tempPaths: [],
		concatList: null,
	}
}

/**
 * One invocation per enabled segment, each writing a numbered file next to
 * the base output path.
 */
export function buildSeparateSegmentPlan(options: {
	toolPath: string
	inputPath: string
	outputBasePath: string
	segments: Segment[]
	copyCodec: boolean
}): CommandPlan {
	const enabled = options.segments.filter((segment) => segment.enabled)
	const steps = enabled.map((segment, index) => {
		const range = requireSegmentRange(segment)
		const outputPath = buildSegmentOutputPath(
			options.outputBasePath,
			index + 1,
			segment.name,
		)
		return {
			args: buildTrimArgs({
				toolPath: options.toolPath,
				inputPath: options.inputPath,
				outputPath,
				range,
				copyCodec: options.copyCodec,
			}),
			label: describeSegment(segment, index + 1),
			outputPath,
			range,
		}
	})
	return {
		steps,
		outputs: steps.map((step) => step.outputPath),
		tempPaths: [],
		concatList: null,
	}
}

/**
 * Extract each enabled segment into `tempDir`, then join them in list order
 * with the concat demuxer (stream copy) into one output.
 */
export function buildMergePlan(options: {
	toolPath: string
	inputPath: string
	outputPath: string
	segments: Segment[]
	copyCodec: boolean
	tempDir: string
}): CommandPlan {
	const enabled = options.segments.filter((segment) => segment.enabled)
	if (enabled.length === 0) {
		return { steps: [], outputs: [], tempPaths: [], concatList: null }
	}
	const extension = path.extname(options.outputPath) || '.mp4'
	const extractSteps = enabled.map((segment, index) => {
		const range = requireSegmentRange(segment)
		const outputPath = buildTempSegmentPath(options.tempDir, index + 1, extension)
		return {
			args: buildTrimArgs({
				toolPath: options.toolPath,
				inputPath: options.inputPath,
				outputPath,
				range,
				copyCodec: options.copyCodec,
			}),
			label: `Extracting ${describeSegment(segment, index + 1).toLowerCase()}`,
			outputPath,
			range,
		}
	})
	const tempPaths = extractSteps.map((step) => step.outputPath)
	const listPath = buildConcatListPath(options.tempDir)
	return {
		steps: [
			...extractSteps,
			{
				args: buildConcatArgs({
					toolPath: options.toolPath,
					listPath,
					outputPath: options.outputPath,
				}),
				label: 'Joining segments',
				outputPath: options.outputPath,
				range: null,
			},
		],
		outputs: [options.outputPath],
		tempPaths,
		concatList: { path: listPath, body: buildConcatListBody(tempPaths) },
	}
}

export function buildJobPlan(
	job: TrimJob,
	options: { toolPath: string; tempDir: string },
): CommandPlan {
	if (job.kind === 'range') {
		return buildRangePlan({
			toolPath: options.toolPath,
			inputPath: job.inputPath,
			outputPath: job.outputPath,
			range: job.range,
			copyCodec: job.copyCodec,
		})
	}
	if (job.exportMode === 'separate') {
		return buildSeparateSegmentPlan({
			toolPath: options.toolPath,
			inputPath: job.inputPath,
			outputBasePath: job.outputPath,
			segments: job.segments,
			copyCodec: job.copyCodec,
		})
	}
	return buildMergePlan({
		toolPath: options.toolPath,
		inputPath: job.inputPath,
		outputPath: job.outputPath,
		segments: job.segments,
		copyCodec: job.copyCodec,
		tempDir: options.tempDir,
	})
}

export function jobNeedsTempDir(job: TrimJob) {
	return job.kind === 'segments' && job.exportMode === 'merge'
}

export function buildProbeArgs(probePath: string, inputPath: string) {
	return [
		probePath,
		'-v',
		'error',
		'-show_entries',
		'format=duration',
		'-of',
		'default=noprint_wrappers=1:nokey=1',
		inputPath,
	]
}

export function buildVersionArgs(toolPath: string) {
	return [toolPath, '-version']
}

/**
 * Desktop opener for a finished output (file or directory).
 */
export function buildOpenArgs(target: string, platform: NodeJS.Platform) {
	if (platform === 'darwin') return ['open', target]
	if (platform === 'win32') return ['explorer', target]
	return ['xdg-open', target]
}

function quoteShellArgument(value: string) {
	if (/^[\w./:=+-]+$/.test(value)) {
		return value
	}
	const escaped = value.replace(/(["\\$`])/g, '\\$1')
	return `"${escaped}"`
}

/**
 * Shell-style rendering for display only; commands are always spawned from the
 * argument vector.
 */
export function formatCommandPreview(args: string[]) {
	return args.map(quoteShellArgument).join(' ')
}
