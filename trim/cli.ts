import type { Argv, Arguments } from 'yargs'
import { TRIM_CONFIG } from './config'
import { parseSegmentSpec } from './segments'
import type { ExportMode, Segment, ToolConfig } from './types'

export interface OutputCliArgs {
	copyCodec: boolean
	dryRun: boolean
}

export interface TrimCliArgs extends OutputCliArgs {
	inputPath: string | null
	start: string | null
	end: string | null
	outputPath: string | null
}

export interface SegmentsCliArgs extends OutputCliArgs {
	inputPath: string | null
	segments: Segment[]
	exportMode: ExportMode
	outputPath: string | null
}

export interface BatchCliArgs extends OutputCliArgs {
	inputPaths: string[]
	start: string | null
	end: string | null
	writeLog: boolean
}

function configureOutputOptions<T>(command: Argv<T>) {
	return command
		.option('output-dir', {
			type: 'string',
			alias: 'o',
			describe: 'Directory for generated output names (default: ~/Videos/Trimmed)',
		})
		.option('pattern', {
			type: 'string',
			describe: `Output name pattern with {name} and {timestamp} (default: ${TRIM_CONFIG.defaultNamingPattern})`,
		})
		.option('reencode', {
			type: 'boolean',
			describe: 'Re-encode instead of copying streams (slower, frame-accurate cuts)',
			default: !TRIM_CONFIG.copyCodecByDefault,
		})
		.option('dry-run', {
			type: 'boolean',
			alias: 'd',
			describe: 'Print the ffmpeg commands without running them',
			default: false,
		})
		.option('ffmpeg', {
			type: 'string',
			describe: 'Path to the ffmpeg binary',
		})
		.option('ffprobe', {
			type: 'string',
			describe: 'Path to the ffprobe binary',
		})
}

function configureRangeOptions<T>(command: Argv<T>) {
	return command
		.option('start', {
			type: 'string',
			alias: 's',
			describe: 'Start time (HH:MM:SS.mmm or seconds)',
		})
		.option('end', {
			type: 'string',
			alias: 'e',
			describe: 'End time (HH:MM:SS.mmm or seconds)',
		})
}

export function configureTrimCommand(command: Argv) {
	return configureOutputOptions(configureRangeOptions(command))
		.positional('input', {
			type: 'string',
			describe: 'Input video file',
		})
		.option('output', {
			type: 'string',
			describe: 'Exact output file path (overrides --output-dir and --pattern)',
		})
}

export function configureSegmentsCommand(command: Argv) {
	return configureOutputOptions(command)
		.positional('input', {
			type: 'string',
			describe: 'Input video file',
		})
		.option('segment', {
			type: 'string',
			array: true,
			alias: 'g',
			describe: 'Segment as start-end or start-end:name (repeatable, in output order)',
		})
		.option('separate', {
			type: 'boolean',
			describe: 'Write one file per segment instead of joining them',
			default: false,
		})
		.option('output', {
			type: 'string',
			describe: 'Output file (merge) or base name for numbered files (separate)',
		})
}

export function configureBatchCommand(command: Argv) {
	return configureOutputOptions(configureRangeOptions(command))
		.positional('input', {
			type: 'string',
			array: true,
			describe: 'Input video files',
		})
		.option('write-log', {
			type: 'boolean',
			alias: 'l',
			describe: 'Write a batch log file to the output directory',
			default: false,
		})
}

export function configureProbeCommand(command: Argv) {
	return command
		.positional('input', {
			type: 'string',
			describe: 'Input video file',
		})
		.option('ffprobe', {
			type: 'string',
			describe: 'Path to the ffprobe binary',
		})
}

export function configureCheckCommand(command: Argv) {
	return command.option('ffmpeg', {
		type: 'string',
		describe: 'Path to the ffmpeg binary',
	})
}

function readString(value: unknown) {
	if (typeof value !== 'string') return null
	const trimmed = value.trim()
	return trimmed.length > 0 ? trimmed : null
}

function readStringArray(value: unknown) {
	if (Array.isArray(value)) {
		return value
			.filter((entry): entry is string => typeof entry === 'string')
			.map((entry) => entry.trim())
			.filter((entry) => entry.length > 0)
	}
	const single = readString(value)
	return single ? [single] : []
}

function normalizeOutputArgs(argv: Arguments): OutputCliArgs {
	return {
		copyCodec: argv.reencode !== true,
		dryRun: argv['dry-run'] === true,
	}
}

export function normalizeTrimArgs(argv: Arguments): TrimCliArgs {
	return {
		...normalizeOutputArgs(argv),
		inputPath: readString(argv.input),
		start: readString(argv.start),
		end: readString(argv.end),
		outputPath: readString(argv.output),
	}
}

export function normalizeSegmentsArgs(argv: Arguments): SegmentsCliArgs {
	const segments = readStringArray(argv.segment).map((spec) => {
		const parsed = parseSegmentSpec(spec)
		if (!parsed.ok) {
			throw new Error(parsed.message)
		}
		return parsed.segment
	})
	return {
		...normalizeOutputArgs(argv),
		inputPath: readString(argv.input),
		segments,
		exportMode: argv.separate === true ? 'separate' : 'merge',
		outputPath: readString(argv.output),
	}
}

export function normalizeBatchArgs(argv: Arguments): BatchCliArgs {
	return {
		...normalizeOutputArgs(argv),
		inputPaths: readStringArray(argv.input),
		start: readString(argv.start),
		end: readString(argv.end),
		writeLog: argv['write-log'] === true,
	}
}

/**
 * CLI flags that override the environment-derived tool config.
 */
export function readToolOverrides(argv: Arguments): Partial<ToolConfig> {
	const overrides: Partial<ToolConfig> = {}
	const toolPath = readString(argv.ffmpeg)
	const probePath = readString(argv.ffprobe)
	const outputDirectory = readString(argv['output-dir'])
	const outputNamingPattern = readString(argv.pattern)
	if (toolPath) overrides.toolPath = toolPath
	if (probePath) overrides.probePath = probePath
	if (outputDirectory) overrides.outputDirectory = outputDirectory
	if (outputNamingPattern) overrides.outputNamingPattern = outputNamingPattern
	return overrides
}
