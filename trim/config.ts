import os from 'node:os'
import path from 'node:path'
import type { ToolConfig } from './types'

export const TRIM_CONFIG = {
	ffmpegPath: 'ffmpeg',
	ffprobePath: 'ffprobe',
	defaultNamingPattern: '{name}_trimmed_{timestamp}',
	tempDirPrefix: 'trimline-',
	batchLogName: 'trimline-batch.log',
	// Copy streams instead of re-encoding unless --reencode is passed.
	copyCodecByDefault: true,
} as const

export const VIDEO_EXTENSIONS = ['.mp4', '.mkv', '.avi', '.mov', '.webm']

type ToolConfigEnv = Record<string, string | undefined>

function readBoolean(value: string | undefined) {
	if (!value) return false
	return ['1', 'true', 'yes', 'on'].includes(value.trim().toLowerCase())
}

function readString(value: string | undefined) {
	const trimmed = value?.trim()
	return trimmed ? trimmed : undefined
}

export function getDefaultOutputDir(env: ToolConfigEnv = process.env) {
	const home = readString(env.HOME) ?? readString(env.USERPROFILE)
	if (home) {
		return path.join(home, 'Videos', 'Trimmed')
	}
	return process.cwd()
}

/**
 * Resolve the tool/output settings from the environment, then CLI overrides.
 */
export function resolveToolConfig(
	env: ToolConfigEnv = process.env,
	overrides: Partial<ToolConfig> = {},
): ToolConfig {
	return {
		toolPath:
			overrides.toolPath ??
			readString(env.TRIMLINE_FFMPEG_PATH) ??
			TRIM_CONFIG.ffmpegPath,
		probePath:
			overrides.probePath ??
			readString(env.TRIMLINE_FFPROBE_PATH) ??
			TRIM_CONFIG.ffprobePath,
		outputDirectory:
			overrides.outputDirectory ??
			readString(env.TRIMLINE_OUTPUT_DIR) ??
			getDefaultOutputDir(env),
		outputNamingPattern:
			overrides.outputNamingPattern ??
			readString(env.TRIMLINE_OUTPUT_PATTERN) ??
			TRIM_CONFIG.defaultNamingPattern,
		autoOpenOutput:
			overrides.autoOpenOutput ?? readBoolean(env.TRIMLINE_AUTO_OPEN),
	}
}

export function getTempRoot() {
	return os.tmpdir()
}
