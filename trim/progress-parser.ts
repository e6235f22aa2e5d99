import { formatTimestamp, toSeconds } from './time-codec'
import type { ProgressSnapshot } from './types'

export const EMPTY_PROGRESS: Readonly<ProgressSnapshot> = Object.freeze({
	percentage: 0,
	currentTime: '',
	fps: '',
	speed: '',
})

const OUT_TIME_US_PATTERN = /out_time_us=(\d+)/
const STATS_TIME_PATTERN = /time=(\d{2}:\d{2}:\d{2}\.\d{2})/
const STATS_FPS_PATTERN = /fps=\s*(\d+\.?\d*)/
const STATS_SPEED_PATTERN = /speed=\s*(\d+\.?\d*)x/

function toPercentage(seconds: number, totalDurationSeconds: number) {
	if (!(totalDurationSeconds > 0)) return 0
	return Math.min(100, (seconds / totalDurationSeconds) * 100)
}

/**
 * Reads one line of ffmpeg output. `-progress` key/value lines
 * (`out_time_us=`) are tried first, then the stderr stats line
 * (`frame= ... fps= ... time=HH:MM:SS.ff ... speed=1.5x`).
 */
export function parseProgressLine(
	line: string,
	totalDurationSeconds: number,
): ProgressSnapshot {
	const outTime = OUT_TIME_US_PATTERN.exec(line)
	if (outTime?.[1]) {
		const seconds = Number(outTime[1]) / 1_000_000
		return {
			...EMPTY_PROGRESS,
			percentage: toPercentage(seconds, totalDurationSeconds),
			currentTime: formatTimestamp(seconds),
		}
	}

	const snapshot: ProgressSnapshot = { ...EMPTY_PROGRESS }
	const time = STATS_TIME_PATTERN.exec(line)?.[1]
	const seconds = time ? toSeconds(time) : null
	if (seconds !== null) {
		snapshot.currentTime = formatTimestamp(seconds)
		snapshot.percentage = toPercentage(seconds, totalDurationSeconds)
	}
	const fps = STATS_FPS_PATTERN.exec(line)?.[1]
	if (fps) {
		snapshot.fps = fps
	}
	const speed = STATS_SPEED_PATTERN.exec(line)?.[1]
	if (speed) {
		snapshot.speed = `${speed}x`
	}
	return snapshot
}

export function hasProgress(snapshot: ProgressSnapshot) {
	return (
		snapshot.percentage !== 0 ||
		snapshot.currentTime !== '' ||
		snapshot.fps !== '' ||
		snapshot.speed !== ''
	)
}

/**
 * Duration in seconds from `ffprobe ... format=duration` output, 0 when it
 * cannot be read.
 */
export function parseProbeOutput(stdout: string) {
	const value = Number.parseFloat(stdout.trim())
	return Number.isFinite(value) && value > 0 ? value : 0
}
