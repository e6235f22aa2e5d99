const CLOCK_PATTERN = /^(\d{2,}):(\d{2}):(\d{2})(?:\.(\d{0,3}))?$/
const DECIMAL_PATTERN = /^\d+(?:\.\d*)?$/

// Float noise guard so 1.001 * 1000 still truncates to 1001.
const MS_EPSILON = 1e-6

export type TimestampParseResult =
	| { ok: true; seconds: number }
	| { ok: false; error: 'InvalidTimestamp'; message: string }

function invalid(message: string): TimestampParseResult {
	return { ok: false, error: 'InvalidTimestamp', message }
}

/**
 * Parse `HH:MM:SS[.mmm]` or plain decimal seconds.
 */
export function parseTimestamp(text: string): TimestampParseResult {
	const value = text.trim()
	if (!value) {
		return invalid('Timestamp cannot be empty')
	}
	const clock = CLOCK_PATTERN.exec(value)
	if (clock) {
		const [, hours = '0', minutes = '0', seconds = '0', fraction = ''] = clock
		const m = Number.parseInt(minutes, 10)
		const s = Number.parseInt(seconds, 10)
		if (m >= 60 || s >= 60) {
			return invalid('Invalid time values (minutes/seconds must be < 60)')
		}
		const fractional = fraction ? Number.parseFloat(`0.${fraction}`) : 0
		return {
			ok: true,
			seconds: Number.parseInt(hours, 10) * 3600 + m * 60 + s + fractional,
		}
	}
	if (DECIMAL_PATTERN.test(value)) {
		const seconds = Number.parseFloat(value)
		if (Number.isFinite(seconds)) {
			return { ok: true, seconds }
		}
	}
	return invalid('Invalid timestamp format. Use HH:MM:SS.mmm or decimal seconds')
}

export function toSeconds(text: string): number | null {
	const parsed = parseTimestamp(text)
	return parsed.ok ? parsed.seconds : null
}

function splitClock(totalSeconds: number) {
	const safe = Number.isFinite(totalSeconds) ? Math.max(0, totalSeconds) : 0
	const totalMs = Math.floor(safe * 1000 + MS_EPSILON)
	const hours = Math.floor(totalMs / 3_600_000)
	const minutes = Math.floor((totalMs % 3_600_000) / 60_000)
	const seconds = Math.floor((totalMs % 60_000) / 1000)
	const milliseconds = totalMs % 1000
	return { hours, minutes, seconds, milliseconds }
}

function pad(value: number, width = 2) {
	return String(value).padStart(width, '0')
}

/**
 * Zero-padded `HH:MM:SS`, components truncated. Hours are not wrapped at 24.
 */
export function formatTimestamp(totalSeconds: number) {
	const { hours, minutes, seconds } = splitClock(totalSeconds)
	return `${pad(hours)}:${pad(minutes)}:${pad(seconds)}`
}

export function formatTimestampPrecise(totalSeconds: number) {
	const { hours, minutes, seconds, milliseconds } = splitClock(totalSeconds)
	return `${pad(hours)}:${pad(minutes)}:${pad(seconds)}.${pad(milliseconds, 3)}`
}
