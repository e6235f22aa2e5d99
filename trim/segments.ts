import { toSeconds } from './time-codec'
import { validateTimeRange, validateTimestamp } from './validator'
import type { ExportMode, Segment, TimeRange } from './types'

/**
 * Returned by `getAt` for an out-of-range index. Compare by identity.
 */
export const EMPTY_SEGMENT: Readonly<Segment> = Object.freeze({
	start: '',
	end: '',
	name: '',
	enabled: false,
})

export function createSegment(
	start: string,
	end: string,
	name = '',
	enabled = true,
): Segment {
	return { start, end, name, enabled }
}

export type SegmentValidation =
	| { valid: true; message: '' }
	| { valid: false; message: string }

/**
 * Ordered, position-addressed list of trim segments. Out-of-range indexes are
 * ignored by every mutator.
 */
export class SegmentList {
	private segments: Segment[] = []
	private mode: ExportMode = 'merge'

	constructor(initial: Segment[] = []) {
		this.segments = initial.map((segment) => ({ ...segment }))
	}

	get count() {
		return this.segments.length
	}

	get hasSegments() {
		return this.segments.length > 0
	}

	get exportMode() {
		return this.mode
	}

	set exportMode(mode: ExportMode) {
		this.mode = mode
	}

	all(): readonly Readonly<Segment>[] {
		return this.segments.map((segment) => ({ ...segment }))
	}

	enabled(): Segment[] {
		return this.segments
			.filter((segment) => segment.enabled)
			.map((segment) => ({ ...segment }))
	}

	add(segment: Segment) {
		this.segments.push({ ...segment })
	}

	removeAt(index: number) {
		if (!this.isInBounds(index)) return
		this.segments.splice(index, 1)
	}

	updateAt(index: number, segment: Segment) {
		if (!this.isInBounds(index)) return
		this.segments[index] = { ...segment }
	}

	setEnabled(index: number, enabled: boolean) {
		const segment = this.segments[index]
		if (!segment) return
		segment.enabled = enabled
	}

	clear() {
		this.segments = []
	}

	moveTo(fromIndex: number, toIndex: number) {
		if (!this.isInBounds(fromIndex) || !this.isInBounds(toIndex)) return
		if (fromIndex === toIndex) return
		const [segment] = this.segments.splice(fromIndex, 1)
		if (!segment) return
		this.segments.splice(toIndex, 0, segment)
	}

	getAt(index: number): Readonly<Segment> {
		const segment = this.segments[index]
		if (!segment) {
			return EMPTY_SEGMENT
		}
		return { ...segment }
	}

	/**
	 * True when any two enabled segments share time. Touching endpoints do not
	 * count. Disabled segments and `excludeIndex` are left out of every pair.
	 */
	checkOverlaps(excludeIndex?: number) {
		const ranges = this.segments
			.map((segment, index) => ({ segment, index }))
			.filter(
				({ segment, index }) => segment.enabled && index !== excludeIndex,
			)
			.map(({ segment }) => ({
				start: toSeconds(segment.start) ?? 0,
				end: toSeconds(segment.end) ?? 0,
			}))
		for (let i = 0; i < ranges.length; i++) {
			const a = ranges[i]
			if (!a) continue
			for (let j = i + 1; j < ranges.length; j++) {
				const b = ranges[j]
				if (!b) continue
				if (a.start < b.end && a.end > b.start) {
					return true
				}
			}
		}
		return false
	}

	validateSegment(segment: Segment): SegmentValidation {
		const start = validateTimestamp(segment.start)
		if (!start.valid) {
			return { valid: false, message: `Invalid start time: ${start.message}` }
		}
		const end = validateTimestamp(segment.end)
		if (!end.valid) {
			return { valid: false, message: `Invalid end time: ${end.message}` }
		}
		const range = validateTimeRange(segment.start, segment.end)
		if (!range.valid) {
			return { valid: false, message: range.message }
		}
		return { valid: true, message: '' }
	}

	/**
	 * Enabled segments as numeric ranges, in list order.
	 */
	toTrimRanges(): TimeRange[] {
		return this.segments
			.filter((segment) => segment.enabled)
			.map((segment) => ({
				start: toSeconds(segment.start) ?? 0,
				end: toSeconds(segment.end) ?? 0,
			}))
	}

	private isInBounds(index: number) {
		return Number.isInteger(index) && index >= 0 && index < this.segments.length
	}
}

export type SegmentSpecResult =
	| { ok: true; segment: Segment }
	| { ok: false; message: string }

// The name starts at the first `:` after a complete end timestamp.
const SEGMENT_SPEC_PATTERN =
	/^(\S+?)-(\d+(?::\d{2}:\d{2})?(?:\.\d*)?)(?::(.*))?$/

/**
 * Parse the CLI form `start-end` or `start-end:name`.
 */
export function parseSegmentSpec(spec: string): SegmentSpecResult {
	const match = SEGMENT_SPEC_PATTERN.exec(spec.trim())
	if (!match?.[1] || !match[2]) {
		return {
			ok: false,
			message: `Invalid segment "${spec}". Use start-end or start-end:name`,
		}
	}
	const segment = createSegment(match[1], match[2], match[3]?.trim() ?? '')
	return { ok: true, segment }
}
