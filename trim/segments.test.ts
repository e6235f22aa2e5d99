import { test, expect } from 'vitest'
import {
	EMPTY_SEGMENT,
	SegmentList,
	createSegment,
	parseSegmentSpec,
} from './segments'

function createList(...ranges: Array<[string, string, string?]>) {
	const list = new SegmentList()
	for (const [start, end, name] of ranges) {
		list.add(createSegment(start, end, name))
	}
	return list
}

function names(list: SegmentList) {
	return list.all().map((segment) => segment.name)
}

test('checkOverlaps detects overlapping enabled segments', () => {
	const list = createList(['0', '10', 'A'], ['5', '15', 'B'])
	expect(list.checkOverlaps()).toBe(true)
})

test('checkOverlaps ignores disabled segments on either side of a pair', () => {
	const list = createList(['0', '10', 'A'], ['5', '15', 'B'])
	list.setEnabled(1, false)
	expect(list.checkOverlaps()).toBe(false)
	list.setEnabled(1, true)
	list.setEnabled(0, false)
	expect(list.checkOverlaps()).toBe(false)
})

test('checkOverlaps treats touching endpoints as separate', () => {
	const list = createList(['00:00:00.000', '00:00:10.000'], ['10', '20'])
	expect(list.checkOverlaps()).toBe(false)
})

test('checkOverlaps skips the excluded index', () => {
	const list = createList(['0', '10'], ['5', '15'], ['20', '30'])
	expect(list.checkOverlaps(1)).toBe(false)
	expect(list.checkOverlaps(2)).toBe(true)
})

test('checkOverlaps finds overlaps between non-adjacent segments', () => {
	const list = createList(['0', '5'], ['30', '40'], ['3', '8'])
	expect(list.checkOverlaps()).toBe(true)
})

test('removeAt and updateAt ignore out-of-range indexes', () => {
	const list = createList(['0', '1', 'a'], ['1', '2', 'b'])
	list.removeAt(5)
	list.removeAt(-1)
	list.updateAt(2, createSegment('9', '10', 'z'))
	expect(names(list)).toEqual(['a', 'b'])
	list.updateAt(1, createSegment('2', '3', 'c'))
	list.removeAt(0)
	expect(list.all()).toEqual([createSegment('2', '3', 'c')])
})

test('moveTo reorders segments by position', () => {
	const list = createList(['0', '1', 'a'], ['1', '2', 'b'], ['2', '3', 'c'])
	list.moveTo(0, 2)
	expect(names(list)).toEqual(['b', 'c', 'a'])
	list.moveTo(2, 0)
	expect(names(list)).toEqual(['a', 'b', 'c'])
})

test('moveTo is a no-op for equal or out-of-range indexes', () => {
	const list = createList(['0', '1', 'a'], ['1', '2', 'b'])
	list.moveTo(1, 1)
	list.moveTo(0, 2)
	list.moveTo(3, 0)
	expect(names(list)).toEqual(['a', 'b'])
})

test('getAt returns the empty sentinel when out of range', () => {
	const list = createList(['0', '1', 'a'])
	expect(list.getAt(0)).toEqual(createSegment('0', '1', 'a'))
	expect(list.getAt(1)).toBe(EMPTY_SEGMENT)
	expect(list.getAt(-1)).toBe(EMPTY_SEGMENT)
})

test('clear removes every segment', () => {
	const list = createList(['0', '1'], ['1', '2'])
	list.clear()
	expect(list.count).toBe(0)
	expect(list.hasSegments).toBe(false)
})

test('validateSegment prefixes individual timestamp errors', () => {
	const list = new SegmentList()
	expect(list.validateSegment(createSegment('bad', '10')).message).toBe(
		'Invalid start time: Invalid timestamp format. Use HH:MM:SS.mmm or decimal seconds',
	)
	expect(list.validateSegment(createSegment('0', '00:61:00')).message).toBe(
		'Invalid end time: Invalid time values (minutes/seconds must be < 60)',
	)
})

test('validateSegment rejects inverted ranges', () => {
	const list = new SegmentList()
	expect(list.validateSegment(createSegment('10', '5'))).toEqual({
		valid: false,
		message: 'Start time must be less than end time',
	})
	expect(list.validateSegment(createSegment('5', '10')).valid).toBe(true)
})

test('toTrimRanges keeps enabled segments in list order', () => {
	const list = createList(['20', '30'], ['00:00:01.500', '4'], ['40', '50'])
	list.setEnabled(2, false)
	expect(list.toTrimRanges()).toEqual([
		{ start: 20, end: 30 },
		{ start: 1.5, end: 4 },
	])
	expect(list.enabled()).toHaveLength(2)
})

test('exportMode defaults to merge', () => {
	const list = new SegmentList()
	expect(list.exportMode).toBe('merge')
	list.exportMode = 'separate'
	expect(list.exportMode).toBe('separate')
})

test('parseSegmentSpec reads clock timestamps with a name', () => {
	expect(parseSegmentSpec('00:00:01.000-00:00:05.000:intro')).toEqual({
		ok: true,
		segment: createSegment('00:00:01.000', '00:00:05.000', 'intro'),
	})
})

test('parseSegmentSpec reads decimal seconds without a name', () => {
	expect(parseSegmentSpec('12.5-20')).toEqual({
		ok: true,
		segment: createSegment('12.5', '20', ''),
	})
})

test('parseSegmentSpec keeps names that start with a digit', () => {
	expect(parseSegmentSpec('5-10:2nd take')).toEqual({
		ok: true,
		segment: createSegment('5', '10', '2nd take'),
	})
	expect(parseSegmentSpec('00:00:05-00:01:10.5:3 cameras')).toEqual({
		ok: true,
		segment: createSegment('00:00:05', '00:01:10.5', '3 cameras'),
	})
})

test('parseSegmentSpec rejects text without a range', () => {
	expect(parseSegmentSpec('intro').ok).toBe(false)
	expect(parseSegmentSpec('-5').ok).toBe(false)
	expect(parseSegmentSpec('5-').ok).toBe(false)
})
