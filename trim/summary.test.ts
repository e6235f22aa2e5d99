import { test, expect } from 'vitest'
import { formatBatchSummary } from './summary'
import type { RangeTrimJob } from './types'

function job(inputPath: string): RangeTrimJob {
	return {
		kind: 'range',
		inputPath,
		outputPath: `${inputPath}.out.mp4`,
		range: { start: 0, end: 1 },
		copyCodec: true,
	}
}

test('formatBatchSummary lists totals then each job', () => {
	expect(
		formatBatchSummary(
			{
				successCount: 1,
				failureCount: 1,
				cancelled: false,
				results: [
					{ state: 'completed', message: 'Saved /out/a.mp4' },
					{ state: 'failed', kind: 'NonZeroExit', reason: 'ffmpeg exited with code 1' },
				],
			},
			[job('/in/a.mp4'), job('/in/b.mp4')],
		),
	).toEqual([
		'Processed 2 of 2 jobs: 1 succeeded, 1 failed',
		'[ok] /in/a.mp4: Saved /out/a.mp4',
		'[failed] /in/b.mp4: ffmpeg exited with code 1',
	])
})

test('formatBatchSummary marks cancelled and skipped jobs', () => {
	expect(
		formatBatchSummary(
			{
				successCount: 0,
				failureCount: 0,
				cancelled: true,
				results: [{ state: 'cancelled' }, { state: 'not-started' }],
			},
			[job('/in/a.mp4'), job('/in/b.mp4')],
		),
	).toEqual([
		'Processed 1 of 2 jobs: 0 succeeded, 0 failed (cancelled)',
		'[cancelled] /in/a.mp4',
		'[skipped] /in/b.mp4',
	])
})

test('formatBatchSummary uses the singular for one job', () => {
	expect(
		formatBatchSummary(
			{
				successCount: 1,
				failureCount: 0,
				cancelled: false,
				results: [{ state: 'completed', message: 'Saved x' }],
			},
			[job('/in/a.mp4')],
		)[0],
	).toBe('Processed 1 of 1 job: 1 succeeded, 0 failed')
})
