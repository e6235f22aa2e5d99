import type { BatchSummary, JobStatus, TrimJob } from './types'

function describeJob(job: TrimJob | undefined, status: JobStatus) {
	const input = job?.inputPath ?? '(unknown input)'
	switch (status.state) {
		case 'completed':
			return `[ok] ${input}: ${status.message}`
		case 'failed':
			return `[failed] ${input}: ${status.reason}`
		case 'cancelled':
			return `[cancelled] ${input}`
		case 'not-started':
		case 'running':
			return `[skipped] ${input}`
	}
}

/**
 * Lines printed after a batch and written to the batch log: a totals line,
 * then one line per job in batch order.
 */
export function formatBatchSummary(summary: BatchSummary, jobs: TrimJob[]) {
	const total = summary.results.length
	const attempted = summary.results.filter(
		(status) => status.state !== 'not-started',
	).length
	const totals =
		`Processed ${attempted} of ${total} job${total === 1 ? '' : 's'}: ` +
		`${summary.successCount} succeeded, ${summary.failureCount} failed` +
		(summary.cancelled ? ' (cancelled)' : '')
	return [
		totals,
		...summary.results.map((status, index) => describeJob(jobs[index], status)),
	]
}
