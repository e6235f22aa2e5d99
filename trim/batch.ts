import { requireSegmentRange } from './commands'
import { BatchBusyError } from './errors'
import { buildSegmentOutputPath, generateOutputPath } from './paths'
import type { TrimDriver } from './trim-driver'
import type {
	BatchEvent,
	BatchSummary,
	JobStatus,
	RangeTrimJob,
	Segment,
	TimeRange,
	TrimJob,
} from './types'

export type BatchListener = (event: BatchEvent) => void

/**
 * Runs jobs one after another on a single driver. A failed job does not stop
 * the batch; a cancel leaves every job after the current one not started.
 */
export class BatchRunner {
	private readonly listeners = new Set<BatchListener>()
	private currentIndex = 0
	private running = false
	private cancelRequested = false

	constructor(private readonly driver: TrimDriver) {}

	get isRunning() {
		return this.running
	}

	get currentJobIndex() {
		return this.currentIndex
	}

	subscribe(listener: BatchListener) {
		this.listeners.add(listener)
		return () => {
			this.listeners.delete(listener)
		}
	}

	async run(jobs: TrimJob[]): Promise<BatchSummary> {
		if (this.running) {
			throw new BatchBusyError()
		}
		this.running = true
		this.cancelRequested = false
		this.currentIndex = 0

		const total = jobs.length
		const results = jobs.map((): JobStatus => ({ state: 'not-started' }))
		let successCount = 0
		let failureCount = 0
		let cancelled = false

		const unsubscribe = this.driver.subscribe((event) => {
			if (event.type !== 'progress') return
			this.emit({
				type: 'job-progress',
				index: this.currentIndex,
				total,
				snapshot: event.snapshot,
				overallPercentage:
					(this.currentIndex * 100 + event.snapshot.percentage) / total,
			})
		})

		try {
			for (; this.currentIndex < total; this.currentIndex++) {
				const job = jobs[this.currentIndex]
				if (!job) break
				if (this.cancelRequested) {
					cancelled = true
					break
				}
				const index = this.currentIndex
				this.emit({ type: 'job-start', index, total, job })
				// A listener may cancel while job-start is delivered.
				if (this.cancelRequested) {
					cancelled = true
					break
				}
				const status = await this.driver.start(job)
				results[index] = status
				this.emit({ type: 'job-end', index, total, status })
				if (status.state === 'completed') {
					successCount += 1
				} else if (status.state === 'failed') {
					failureCount += 1
				} else {
					cancelled = true
					break
				}
			}
		} finally {
			unsubscribe()
			this.running = false
			this.currentIndex = 0
		}

		const summary: BatchSummary = {
			successCount,
			failureCount,
			cancelled,
			results,
		}
		this.emit({ type: 'batch-end', summary })
		return summary
	}

	/**
	 * Cancels the running job, if any, and stops the batch before the next one.
	 */
	cancel() {
		if (!this.running) return
		this.cancelRequested = true
		this.driver.cancel()
	}

	private emit(event: BatchEvent) {
		for (const listener of this.listeners) {
			listener(event)
		}
	}
}

/**
 * One range job per input file, each with its own non-colliding output path.
 */
export async function buildFileBatch(
	inputs: string[],
	range: TimeRange,
	options: {
		outputDir: string
		pattern?: string
		copyCodec: boolean
		now?: Date
	},
): Promise<RangeTrimJob[]> {
	const reserved = new Set<string>()
	const jobs: RangeTrimJob[] = []
	for (const inputPath of inputs) {
		const outputPath = await generateOutputPath({
			inputPath,
			outputDir: options.outputDir,
			pattern: options.pattern,
			now: options.now,
			reserved,
		})
		reserved.add(outputPath)
		jobs.push({
			kind: 'range',
			inputPath,
			outputPath,
			range,
			copyCodec: options.copyCodec,
		})
	}
	return jobs
}

/**
 * One range job per enabled segment, numbered from the base output path.
 */
export function buildSegmentBatch(
	inputPath: string,
	segments: readonly Segment[],
	options: { outputBasePath: string; copyCodec: boolean },
): RangeTrimJob[] {
	return segments
		.filter((segment) => segment.enabled)
		.map((segment, index): RangeTrimJob => ({
			kind: 'range',
			inputPath,
			outputPath: buildSegmentOutputPath(
				options.outputBasePath,
				index + 1,
				segment.name,
			),
			range: requireSegmentRange(segment),
			copyCodec: options.copyCodec,
		}))
}
