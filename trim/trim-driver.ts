import path from 'node:path'
import { mkdir, mkdtemp, stat, writeFile } from 'node:fs/promises'
import {
	buildJobPlan,
	buildProbeArgs,
	buildVersionArgs,
	jobNeedsTempDir,
	type CommandPlan,
	type PlannedCommand,
} from './commands'
import { TRIM_CONFIG, getTempRoot } from './config'
import {
	DriverBusyError,
	InputMissingError,
	NonZeroExitError,
	OutputDirError,
	ToolNotFoundError,
	TrimJobError,
	describeError,
} from './errors'
import { logCommand, logWarn } from './logging'
import { hasProgress, parseProbeOutput, parseProgressLine } from './progress-parser'
import type { ProcessRunner } from './process-runner'
import { formatTimestamp } from './time-codec'
import type {
	JobStatus,
	ProgressSnapshot,
	TerminalJobStatus,
	TimeRange,
	TrimEvent,
	TrimJob,
} from './types'
import { cleanupTempFiles } from './utils/file-utils'

export type TrimListener = (event: TrimEvent) => void

export type TrimDriverOptions = {
	runner: ProcessRunner
	toolPath?: string
	probePath?: string
	tempRoot?: string
}

type StepTiming = {
	step: PlannedCommand
	duration: number
}

/**
 * Runs one trim job at a time: preflight checks, a duration probe, then each
 * planned ffmpeg invocation in order. Progress and status go to subscribers
 * as tagged events; the terminal status is always the last event of a job.
 */
export class TrimDriver {
	private current: JobStatus = { state: 'not-started' }
	private readonly listeners = new Set<TrimListener>()
	private controller: AbortController | null = null
	private cancelRequested = false
	private readonly runner: ProcessRunner
	private readonly toolPath: string
	private readonly probePath: string
	private readonly tempRoot: string

	constructor(options: TrimDriverOptions) {
		this.runner = options.runner
		this.toolPath = options.toolPath ?? TRIM_CONFIG.ffmpegPath
		this.probePath = options.probePath ?? TRIM_CONFIG.ffprobePath
		this.tempRoot = options.tempRoot ?? getTempRoot()
	}

	get status(): JobStatus {
		return this.current
	}

	get isRunning() {
		return this.current.state === 'running'
	}

	subscribe(listener: TrimListener) {
		this.listeners.add(listener)
		return () => {
			this.listeners.delete(listener)
		}
	}

	/**
	 * Throws `DriverBusyError` synchronously when a job is already running.
	 * Otherwise resolves with the terminal status; it never rejects.
	 */
	start(job: TrimJob): Promise<TerminalJobStatus> {
		if (this.isRunning) {
			throw new DriverBusyError()
		}
		this.cancelRequested = false
		this.controller = new AbortController()
		this.setStatus({ state: 'running' })
		return this.execute(job, this.controller.signal).then((status) => {
			this.controller = null
			this.setStatus(status)
			return status
		})
	}

	/**
	 * Stops progress delivery at once and terminates the running ffmpeg
	 * process. No effect unless a job is running.
	 */
	cancel() {
		if (!this.isRunning || this.cancelRequested) return
		this.cancelRequested = true
		this.controller?.abort()
	}

	private emit(event: TrimEvent) {
		for (const listener of this.listeners) {
			listener(event)
		}
	}

	private setStatus(status: JobStatus) {
		this.current = status
		this.emit({ type: 'status', status })
	}

	private async execute(
		job: TrimJob,
		signal: AbortSignal,
	): Promise<TerminalJobStatus> {
		let tempDir: string | null = null
		let plan: CommandPlan | null = null
		try {
			await this.checkTool()
			await checkInput(job.inputPath)
			await ensureOutputDir(job.outputPath)
			const probedDuration = await this.probeDuration(job.inputPath)
			if (this.cancelRequested) return { state: 'cancelled' }

			if (jobNeedsTempDir(job)) {
				tempDir = await mkdtemp(path.join(this.tempRoot, TRIM_CONFIG.tempDirPrefix))
			}
			plan = buildJobPlan(job, { toolPath: this.toolPath, tempDir: tempDir ?? '' })
			if (plan.steps.length === 0) {
				throw new Error('No enabled segments to export')
			}
			const timings = computeStepTimings(plan.steps, probedDuration)

			for (const [index, timing] of timings.entries()) {
				if (this.cancelRequested) return { state: 'cancelled' }
				if (timing.step.range === null && plan.concatList) {
					await writeFile(plan.concatList.path, plan.concatList.body)
				}
				const exitCode = await this.runStep(timing, index, timings.length, signal)
				if (this.cancelRequested) return { state: 'cancelled' }
				if (exitCode !== 0) {
					throw new NonZeroExitError(exitCode)
				}
			}

			const total = timings.reduce((sum, timing) => sum + timing.duration, 0)
			const lastStep = timings.at(-1)
			this.emit({
				type: 'progress',
				snapshot: {
					percentage: 100,
					currentTime: formatTimestamp(lastStep?.duration ?? total),
					fps: '',
					speed: '',
				},
				step: {
					index: timings.length - 1,
					count: timings.length,
					label: lastStep?.step.label ?? '',
				},
			})
			return { state: 'completed', message: describeOutputs(plan.outputs) }
		} catch (error) {
			if (this.cancelRequested) return { state: 'cancelled' }
			return toFailedStatus(error)
		} finally {
			if (tempDir) {
				const files = plan ? [...plan.tempPaths] : []
				if (plan?.concatList) files.push(plan.concatList.path)
				await cleanupTempFiles(tempDir, files)
			}
		}
	}

	private async checkTool() {
		try {
			const result = await this.runner.run(buildVersionArgs(this.toolPath))
			if (result.exitCode === 0) return
		} catch (error) {
			logWarn(`Could not run ${this.toolPath}: ${describeError(error)}`)
		}
		throw new ToolNotFoundError(this.toolPath)
	}

	private async probeDuration(inputPath: string) {
		try {
			const result = await this.runner.run(buildProbeArgs(this.probePath, inputPath))
			if (result.exitCode !== 0) {
				logWarn(`Duration probe failed for ${inputPath}; progress will not show a percentage.`)
				return 0
			}
			return parseProbeOutput(result.stdout)
		} catch (error) {
			logWarn(`Duration probe failed for ${inputPath}: ${describeError(error)}`)
			return 0
		}
	}

	private runStep(
		timing: StepTiming,
		index: number,
		count: number,
		signal: AbortSignal,
	) {
		logCommand(timing.step.args)
		const step = { index, count, label: timing.step.label }
		const { exited } = this.runner.spawn(timing.step.args, {
			signal,
			onLine: (line) => {
				if (this.cancelRequested) return
				const parsed = parseProgressLine(line, timing.duration)
				if (!hasProgress(parsed)) return
				this.emit({
					type: 'progress',
					snapshot: toOverallSnapshot(parsed, index, count),
					step,
				})
			},
		})
		return exited
	}
}

function toOverallSnapshot(
	snapshot: ProgressSnapshot,
	index: number,
	count: number,
): ProgressSnapshot {
	if (count <= 1) return snapshot
	return {
		...snapshot,
		percentage: (index * 100 + snapshot.percentage) / count,
	}
}

/**
 * Expected output length per step: the range clipped to the probed duration,
 * or 0 when the probe failed. The concat pass covers every extracted range.
 */
export function computeStepTimings(
	steps: PlannedCommand[],
	probedDuration: number,
): StepTiming[] {
	const clip = (range: TimeRange) =>
		probedDuration > 0
			? Math.max(Math.min(range.end, probedDuration) - range.start, 0)
			: 0
	const extracted = steps.reduce(
		(sum, step) => (step.range ? sum + clip(step.range) : sum),
		0,
	)
	return steps.map((step) => ({
		step,
		duration: step.range ? clip(step.range) : extracted,
	}))
}

async function checkInput(inputPath: string) {
	const stats = await stat(inputPath).catch(() => null)
	if (!stats?.isFile()) {
		throw new InputMissingError(inputPath)
	}
}

async function ensureOutputDir(outputPath: string) {
	const dir = path.dirname(path.resolve(outputPath))
	try {
		await mkdir(dir, { recursive: true })
	} catch (error) {
		throw new OutputDirError(dir, describeError(error))
	}
}

function describeOutputs(outputs: string[]) {
	const [first] = outputs
	if (outputs.length === 1 && first) {
		return `Saved ${first}`
	}
	return `Saved ${outputs.length} files to ${path.dirname(first ?? '.')}`
}

function toFailedStatus(error: unknown): TerminalJobStatus {
	if (error instanceof TrimJobError) {
		return { state: 'failed', kind: error.kind, reason: error.message }
	}
	return { state: 'failed', kind: 'Unexpected', reason: describeError(error) }
}
