#!/usr/bin/env -S node --import tsx
import path from 'node:path'
import type { Arguments } from 'yargs'
import yargs from 'yargs/yargs'
import { hideBin } from 'yargs/helpers'
import {
	PromptCancelled,
	createInquirerPrompter,
	createPathPicker,
	createTrimProgressReporter,
	isInteractive,
	pauseActiveSpinner,
	promptForTimestamp,
	resolveOptionalString,
	resumeActiveSpinner,
	setActiveSpinnerText,
	type PathPicker,
	type Prompter,
	withSpinner,
} from './cli-ux'
import { BatchRunner, buildFileBatch } from './trim/batch'
import {
	configureBatchCommand,
	configureCheckCommand,
	configureProbeCommand,
	configureSegmentsCommand,
	configureTrimCommand,
	normalizeBatchArgs,
	normalizeSegmentsArgs,
	normalizeTrimArgs,
	readToolOverrides,
} from './trim/cli'
import {
	buildJobPlan,
	buildOpenArgs,
	buildProbeArgs,
	buildVersionArgs,
	formatCommandPreview,
	jobNeedsTempDir,
} from './trim/commands'
import {
	TRIM_CONFIG,
	VIDEO_EXTENSIONS,
	getTempRoot,
	resolveToolConfig,
} from './trim/config'
import { describeError } from './trim/errors'
import { logInfo, logWarn, setLogHooks, writeBatchLog } from './trim/logging'
import { buildBatchLogPath } from './trim/paths'
import { prepareRangeJob, prepareSegmentJob } from './trim/prepare'
import { parseProbeOutput } from './trim/progress-parser'
import { createNodeProcessRunner } from './trim/process-runner'
import { createSegment } from './trim/segments'
import { formatBatchSummary } from './trim/summary'
import { formatTimestampPrecise, toSeconds } from './trim/time-codec'
import { TrimDriver } from './trim/trim-driver'
import type { Segment, ToolConfig, TrimJob } from './trim/types'
import {
	validateInputFile,
	validatePathSafety,
	validateTimeRange,
} from './trim/validator'

type CliUxContext = {
	interactive: boolean
	prompter?: Prompter
	pathPicker?: PathPicker
}

class JobCancelled extends Error {
	constructor() {
		super('Cancelled.')
		this.name = 'JobCancelled'
	}
}

async function main(rawArgs = hideBin(process.argv)) {
	const context = createCliUxContext()
	let args = rawArgs

	if (context.interactive && args.length === 0 && context.prompter) {
		const selection = await promptForCommand(context.prompter)
		if (!selection) {
			return
		}
		args = selection
	}

	const parser = yargs(args)
		.scriptName('trimline')
		.command(
			'trim [input]',
			'Cut one time range out of a video',
			configureTrimCommand,
			async (argv) => {
				await handleTrim(argv, context)
			},
		)
		.command(
			'segments [input]',
			'Export several segments, joined or as separate files',
			configureSegmentsCommand,
			async (argv) => {
				await handleSegments(argv, context)
			},
		)
		.command(
			'batch [input...]',
			'Cut the same time range out of several videos',
			configureBatchCommand,
			async (argv) => {
				await handleBatch(argv, context)
			},
		)
		.command(
			'probe [input]',
			'Print the duration of a video',
			configureProbeCommand,
			async (argv) => {
				await handleProbe(argv, context)
			},
		)
		.command(
			'check',
			'Check that ffmpeg can be launched',
			configureCheckCommand,
			async (argv) => {
				await handleCheck(argv)
			},
		)
		.demandCommand(1)
		.strict()
		.help()

	await parser.parseAsync()
}

function createCliUxContext(): CliUxContext {
	const interactive = isInteractive()
	if (!interactive) {
		return { interactive }
	}
	const prompter = createInquirerPrompter()
	const pathPicker = createPathPicker(prompter)
	return { interactive, prompter, pathPicker }
}

async function promptForCommand(
	prompter: Prompter,
): Promise<string[] | null> {
	const selection = await prompter.select('Choose a command', [
		{ name: 'Cut one time range out of a video', value: 'trim' },
		{
			name: 'Export several segments, joined or as separate files',
			value: 'segments',
		},
		{ name: 'Cut the same time range out of several videos', value: 'batch' },
		{ name: 'Print the duration of a video', value: 'probe' },
		{ name: 'Check that ffmpeg can be launched', value: 'check' },
		{ name: 'Show help', value: 'help' },
		{ name: 'Exit', value: 'exit' },
	])
	switch (selection) {
		case 'exit':
			return null
		case 'help':
			return ['--help']
		default:
			return [selection]
	}
}

async function resolveInputPath(
	value: string | null,
	context: CliUxContext,
): Promise<string> {
	if (value) return value
	if (!context.interactive || !context.pathPicker) {
		throw new Error('Input video file is required.')
	}
	return context.pathPicker.pickExistingFile({
		message: 'Select input video file',
		extensions: VIDEO_EXTENSIONS,
	})
}

async function resolveTimestamp(
	value: string | null,
	context: CliUxContext,
	options: { message: string; flag: string; defaultValue?: string },
): Promise<string> {
	if (value) return value
	if (!context.interactive || !context.prompter) {
		throw new Error(`${options.message} is required (${options.flag}).`)
	}
	return promptForTimestamp(
		context.prompter,
		options.message,
		options.defaultValue,
	)
}

async function promptForInputFiles(context: CliUxContext) {
	if (!context.prompter || !context.pathPicker) {
		throw new Error('At least one input file is required.')
	}
	const inputPaths: string[] = []
	let addAnother = true
	while (addAnother) {
		const inputPath = await context.pathPicker.pickExistingFile({
			message:
				inputPaths.length === 0
					? 'Select input video file'
					: 'Select another input video file',
			extensions: VIDEO_EXTENSIONS,
		})
		inputPaths.push(inputPath)
		addAnother = await context.prompter.confirm('Add another input file?', {
			defaultValue: false,
		})
	}
	return inputPaths
}

async function promptForSegments(context: CliUxContext): Promise<Segment[]> {
	if (!context.prompter) {
		throw new Error('At least one --segment is required.')
	}
	const prompter = context.prompter
	const segments: Segment[] = []
	let addAnother = true
	while (addAnother) {
		const number = segments.length + 1
		const start = await promptForTimestamp(
			prompter,
			`Segment ${number} start`,
			segments.at(-1)?.end,
		)
		const end = await promptForTimestamp(prompter, `Segment ${number} end`)
		const name = await prompter.input(`Segment ${number} name (optional)`)
		segments.push(createSegment(start, end, name.trim()))
		addAnother = await prompter.confirm('Add another segment?', {
			defaultValue: false,
		})
	}
	return segments
}

function resolveConfig(argv: Arguments) {
	return resolveToolConfig(process.env, readToolOverrides(argv))
}

async function handleTrim(argv: Arguments, context: CliUxContext) {
	const args = normalizeTrimArgs(argv)
	const config = resolveConfig(argv)
	const inputPath = await resolveInputPath(args.inputPath, context)
	const start = await resolveTimestamp(args.start, context, {
		message: 'Start time',
		flag: '--start',
		defaultValue: '00:00:00.000',
	})
	const end = await resolveTimestamp(args.end, context, {
		message: 'End time',
		flag: '--end',
	})
	const prepared = await prepareRangeJob({
		inputPath,
		start,
		end,
		outputPath: args.outputPath,
		outputDir: config.outputDirectory,
		pattern: config.outputNamingPattern,
		copyCodec: args.copyCodec,
	})
	if (!prepared.ok) {
		throw new Error(prepared.message)
	}
	if (args.dryRun) {
		printPlan(prepared.job, config)
		return
	}
	await runSingleJob(prepared.job, config, context)
}

async function handleSegments(argv: Arguments, context: CliUxContext) {
	const args = normalizeSegmentsArgs(argv)
	const config = resolveConfig(argv)
	const inputPath = await resolveInputPath(args.inputPath, context)
	const segments =
		args.segments.length > 0 || !context.interactive
			? args.segments
			: await promptForSegments(context)
	const prepared = await prepareSegmentJob({
		inputPath,
		segments,
		exportMode: args.exportMode,
		outputPath: args.outputPath,
		outputDir: config.outputDirectory,
		pattern: config.outputNamingPattern,
		copyCodec: args.copyCodec,
	})
	if (!prepared.ok) {
		throw new Error(prepared.message)
	}
	if (args.dryRun) {
		printPlan(prepared.job, config)
		return
	}
	await runSingleJob(prepared.job, config, context)
}

async function handleBatch(argv: Arguments, context: CliUxContext) {
	const args = normalizeBatchArgs(argv)
	const config = resolveConfig(argv)
	const inputPaths =
		args.inputPaths.length > 0
			? args.inputPaths
			: context.interactive
				? await promptForInputFiles(context)
				: []
	if (inputPaths.length === 0) {
		throw new Error('At least one input file is required.')
	}
	const start = await resolveTimestamp(args.start, context, {
		message: 'Start time',
		flag: '--start',
		defaultValue: '00:00:00.000',
	})
	const end = await resolveTimestamp(args.end, context, {
		message: 'End time',
		flag: '--end',
	})
	const range = validateTimeRange(start, end)
	if (!range.valid) {
		throw new Error(range.message)
	}
	const resolvedInputs = inputPaths.map((inputPath) => path.resolve(inputPath))
	for (const inputPath of resolvedInputs) {
		const safety = validatePathSafety(inputPath)
		const input = safety.valid ? await validateInputFile(inputPath) : safety
		if (!input.valid) {
			throw new Error(input.message)
		}
	}

	const jobs = await buildFileBatch(
		resolvedInputs,
		{ start: toSeconds(start) ?? 0, end: toSeconds(end) ?? 0 },
		{
			outputDir: config.outputDirectory,
			pattern: config.outputNamingPattern,
			copyCodec: args.copyCodec,
		},
	)
	for (const job of jobs) {
		const safety = validatePathSafety(job.outputPath)
		if (!safety.valid) {
			throw new Error(safety.message)
		}
	}
	if (args.dryRun) {
		for (const job of jobs) {
			printPlan(job, config)
		}
		return
	}

	const driver = createDriver(config)
	const batch = new BatchRunner(driver)
	const reporter = createTrimProgressReporter('Batch', setActiveSpinnerText)
	let action = 'Batch'
	const unsubscribe = batch.subscribe((event) => {
		if (event.type === 'job-start') {
			action = `Job ${event.index + 1}/${event.total}: ${path.basename(event.job.inputPath)}`
			return
		}
		if (event.type === 'job-progress') {
			reporter.update({
				percentage: event.overallPercentage,
				label: action,
				currentTime: event.snapshot.currentTime,
				speed: event.snapshot.speed,
			})
		}
	})
	const summary = await withInterruptCancel(
		() => batch.cancel(),
		() =>
			withSpinner(
				`Trimming ${jobs.length} file(s)`,
				async () => {
					setLogHooks({
						beforeLog: pauseActiveSpinner,
						afterLog: resumeActiveSpinner,
					})
					try {
						return await batch.run(jobs)
					} finally {
						setLogHooks({})
						unsubscribe()
					}
				},
				{ successText: 'Batch finished', enabled: context.interactive },
			),
	)

	const lines = formatBatchSummary(summary, jobs)
	for (const line of lines) {
		console.log(line)
	}
	if (args.writeLog) {
		const logPath = buildBatchLogPath(config.outputDirectory)
		await writeBatchLog(logPath, lines)
		logInfo(`Batch log written to ${logPath}`)
	}
	if (summary.failureCount > 0 || summary.cancelled) {
		process.exitCode = 1
	}
}

async function handleProbe(argv: Arguments, context: CliUxContext) {
	const config = resolveConfig(argv)
	const inputPath = path.resolve(
		await resolveInputPath(resolveOptionalString(argv.input) ?? null, context),
	)
	const input = await validateInputFile(inputPath)
	if (!input.valid) {
		throw new Error(input.message)
	}
	const runner = createNodeProcessRunner()
	const result = await runner.run(buildProbeArgs(config.probePath, inputPath))
	const duration = result.exitCode === 0 ? parseProbeOutput(result.stdout) : 0
	if (duration <= 0) {
		throw new Error(`Could not read the duration of ${inputPath}`)
	}
	console.log(formatTimestampPrecise(duration))
}

async function handleCheck(argv: Arguments) {
	const config = resolveConfig(argv)
	const runner = createNodeProcessRunner()
	const result = await runner
		.run(buildVersionArgs(config.toolPath))
		.catch((error: unknown) => {
			throw new Error(
				`ffmpeg not found at "${config.toolPath}": ${describeError(error)}`,
			)
		})
	if (result.exitCode !== 0) {
		throw new Error(
			`ffmpeg at "${config.toolPath}" exited with code ${result.exitCode}`,
		)
	}
	const [versionLine] = result.stdout.split(/\r?\n/)
	console.log(versionLine?.trim() || `ffmpeg available at ${config.toolPath}`)
}

function createDriver(config: ToolConfig) {
	return new TrimDriver({
		runner: createNodeProcessRunner(),
		toolPath: config.toolPath,
		probePath: config.probePath,
	})
}

function printPlan(job: TrimJob, config: ToolConfig) {
	const tempDir = jobNeedsTempDir(job)
		? path.join(getTempRoot(), `${TRIM_CONFIG.tempDirPrefix}XXXXXX`)
		: ''
	const plan = buildJobPlan(job, { toolPath: config.toolPath, tempDir })
	console.log(`# ${path.basename(job.inputPath)}`)
	for (const step of plan.steps) {
		if (step.range === null && plan.concatList) {
			console.log(`# write ${plan.concatList.path}`)
			for (const line of plan.concatList.body.trimEnd().split('\n')) {
				console.log(`#   ${line}`)
			}
		}
		console.log(`# ${step.label}`)
		console.log(formatCommandPreview(step.args))
	}
}

async function runSingleJob(
	job: TrimJob,
	config: ToolConfig,
	context: CliUxContext,
) {
	const driver = createDriver(config)
	const reporter = createTrimProgressReporter(
		`Trimming ${path.basename(job.inputPath)}`,
		setActiveSpinnerText,
	)
	const unsubscribe = driver.subscribe((event) => {
		if (event.type !== 'progress') return
		reporter.update({
			percentage: event.snapshot.percentage,
			label: event.step.count > 1 ? event.step.label : undefined,
			currentTime: event.snapshot.currentTime,
			speed: event.snapshot.speed,
		})
	})
	const message = await withInterruptCancel(
		() => driver.cancel(),
		() =>
			withSpinner(
				`Trimming ${path.basename(job.inputPath)}`,
				async () => {
					setLogHooks({
						beforeLog: pauseActiveSpinner,
						afterLog: resumeActiveSpinner,
					})
					try {
						const status = await driver.start(job)
						if (status.state === 'failed') {
							throw new Error(status.reason)
						}
						if (status.state === 'cancelled') {
							throw new JobCancelled()
						}
						reporter.finish()
						return status.message
					} finally {
						setLogHooks({})
						unsubscribe()
					}
				},
				{
					successText: 'Trim complete',
					failText: 'Trim stopped',
					enabled: context.interactive,
				},
			),
	)
	console.log(message)
	if (config.autoOpenOutput) {
		await openOutput(
			job.kind === 'segments' && job.exportMode === 'separate'
				? path.dirname(job.outputPath)
				: job.outputPath,
		)
	}
}

async function openOutput(target: string) {
	const result = await createNodeProcessRunner()
		.run(buildOpenArgs(target, process.platform))
		.catch((error: unknown) => {
			logWarn(`Could not open ${target}: ${describeError(error)}`)
			return null
		})
	if (result && result.exitCode !== 0) {
		logWarn(`Could not open ${target} (exit code ${result.exitCode})`)
	}
}

/**
 * Ctrl+C cancels the running job instead of killing the CLI, so temporary
 * files are still cleaned up.
 */
async function withInterruptCancel<T>(
	cancel: () => void,
	action: () => Promise<T>,
): Promise<T> {
	const onInterrupt = () => {
		logWarn('Cancelling...')
		cancel()
	}
	process.on('SIGINT', onInterrupt)
	try {
		return await action()
	} finally {
		process.off('SIGINT', onInterrupt)
	}
}

main().catch((error) => {
	if (error instanceof PromptCancelled) {
		console.log('[info] Cancelled.')
		return
	}
	if (error instanceof JobCancelled) {
		console.log('[info] Cancelled.')
		process.exitCode = 1
		return
	}
	console.error(`[error] ${describeError(error)}`)
	process.exit(1)
})
