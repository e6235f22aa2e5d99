export type TimeRange = {
	start: number
	end: number
}

export type Segment = {
	start: string
	end: string
	name: string
	enabled: boolean
}

export type ExportMode = 'merge' | 'separate'

export type ValidationErrorKind =
	| 'InvalidTimestamp'
	| 'StartTimeAfterEndTime'
	| 'FileNotFound'
	| 'FileNotReadable'
	| 'InvalidFormat'
	| 'OutputNotWritable'
	| 'InsufficientDiskSpace'
	| 'PathContainsDangerousChars'

export type ValidationResult =
	| { valid: true; errorKind: null; message: '' }
	| { valid: false; errorKind: ValidationErrorKind; message: string }

export type JobErrorKind =
	| 'ToolNotFound'
	| 'InputMissing'
	| 'OutputDirUnwritable'
	| 'ProcessLaunchFailed'
	| 'NonZeroExit'

export type RangeTrimJob = {
	kind: 'range'
	inputPath: string
	outputPath: string
	range: TimeRange
	copyCodec: boolean
}

export type SegmentTrimJob = {
	kind: 'segments'
	inputPath: string
	// Final output in merge mode, base path for numbered files in separate mode.
	outputPath: string
	segments: Segment[]
	copyCodec: boolean
	exportMode: ExportMode
}

export type TrimJob = RangeTrimJob | SegmentTrimJob

export type ProgressSnapshot = {
	percentage: number
	currentTime: string
	fps: string
	speed: string
}

export type JobStatus =
	| { state: 'not-started' }
	| { state: 'running' }
	| { state: 'completed'; message: string }
	| { state: 'failed'; kind: JobErrorKind | 'Unexpected'; reason: string }
	| { state: 'cancelled' }

export type TerminalJobStatus = Extract<
	JobStatus,
	{ state: 'completed' | 'failed' | 'cancelled' }
>

export type TrimEvent =
	| { type: 'status'; status: JobStatus }
	| {
			type: 'progress'
			snapshot: ProgressSnapshot
			step: { index: number; count: number; label: string }
	  }

export type BatchSummary = {
	successCount: number
	failureCount: number
	cancelled: boolean
	results: JobStatus[]
}

export type BatchEvent =
	| { type: 'job-start'; index: number; total: number; job: TrimJob }
	| {
			type: 'job-progress'
			index: number
			total: number
			snapshot: ProgressSnapshot
			overallPercentage: number
	  }
	| { type: 'job-end'; index: number; total: number; status: JobStatus }
	| { type: 'batch-end'; summary: BatchSummary }

export type ToolConfig = {
	toolPath: string
	probePath: string
	outputDirectory: string
	outputNamingPattern: string
	autoOpenOutput: boolean
}
