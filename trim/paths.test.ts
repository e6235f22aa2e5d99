import path from 'node:path'
import os from 'node:os'
import { mkdtemp, rm, writeFile } from 'node:fs/promises'
import { test, expect } from 'vitest'
import {
	applyNamingPattern,
	buildBatchLogPath,
	buildConcatListPath,
	buildSegmentOutputPath,
	buildTempSegmentPath,
	formatFileTimestamp,
	generateOutputPath,
} from './paths'

const FIXED_DATE = new Date(2024, 2, 5, 9, 7, 3)

async function createTempDir(): Promise<string> {
	return mkdtemp(path.join(os.tmpdir(), 'trim-paths-'))
}

test('formatFileTimestamp uses local YYYYMMDD_HHMMSS', () => {
	expect(formatFileTimestamp(FIXED_DATE)).toBe('20240305_090703')
})

test('applyNamingPattern fills every placeholder', () => {
	expect(
		applyNamingPattern('{name}-{timestamp}-{name}', {
			name: 'talk',
			timestamp: 'now',
		}),
	).toBe('talk-now-talk')
})

test('generateOutputPath applies the default pattern and input extension', async () => {
	const tmpDir = await createTempDir()
	try {
		const result = await generateOutputPath({
			inputPath: '/videos/talk.mov',
			outputDir: tmpDir,
			now: FIXED_DATE,
		})
		expect(result).toBe(path.join(tmpDir, 'talk_trimmed_20240305_090703.mov'))
	} finally {
		await rm(tmpDir, { recursive: true, force: true })
	}
})

test('generateOutputPath appends a counter on collision', async () => {
	const tmpDir = await createTempDir()
	try {
		await writeFile(path.join(tmpDir, 'talk-cut.mp4'), '')
		await writeFile(path.join(tmpDir, 'talk-cut_1.mp4'), '')
		const result = await generateOutputPath({
			inputPath: '/videos/talk.mp4',
			outputDir: tmpDir,
			pattern: '{name}-cut',
			now: FIXED_DATE,
		})
		expect(result).toBe(path.join(tmpDir, 'talk-cut_2.mp4'))
	} finally {
		await rm(tmpDir, { recursive: true, force: true })
	}
})

test('generateOutputPath sanitizes dangerous characters from the name', async () => {
	const tmpDir = await createTempDir()
	try {
		const result = await generateOutputPath({
			inputPath: '/videos/a;b$c.mp4',
			outputDir: tmpDir,
			pattern: '{name}',
		})
		expect(result).toBe(path.join(tmpDir, 'a_b_c.mp4'))
	} finally {
		await rm(tmpDir, { recursive: true, force: true })
	}
})

test('buildSegmentOutputPath numbers segments from the base path', () => {
	expect(buildSegmentOutputPath('/out/clip.mp4', 2)).toBe(
		path.join('/out', 'clip_02.mp4'),
	)
	expect(buildSegmentOutputPath('/out/clip.mp4', 12, 'Q&A part')).toBe(
		path.join('/out', 'clip_12_Q_A-part.mp4'),
	)
})

test('buildTempSegmentPath and buildConcatListPath stay inside the temp dir', () => {
	expect(buildTempSegmentPath('/tmp/job', 3, '.mkv')).toBe(
		path.join('/tmp/job', 'segment-03.mkv'),
	)
	expect(buildConcatListPath('/tmp/job')).toBe(
		path.join('/tmp/job', 'concat-list.txt'),
	)
})

test('buildBatchLogPath uses trimline-batch.log', () => {
	expect(buildBatchLogPath('/out')).toBe(path.join('/out', 'trimline-batch.log'))
})

test('generateOutputPath skips reserved paths', async () => {
	const tmpDir = await createTempDir()
	try {
		const result = await generateOutputPath({
			inputPath: '/a/clip.mp4',
			outputDir: tmpDir,
			pattern: '{name}',
			reserved: new Set([path.join(tmpDir, 'clip.mp4')]),
		})
		expect(result).toBe(path.join(tmpDir, 'clip_1.mp4'))
	} finally {
		await rm(tmpDir, { recursive: true, force: true })
	}
})
