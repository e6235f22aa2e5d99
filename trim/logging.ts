import { writeFile } from 'node:fs/promises'
import { formatCommand } from '../utils'

type LogHook = () => void

let beforeLogHook: LogHook | null = null
let afterLogHook: LogHook | null = null

export function setLogHooks(hooks: {
	beforeLog?: LogHook
	afterLog?: LogHook
}) {
	beforeLogHook = hooks.beforeLog ?? null
	afterLogHook = hooks.afterLog ?? null
}

function withLogHooks(callback: () => void) {
	beforeLogHook?.()
	callback()
	afterLogHook?.()
}

export function logCommand(command: string[]) {
	withLogHooks(() => {
		console.log(`[cmd] ${formatCommand(command)}`)
	})
}

export function logInfo(message: string) {
	withLogHooks(() => {
		console.log(`[info] ${message}`)
	})
}

export function logWarn(message: string) {
	withLogHooks(() => {
		console.warn(`[warn] ${message}`)
	})
}

export function logError(message: string) {
	withLogHooks(() => {
		console.error(`[error] ${message}`)
	})
}

export async function writeBatchLog(logPath: string, lines: string[]) {
	await writeFile(logPath, `${lines.join('\n')}\n`)
}
