import { spawn } from 'node:child_process'
import { join } from 'node:path'
import type { Readable, Writable } from 'node:stream'
import { completeWithOpenAi } from '../providers/openai-compatible.provider'
import { ProviderFailure } from '../provider-failure'
import { type CompletionJob, WorkerReplySchema } from '../schemas/categorization.schema'

export type ExecutionMode = 'inprocess' | 'subprocess'

/** How a completion request reaches the provider. Chosen once when the client is built. */
export interface AiExecutionStrategy {
	readonly mode: ExecutionMode
	run(job: CompletionJob, signal: AbortSignal): Promise<string>
}

export type CompletionFn = (job: CompletionJob, signal?: AbortSignal) => Promise<string>

export class InProcessExecution implements AiExecutionStrategy {
	readonly mode = 'inprocess'

	constructor(private readonly complete: CompletionFn = completeWithOpenAi) {}

	run(job: CompletionJob, signal: AbortSignal): Promise<string> {
		return this.complete(job, signal)
	}
}

export interface WorkerProcess {
	stdin: Writable
	stdout: Readable
	kill(): boolean
	once(event: 'close', listener: (code: number | null) => void): unknown
	once(event: 'error', listener: (err: Error) => void): unknown
}

export type WorkerSpawner = (command: string, args: string[]) => WorkerProcess

const spawnNode: WorkerSpawner = (command, args) =>
	spawn(command, args, { stdio: ['pipe', 'pipe', 'inherit'] })

export const DEFAULT_WORKER_PATH = join(__dirname, 'categorize.worker.js')

/**
 * One short-lived Node process per request. The job goes in as JSON on stdin and a
 * single `WorkerReply` comes back on stdout.
 */
export class SubprocessExecution implements AiExecutionStrategy {
	readonly mode = 'subprocess'

	constructor(
		private readonly workerPath: string = DEFAULT_WORKER_PATH,
		private readonly spawnWorker: WorkerSpawner = spawnNode
	) {}

	run(job: CompletionJob, signal: AbortSignal): Promise<string> {
		const provider = job.provider.name
		if (signal.aborted) {
			return Promise.reject(new ProviderFailure('timeout', `${provider} aborted before start`, provider))
		}

		return new Promise<string>((resolve, reject) => {
			const child = this.spawnWorker(process.execPath, [this.workerPath])
			let output = ''
			let settled = false

			const settle = (fn: () => void) => {
				if (settled) return
				settled = true
				signal.removeEventListener('abort', onAbort)
				fn()
			}
			const onAbort = () => {
				child.kill()
				settle(() => reject(new ProviderFailure('timeout', `${provider} worker aborted`, provider)))
			}

			signal.addEventListener('abort', onAbort, { once: true })
			child.stdout.setEncoding('utf8')
			child.stdout.on('data', (chunk: string) => {
				output += chunk
			})
			child.once('error', err =>
				settle(() => reject(new ProviderFailure('request_failed', err.message, provider)))
			)
			child.stdin.once('error', err => {
				child.kill()
				settle(() =>
					reject(new ProviderFailure('request_failed', `${provider} worker input failed: ${err.message}`, provider))
				)
			})
			child.once('close', code =>
				settle(() => {
					try {
						resolve(parseWorkerReply(output, code, provider))
					} catch (e) {
						reject(e)
					}
				})
			)
			child.stdin.end(JSON.stringify(job))
		})
	}
}

function parseWorkerReply(output: string, code: number | null, provider: string): string {
	let payload: unknown
	try {
		payload = JSON.parse(output.trim())
	} catch {
		throw new ProviderFailure(
			'malformed_reply',
			`${provider} worker exited with code ${code} and no readable reply`,
			provider
		)
	}
	const reply = WorkerReplySchema.safeParse(payload)
	if (!reply.success) {
		throw new ProviderFailure('malformed_reply', `${provider} worker reply has the wrong shape`, provider)
	}
	if (!reply.data.ok) throw new ProviderFailure('request_failed', reply.data.error, provider)
	return reply.data.content
}

export type ExecutionModeSetting = ExecutionMode | 'auto'

export function resolveExecutionMode(
	setting: ExecutionModeSetting,
	platform: NodeJS.Platform = process.platform
): ExecutionMode {
	if (setting !== 'auto') return setting
	return platform === 'win32' ? 'subprocess' : 'inprocess'
}

export function createExecutionStrategy(
	setting: ExecutionModeSetting,
	platform: NodeJS.Platform = process.platform
): AiExecutionStrategy {
	return resolveExecutionMode(setting, platform) === 'subprocess'
		? new SubprocessExecution()
		: new InProcessExecution()
}
