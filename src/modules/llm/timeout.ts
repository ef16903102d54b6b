import { ProviderFailure } from './provider-failure'

/**
 * Runs `task` with an abort signal that fires after `ms`. The returned promise rejects
 * with a `timeout` failure at that moment even if the task ignores the signal.
 */
export async function withTimeout<T>(
	task: (signal: AbortSignal) => Promise<T>,
	ms: number,
	label: string
): Promise<T> {
	const controller = new AbortController()
	let timer: NodeJS.Timeout | undefined
	const expired = new Promise<never>((_, reject) => {
		timer = setTimeout(() => {
			controller.abort()
			reject(new ProviderFailure('timeout', `${label} timed out after ${ms}ms`, label))
		}, ms)
	})
	try {
		return await Promise.race([task(controller.signal), expired])
	} finally {
		clearTimeout(timer)
	}
}
