import { Logger } from '@nestjs/common'

export const KEY_COOLDOWN_MS = 5 * 60 * 1000

export interface PickedKey {
	key: string
	index: number
}

/**
 * Round-robin over a provider's API keys. A key that failed is skipped until its
 * cooldown passes; when every key is cooling down the first key is handed out anyway.
 */
export class KeyRing {
	private readonly logger: Logger
	private cursor = 0
	private readonly failedAt = new Map<number, number>()

	constructor(
		readonly name: string,
		private readonly keys: readonly string[],
		private readonly now: () => number = Date.now
	) {
		this.logger = new Logger(`KeyRing:${name}`)
	}

	get size(): number {
		return this.keys.length
	}

	next(): PickedKey | null {
		if (!this.keys.length) return null
		for (let attempts = 0; attempts < this.keys.length; attempts++) {
			const index = this.cursor
			this.cursor = (this.cursor + 1) % this.keys.length
			const failed = this.failedAt.get(index)
			if (failed != null && this.now() - failed < KEY_COOLDOWN_MS) continue
			return { key: this.keys[index], index }
		}
		this.logger.error(`All ${this.keys.length} keys are cooling down, retrying key #1`)
		return { key: this.keys[0], index: 0 }
	}

	markSuccess(index: number): void {
		this.failedAt.delete(index)
	}

	markFailure(index: number, error?: unknown): void {
		this.failedAt.set(index, this.now())
		const msg = error instanceof Error ? error.message : String(error ?? 'unknown error')
		this.logger.error(`Key #${index + 1} marked as failed: ${msg.slice(0, 100)}`)
	}

	reset(): void {
		this.cursor = 0
		this.failedAt.clear()
	}
}
