import { parseOptions, LimiterOptionsSchema, WaitOptionsSchema, type LimiterOptions, type WaitOptions } from "./config.mjs"
import { LimiterError, StateError } from "./errors.mjs"
import { gate, type Gate } from "./gate.mjs"
import { logger } from "./logger.mjs"
import { Outcome, type WaitOutcome } from "./outcome.mjs"

const log = logger.limiter

/**
 * At most `total` permits out at once, handed out in the order they were
 * asked for.
 *
 * release() passes its permit straight to the earliest waiter (through
 * Gate.signalUnblock()) instead of returning it to the pool, so a late
 * acquire() can't jump the queue.
 */
export class CapacityLimiter {

	readonly total: number
	readonly name: string
	#gate: Gate<Promise<WaitOutcome>>
	#borrowed = 0

	constructor(total: number, options: LimiterOptions = {}) {
		const opts = parseOptions(LimiterOptionsSchema, { ...options, total }, "CapacityLimiter")
		this.total = opts.total
		this.name = opts.name ?? "limiter"
		this.#gate = gate({ name: this.name })
	}

	get borrowed(): number {
		return this.#borrowed
	}

	get available(): number {
		return this.total - this.#borrowed
	}

	get waiting(): number {
		return this.#gate.waiting
	}

	/** Unblocked means a permit is held. Anything else holds nothing. */
	acquire(options: WaitOptions = {}): Promise<WaitOutcome> {
		parseOptions(WaitOptionsSchema, options, "CapacityLimiter.acquire")
		if (options.signal?.aborted) {
			return Promise.resolve(Outcome.Cancelled)
		}
		if (this.#borrowed < this.total && this.#gate.waiting === 0) {
			this.#borrowed++
			log("%s: acquired (%d/%d)", this.name, this.#borrowed, this.total)
			return Promise.resolve(Outcome.Unblocked)
		}
		return this.#gate.wait(options)
	}

	release(): void {
		if (this.#borrowed === 0) {
			throw new StateError("CapacityLimiter.release", `${this.name}: release() without a borrowed permit`)
		}
		if (this.#gate.waiting > 0) {
			this.#gate.signalUnblock()
			log("%s: permit handed over (%d waiting)", this.name, this.#gate.waiting)
			return
		}
		this.#borrowed--
		log("%s: released (%d/%d)", this.name, this.#borrowed, this.total)
	}

	/** Runs fn holding a permit. Throws LimiterError if none was acquired. */
	async use<T>(fn: () => T | Promise<T>, options?: WaitOptions): Promise<T> {
		const outcome = await this.acquire(options)
		if (outcome !== Outcome.Unblocked) {
			throw new LimiterError("CapacityLimiter.use", outcome)
		}
		try {
			return await fn()
		}
		finally {
			this.release()
		}
	}
}

export function limiter(total: number, options?: LimiterOptions): CapacityLimiter {
	return new CapacityLimiter(total, options)
}
