import { logger } from "./logger.mjs"
import type { WaitOutcome } from "./outcome.mjs"

/*
The seam between a gate and whatever runs the waiting code. A gate only ever:
	- suspends the caller (suspendCurrent) and keeps the returned handle,
	- hands back an already-settled suspension (immediate) on its fast path,
	- resumes a handle with an outcome,
	- arms timers.
It never learns whether the suspension is a promise or a parked generator.
*/

export type ResumeFn = (outcome: WaitOutcome) => void

/**
 * Resumes its waiter at most once. Later calls are noops that log a usage
 * warning on iu:scheduler.
 */
export class ResumeHandle {

	#resumeFn?: ResumeFn
	#outcome?: WaitOutcome = undefined

	constructor(resumeFn: ResumeFn) {
		this.#resumeFn = resumeFn
	}

	get resumed(): boolean {
		return this.#outcome !== undefined
	}

	get outcome(): WaitOutcome | undefined {
		return this.#outcome
	}

	_resume(outcome: WaitOutcome): boolean {
		const resumeFn = this.#resumeFn
		if (!resumeFn) {
			logger.scheduler("warning: handle already resumed with %s, ignoring %s", this.#outcome, outcome)
			return false
		}
		this.#resumeFn = undefined
		this.#outcome = outcome
		resumeFn(outcome)
		return true
	}
}

/**
 * A cancellable timer. cancel() both clears the timeout and flips a flag the
 * callback checks, so a callback already queued by the event loop won't run.
 */
export class TimeoutToken {

	#timeout?: NodeJS.Timeout
	#cancelled = false
	#fired = false

	constructor(ms: number, cb: () => void) {
		this.#timeout = setTimeout(() => {
			this.#timeout = undefined
			if (this.#cancelled) {
				return
			}
			this.#fired = true
			cb()
		}, ms)
	}

	get cancelled(): boolean {
		return this.#cancelled
	}

	get fired(): boolean {
		return this.#fired
	}

	cancel(): void {
		if (this.#cancelled) {
			return
		}
		this.#cancelled = true
		if (this.#timeout) {
			clearTimeout(this.#timeout)
			this.#timeout = undefined
		}
	}
}

export type Suspended<S> = {
	handle: ResumeHandle
	suspension: S
}

export interface SchedulerAdapter<S> {
	/** Parks the caller. It stays parked until the handle is resumed. */
	suspendCurrent(): Suspended<S>
	/** A suspension that is already settled, for callers that don't need to park */
	immediate(outcome: WaitOutcome): S
	/** false if the handle was already resumed */
	resume(handle: ResumeHandle, outcome: WaitOutcome): boolean
	scheduleTimeout(ms: number, callback: () => void): TimeoutToken
}

export abstract class BaseScheduler<S> implements SchedulerAdapter<S> {

	abstract suspendCurrent(): Suspended<S>

	abstract immediate(outcome: WaitOutcome): S

	resume(handle: ResumeHandle, outcome: WaitOutcome): boolean {
		return handle._resume(outcome)
	}

	scheduleTimeout(ms: number, callback: () => void): TimeoutToken {
		return new TimeoutToken(ms, callback)
	}
}
