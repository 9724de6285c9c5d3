import { parseOptions, GateOptionsSchema, WaitOptionsSchema, type GateOptions, type WaitOptions } from "./config.mjs"
import { StateError, UnknownWaiterError } from "./errors.mjs"
import { logger } from "./logger.mjs"
import { Outcome, outcomeOf, type SignalKind, type WaitOutcome } from "./outcome.mjs"
import { promiseScheduler } from "./promise-scheduler.mjs"
import type { SchedulerAdapter } from "./scheduler.mjs"
import { SignalSlot } from "./signal-slot.mjs"
import { taskScheduler } from "./task-scheduler.mjs"
import type { TaskIterable } from "./task.mjs"
import { WaiterRegistry, type Waiter, type WaiterId } from "./waiter-registry.mjs"

const log = logger.gate

export type Entered<S> = {
	/** Pass to cancel(). Issued even when the wait didn't suspend. */
	id: WaiterId
	outcome: S
}

export type CancelResult = "cancelled" | "already-resolved"

/**
 * Interruptible wait: tasks wait() until another task unblocks, interrupts or
 * cancels them, or until their timeout elapses.
 *
 * - Each signal resumes exactly one waiter, the earliest one.
 * - A signal nobody is waiting for stays pending (one slot, Interrupt
 * 	dominates Unblock) and is consumed by the next wait() without suspending.
 * - Pending signals and registered waiters never coexist.
 *
 * `S` is what a wait hands back, decided by the scheduler: a Promise with
 * gate(), a `yield*`-able with taskGate().
 */
export class Gate<S = Promise<WaitOutcome>> {

	readonly name: string
	#scheduler: SchedulerAdapter<S>
	#slot = new SignalSlot()
	#waiters = new WaiterRegistry()
	#lastId: WaiterId = 0
	#defaultTimeout?: number

	constructor(scheduler: SchedulerAdapter<S>, options: GateOptions = {}) {
		const opts = parseOptions(GateOptionsSchema, options, "Gate")
		this.#scheduler = scheduler
		this.name = opts.name ?? "gate"
		this.#defaultTimeout = opts.defaultTimeout
	}

	get pending(): SignalKind | undefined {
		return this.#slot.pending
	}

	get waiting(): number {
		return this.#waiters.size
	}

	wait(options?: WaitOptions): S {
		return this.enter(options).outcome
	}

	enter(options: WaitOptions = {}): Entered<S> {
		const { timeout = this.#defaultTimeout, signal } = parseOptions(WaitOptionsSchema, options, "Gate.wait")
		const scheduler = this.#scheduler

		const pendingKind = this.#slot.take()
		if (pendingKind) {
			const id = ++this.#lastId
			log("%s: waiter %d consumed pending %s", this.name, id, pendingKind)
			return { id, outcome: scheduler.immediate(outcomeOf(pendingKind)) }
		}

		if (signal?.aborted) {
			const id = ++this.#lastId
			log("%s: waiter %d aborted before waiting", this.name, id)
			return { id, outcome: scheduler.immediate(Outcome.Cancelled) }
		}

		// may throw (eg, a task gate used outside a task): nothing is registered yet
		const { handle, suspension } = scheduler.suspendCurrent()
		const id = ++this.#lastId
		const waiter: Waiter = { id, enqueuedAt: performance.now(), handle }
		this.#waiters.add(waiter)

		if (timeout !== undefined) {
			waiter.timer = scheduler.scheduleTimeout(timeout, () => this.#timedOut(id))
		}
		if (signal) {
			const listener = () => {
				this.cancel(id)
			}
			signal.addEventListener("abort", listener, { once: true })
			waiter.abort = { signal, listener }
		}

		log("%s: waiter %d suspended (%d waiting)", this.name, id, this.#waiters.size)
		return { id, outcome: suspension }
	}

	/** true if a waiter was resumed, false if the signal was left pending */
	signalUnblock(): boolean {
		return this.#signal("Unblock")
	}

	/** Like signalUnblock(), but a pending Interrupt is never overwritten */
	signalInterrupt(): boolean {
		return this.#signal("Interrupt")
	}

	#signal(kind: SignalKind): boolean {
		const waiter = this.#waiters.shift()
		if (waiter) {
			this.#resume(waiter, outcomeOf(kind))
			return true
		}
		const pending = this.#slot.offer(kind)
		log("%s: %s with no waiters, pending %s", this.name, kind, pending)
		return false
	}

	/**
	 * Resumes waiter `id` with Cancelled. Ids that already left (resumed by a
	 * signal, timed out, cancelled, fast path) report "already-resolved".
	 * Never touches the pending signal.
	 */
	cancel(id: WaiterId): CancelResult {
		if (!Number.isInteger(id) || id < 1 || id > this.#lastId) {
			throw new UnknownWaiterError("Gate.cancel", id)
		}
		const waiter = this.#waiters.remove(id)
		if (!waiter) {
			return "already-resolved"
		}
		this.#resume(waiter, Outcome.Cancelled)
		return "cancelled"
	}

	/** Drops the pending signal. Not allowed while anyone is waiting. */
	reset(): void {
		const n = this.#waiters.size
		if (n > 0) {
			throw new StateError("Gate.reset", `cannot reset ${this.name} while ${n} waiter(s) are registered`)
		}
		this.#slot.clear()
	}

	#timedOut(id: WaiterId): void {
		const waiter = this.#waiters.remove(id)
		if (!waiter) {
			return
		}
		log("%s: waiter %d timed out after %dms", this.name, id, Math.round(performance.now() - waiter.enqueuedAt))
		this.#resume(waiter, Outcome.TimedOut)
	}

	// waiter must already be out of the registry
	#resume(waiter: Waiter, outcome: WaitOutcome): void {
		const { timer, abort } = waiter
		timer?.cancel()
		if (abort) {
			abort.signal.removeEventListener("abort", abort.listener)
		}
		log("%s: waiter %d resumed with %s", this.name, waiter.id, outcome)
		this.#scheduler.resume(waiter.handle, outcome)
	}
}


/** Gate whose waits are promises */
export function gate(options?: GateOptions): Gate<Promise<WaitOutcome>> {
	return new Gate(promiseScheduler, options)
}

/** Gate for go() tasks: `const outcome = yield* g.wait()` */
export function taskGate(options?: GateOptions): Gate<TaskIterable<WaitOutcome>> {
	return new Gate(taskScheduler, options)
}
