import type { WaitOutcome } from "./outcome.mjs"
import { BaseScheduler, ResumeHandle, type Suspended } from "./scheduler.mjs"
import { runningTask } from "./system.mjs"
import { PARKED, type Task, type TaskIterable, type Yieldable } from "./task.mjs"

/*
- next() before the value is set parks the task on this suspension.
- _settle() stores the value and wakes the task if it's parked here;
	otherwise the task finds the value on its next `yield*`.
*/
class TaskSuspension<V> implements Iterator<Yieldable, V, unknown> {

	#task?: Task
	#settled?: { val: V } = undefined

	constructor(task?: Task) {
		this.#task = task
	}

	[Symbol.iterator](): this {
		return this
	}

	next(): IteratorResult<Yieldable, V> {
		const settled = this.#settled
		if (settled) {
			return { done: true, value: settled.val }
		}
		const task = this.#task
		if (task) {
			task._parkedOn = this
		}
		return { done: false, value: PARKED }
	}

	_settle(val: V): void {
		this.#settled = { val }
		this.#task?._wake(this)
	}
}

/** Waiters are parked generator tasks: `yield* gate.wait()` inside go() */
export class TaskScheduler extends BaseScheduler<TaskIterable<WaitOutcome>> {

	suspendCurrent(): Suspended<TaskIterable<WaitOutcome>> {
		const task = runningTask("TaskScheduler.suspendCurrent")
		const suspension = new TaskSuspension<WaitOutcome>(task)
		return {
			handle: new ResumeHandle(outcome => suspension._settle(outcome)),
			suspension,
		}
	}

	immediate(outcome: WaitOutcome): TaskIterable<WaitOutcome> {
		const suspension = new TaskSuspension<WaitOutcome>()
		suspension._settle(outcome)
		return suspension
	}
}

export const taskScheduler = new TaskScheduler()
