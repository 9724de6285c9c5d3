import { Events } from "./data-structures.mjs"
import { TaskError } from "./errors.mjs"
import { logger } from "./logger.mjs"
import { runningTask, sys } from "./system.mjs"

/*
The coroutine substrate taskGate() runs on. A task is a generator driven by
_resume():
	- it runs until it yields PARKED (or returns),
	- whatever parked it later calls _resume() (a timer) or _wake() (a
		resume handle) to run it to its next park.

Waiting on a gate reads as:

	go(function* worker() {
		const outcome = yield* gate.wait()
	})
*/

export const PARKED = Symbol("parked")

export type Yieldable = typeof PARKED

export type Gen<Ret = unknown, Rec = unknown> =
	Generator<Yieldable, Ret, Rec>

export type TaskGenFn<Ret = unknown, Args extends unknown[] = unknown[]> =
	(...args: Args) => Generator<Yieldable, Ret, unknown>

/** Something a task can `yield*` on */
export type TaskIterable<V> = {
	[Symbol.iterator](): Iterator<Yieldable, V, unknown>
}

type State = "PARKED" | "RUNNING" | "DONE"

type TaskEvents = {
	done: undefined
}

type Settled<Ret> =
	{ ok: true, val: Ret } |
	{ ok: false, err: TaskError }

export function go<Args extends unknown[], Ret>(genFn: TaskGenFn<Ret, Args>, ...args: Args): Task<Ret> {
	const gen = genFn(...args)
	return new Task<Ret>(gen, genFn.name || "anonymous")._run()
}

export class Task<Ret = unknown> extends Events<TaskEvents> {

	_gen: Gen<Ret>
	_name: string
	_state: State = "PARKED"
	_settled?: Settled<Ret> = undefined
	/** Set by whatever the task is currently parked on, see _wake() */
	_parkedOn?: object = undefined
	_sleepTO?: NodeJS.Timeout = undefined

	constructor(gen: Gen<Ret>, name: string) {
		super()
		this._gen = gen
		this._name = name
	}

	_run(): this {
		this._resume()
		return this
	}

	_resume(IOval?: unknown): void {
		if (this._state === "DONE") {
			logger.task("%s: resume after done ignored", this._name)
			return
		}

		sys.stack.push(this)
		this._state = "RUNNING"
		this._parkedOn = undefined

		let yielded: IteratorResult<Yieldable, Ret>
		try {
			yielded = this._gen.next(IOval)
		}
		catch (e) {
			sys.stack.pop()
			this.#settle({ ok: false, err: new TaskError(this._name, e) })
			return
		}

		sys.stack.pop()

		if (yielded.done) {
			this.#genFnReturned(yielded.value)
		}
		else {
			this._state = "PARKED"
		}
	}

	/**
	 * Resumes the task only if it is parked on `on`. A task that hasn't parked
	 * yet (or parked on something else, eg sleep()) picks the value up when it
	 * gets to it.
	 */
	_wake(on: object): void {
		if (this._state === "PARKED" && this._parkedOn === on) {
			this._resume()
		}
	}

	#genFnReturned(val: Ret) {
		if (val instanceof Error) {
			this.#settle({ ok: false, err: new TaskError(this._name, val) })
			return
		}
		this.#settle({ ok: true, val })
	}

	#settle(settled: Settled<Ret>) {
		if (this._sleepTO) {
			clearTimeout(this._sleepTO)
			this._sleepTO = undefined
		}
		this._settled = settled
		this._state = "DONE"
		logger.task("%s: %s", this._name, settled.ok ? "done" : "failed")
		this._emit("done", undefined)
	}

	_onDone(cb: (task: Task<Ret>) => void): void {
		if (this._state === "DONE") {
			cb(this)
			return
		}
		this._on("done", () => cb(this))
	}

	get name(): string {
		return this._name
	}

	get done(): boolean {
		return this._state === "DONE"
	}

	get failed(): boolean {
		return this._settled?.ok === false
	}

	/** Return value, the TaskError if it failed, undefined while running */
	get val(): Ret | TaskError | undefined {
		const settled = this._settled
		if (!settled) {
			return undefined
		}
		return settled.ok ? settled.val : settled.err
	}

	get promfy(): Promise<Ret> {
		return new Promise<Ret>((res, rej) => {
			this._onDone(({ _settled }) => {
				if (!_settled) {
					return
				}
				if (_settled.ok) {
					res(_settled.val)
				}
				else {
					rej(_settled.err)
				}
			})
		})
	}
}

export function sleep(ms: number): typeof PARKED {
	const caller = runningTask("sleep")

	caller._sleepTO = setTimeout(function to() {
		caller._sleepTO = undefined
		caller._resume()
	}, ms)

	return PARKED
}

export function me(): Task {
	return runningTask("me")
}
