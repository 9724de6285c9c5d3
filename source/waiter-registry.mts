import { IndexedList } from "./data-structures.mjs"
import { StateError } from "./errors.mjs"
import type { ResumeHandle, TimeoutToken } from "./scheduler.mjs"

export type WaiterId = number

export type Waiter = {
	id: WaiterId
	/** performance.now() when the waiter was registered */
	enqueuedAt: number
	handle: ResumeHandle
	timer?: TimeoutToken
	abort?: { signal: AbortSignal, listener: () => void }
}

/**
 * Waiters currently suspended on one gate, in the order they started waiting.
 * A waiter is in here exactly while it is suspended.
 */
export class WaiterRegistry {

	_list = new IndexedList<WaiterId, Waiter>()

	get size(): number {
		return this._list.size
	}

	has(id: WaiterId): boolean {
		return this._list.has(id)
	}

	add(waiter: Waiter): void {
		if (!this._list.push(waiter.id, waiter)) {
			throw new StateError("WaiterRegistry.add", `waiter ${waiter.id} is already registered`)
		}
	}

	/** Earliest waiter, left in place */
	peek(): Waiter | undefined {
		return this._list.peek()
	}

	/** Removes and returns the earliest waiter */
	shift(): Waiter | undefined {
		return this._list.shift()
	}

	/** Noop (undefined) when id is not registered */
	remove(id: WaiterId): Waiter | undefined {
		return this._list.delete(id)
	}

	[Symbol.iterator](): Iterator<Waiter> {
		return this._list[Symbol.iterator]()
	}
}
