import type { SignalKind } from "./outcome.mjs"

/**
 * Interrupt dominates unblock: a pending Interrupt is never downgraded, and an
 * incoming Interrupt replaces a pending Unblock nobody consumed.
 */
export function nextPending(current: SignalKind | undefined, incoming: SignalKind): SignalKind {
	if (current === "Interrupt") {
		return current
	}
	return incoming
}

/** Holds at most one signal that arrived while nobody was waiting */
export class SignalSlot {

	_pending?: SignalKind = undefined

	get pending(): SignalKind | undefined {
		return this._pending
	}

	get isEmpty(): boolean {
		return this._pending === undefined
	}

	offer(kind: SignalKind): SignalKind {
		return this._pending = nextPending(this._pending, kind)
	}

	take(): SignalKind | undefined {
		const kind = this._pending
		this._pending = undefined
		return kind
	}

	clear(): void {
		this._pending = undefined
	}
}
