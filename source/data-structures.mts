type Node<K, V> = {
	key: K
	val: V
	prev?: Node<K, V>
	next?: Node<K, V>
}

/**
 * Doubly-linked FIFO with a key index.
 * - push() appends at the tail, shift() and peek() read the head.
 * - delete(key) unlinks in O(1) through the index, so removing a waiter from
 * 	the middle of a long queue doesn't need a scan.
 */
export class IndexedList<K, V> {

	#head?: Node<K, V> = undefined
	#tail?: Node<K, V> = undefined
	#index = new Map<K, Node<K, V>>()

	get size(): number {
		return this.#index.size
	}

	has(key: K): boolean {
		return this.#index.has(key)
	}

	get(key: K): V | undefined {
		return this.#index.get(key)?.val
	}

	/** false (and nothing added) when key is already in the list */
	push(key: K, val: V): boolean {
		if (this.#index.has(key)) {
			return false
		}
		const tail = this.#tail
		const node: Node<K, V> = { key, val, prev: tail }
		if (tail) {
			tail.next = node
		}
		else {
			this.#head = node
		}
		this.#tail = node
		this.#index.set(key, node)
		return true
	}

	peek(): V | undefined {
		return this.#head?.val
	}

	shift(): V | undefined {
		const head = this.#head
		if (!head) {
			return undefined
		}
		this.#unlink(head)
		return head.val
	}

	delete(key: K): V | undefined {
		const node = this.#index.get(key)
		if (!node) {
			return undefined
		}
		this.#unlink(node)
		return node.val
	}

	#unlink(node: Node<K, V>): void {
		const { prev, next } = node
		if (prev) {
			prev.next = next
		}
		else {
			this.#head = next
		}
		if (next) {
			next.prev = prev
		}
		else {
			this.#tail = prev
		}
		node.prev = node.next = undefined
		this.#index.delete(node.key)
	}

	*[Symbol.iterator](): Generator<V, void, undefined> {
		let node = this.#head
		while (node) {
			yield node.val
			node = node.next
		}
	}
}


type CB<Arg> = (arg: Arg) => void

type Store<EvMap> = {
	[K in keyof EvMap]?: Array<CB<EvMap[K]> | undefined>
}

/**
 * One-shot events:
 * - _emit() calls every registered callback once and forgets them.
 * - _on() returns an array idx so that callers can remove at O(1)
 * 	(marking undefined).
 */
export class Events<EvMap extends Record<string, unknown>> {

	#store_m: Store<EvMap> = {}

	_on<K extends keyof EvMap>(name: K, cb: CB<EvMap[K]>): number {
		const cbs = this.#store_m[name]
		if (!cbs) {
			this.#store_m[name] = [cb]
			return 0
		}
		cbs.push(cb)
		return cbs.length - 1
	}

	_off<K extends keyof EvMap>(name: K, idx: number): void {
		const cbs = this.#store_m[name]
		if (cbs) {
			cbs[idx] = undefined
		}
	}

	_emit<K extends keyof EvMap>(name: K, val: EvMap[K]): void {
		const cbs = this.#store_m[name]
		if (!cbs) {
			return
		}
		this.#store_m[name] = undefined
		for (const cb of cbs) {
			cb?.(val)
		}
	}
}
