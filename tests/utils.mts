import { expect } from "vitest"
import { IUE, ERR_TAG } from "../source/errors.mjs"

export function assertIUE(x: unknown): asserts x is IUE {
	expect(x).toBeInstanceOf(IUE)
}

export function sleepProm(ms: number): Promise<void> {
	return new Promise(res => setTimeout(res, ms))
}

/** Lets already-resolved promise callbacks run */
export async function flush(rounds = 5): Promise<void> {
	for (let i = 0; i < rounds; i++) {
		await Promise.resolve()
	}
}

/** Records what each promise settles to, in settle order */
export function track<T>(proms: Array<Promise<T>>): Array<[number, T]> {
	const settled: Array<[number, T]> = []
	proms.forEach((p, i) => {
		void p.then(v => {
			settled.push([i, v])
		})
	})
	return settled
}

export function checkErr(rec: unknown, expected: { name: string, _op: string, message?: string }): void {
	assertIUE(rec)
	expect(rec[ERR_TAG]).toBe(1)
	expect(rec).toBeInstanceOf(Error)
	expect(rec.name).toBe(expected.name)
	expect(rec._op).toBe(expected._op)
	if (expected.message !== undefined) {
		expect(rec.message).toBe(expected.message)
	}
}
