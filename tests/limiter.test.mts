import { afterEach, beforeEach, describe, expect, it, vi } from "vitest"
import { LimiterError, OptionsError, StateError } from "../source/errors.mjs"
import { CapacityLimiter, limiter } from "../source/limiter.mjs"
import { flush, track } from "./utils.mjs"

describe("CapacityLimiter", () => {

	it("lends up to total permits right away, then queues", async () => {
		const lim = limiter(2)
		await expect(lim.acquire()).resolves.toBe("Unblocked")
		await expect(lim.acquire()).resolves.toBe("Unblocked")
		expect(lim.available).toBe(0)

		const third = lim.acquire()
		expect(lim.waiting).toBe(1)

		lim.release()
		await expect(third).resolves.toBe("Unblocked")
		expect(lim.borrowed).toBe(2)
		expect(lim.waiting).toBe(0)
	})

	it("hands released permits out in FIFO order", async () => {
		const lim = limiter(1)
		await lim.acquire()
		const settled = track([lim.acquire(), lim.acquire(), lim.acquire()])

		lim.release()
		await flush()
		expect(settled).toStrictEqual([[0, "Unblocked"]])

		lim.release()
		await flush()
		expect(settled).toStrictEqual([[0, "Unblocked"], [1, "Unblocked"]])
	})

	it("returns permits to the pool when nobody waits", async () => {
		const lim = limiter(3)
		await lim.acquire()
		lim.release()
		expect(lim.available).toBe(3)
		expect(() => lim.release()).toThrow(StateError)
	})

	it("use() never runs more than total at once and releases on failure", async () => {
		const lim = new CapacityLimiter(2, { name: "work" })
		let inFlight = 0
		let maxInFlight = 0

		const job = async (i: number) => {
			inFlight++
			maxInFlight = Math.max(maxInFlight, inFlight)
			await flush(2)
			inFlight--
			if (i === 3) {
				throw Error("job 3 failed")
			}
			return i
		}

		const results = await Promise.allSettled([0, 1, 2, 3, 4, 5].map(i => lim.use(() => job(i))))

		expect(maxInFlight).toBe(2)
		expect(results.map(r => r.status)).toStrictEqual(["fulfilled", "fulfilled", "fulfilled", "rejected", "fulfilled", "fulfilled"])
		expect(lim.borrowed).toBe(0)
		expect(lim.name).toBe("work")
	})

	it("rejects a non positive or fractional total", () => {
		expect(() => limiter(0)).toThrow(OptionsError)
		expect(() => limiter(1.5)).toThrow(OptionsError)
	})

	it("checks acquire options whether or not a permit is free", async () => {
		const lim = limiter(1)
		expect(() => lim.acquire({ timeout: -1 })).toThrow(OptionsError)
		expect(lim.borrowed).toBe(0)

		await lim.acquire()
		expect(() => lim.acquire({ timeout: -1 })).toThrow(OptionsError)
		expect(lim.waiting).toBe(0)
	})
})

describe("CapacityLimiter acquire() that gives up", () => {

	beforeEach(() => {
		vi.useFakeTimers()
	})

	afterEach(() => {
		vi.useRealTimers()
	})

	it("a timed-out acquire holds no permit", async () => {
		const lim = limiter(1)
		await lim.acquire()
		const late = lim.acquire({ timeout: 10 })
		vi.advanceTimersByTime(10)
		await expect(late).resolves.toBe("TimedOut")

		lim.release()
		expect(lim.borrowed).toBe(0)
	})

	it("use() throws LimiterError when the permit doesn't come", async () => {
		const lim = limiter(1)
		await lim.acquire()
		const fn = vi.fn()
		const ctrl = new AbortController()
		const used = lim.use(fn, { signal: ctrl.signal })
		ctrl.abort()
		await expect(used).rejects.toBeInstanceOf(LimiterError)
		expect(fn).not.toHaveBeenCalled()
		expect(lim.waiting).toBe(0)
	})

	it("an already aborted acquire returns Cancelled even with permits free", async () => {
		const lim = limiter(1)
		const ctrl = new AbortController()
		ctrl.abort()
		await expect(lim.acquire({ signal: ctrl.signal })).resolves.toBe("Cancelled")
		expect(lim.borrowed).toBe(0)
	})
})
