import type { WaitOutcome } from "./outcome.mjs"
import { BaseScheduler, ResumeHandle, type Suspended } from "./scheduler.mjs"

class Deferred<T> {
	resolve: (val: T) => void = () => { }
	promise = new Promise<T>(res => {
		this.resolve = res
	})
}

/** Waiters are plain promises on the event loop: `await gate.wait()` */
export class PromiseScheduler extends BaseScheduler<Promise<WaitOutcome>> {

	suspendCurrent(): Suspended<Promise<WaitOutcome>> {
		const deferred = new Deferred<WaitOutcome>()
		return {
			handle: new ResumeHandle(deferred.resolve),
			suspension: deferred.promise,
		}
	}

	immediate(outcome: WaitOutcome): Promise<WaitOutcome> {
		return Promise.resolve(outcome)
	}
}

// stateless, safe to share between gates
export const promiseScheduler = new PromiseScheduler()
