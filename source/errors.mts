import type { ZodError } from "zod"
import type { WaitOutcome } from "./outcome.mjs"

/*
_op: the operation that failed, eg "Gate.reset", or the name of the generator
	function when a task fails.

- Timeouts, interrupts and cancellations are not errors, they are outcomes.
- Every error here is thrown synchronously by the call that caused it.
*/

export const ERR_TAG = "{iu!}"

export class IUE<Name extends string = string> implements Error {

	[ERR_TAG] = 1 as const
	declare cause?: unknown
	declare stack?: string

	constructor(
		readonly name: Name,
		readonly message: string,
		readonly _op: string,
		cause?: unknown,
	) {
		if (cause !== undefined) {
			this.cause = cause
		}
		Error.captureStackTrace(this, new.target)
	}
}

// make "instanceof Error" work
Object.setPrototypeOf(IUE.prototype, Error.prototype)

export class StateError extends IUE<"StateError"> {
	constructor(op: string, msg: string) {
		super("StateError", msg, op)
	}
}

export class UnknownWaiterError extends IUE<"UnknownWaiterError"> {
	constructor(op: string, readonly waiterId: number) {
		super("UnknownWaiterError", `waiter ${waiterId} was never issued by this gate`, op)
	}
}

export class OptionsError extends IUE<"OptionsError"> {
	constructor(op: string, cause: ZodError) {
		const msg = cause.issues
			.map(issue => `${issue.path.join(".") || "options"}: ${issue.message}`)
			.join("; ")
		super("OptionsError", msg, op, cause)
	}
}

export class TaskError extends IUE<"TaskError"> {
	constructor(taskName: string, cause: unknown) {
		const msg = cause instanceof Error ? cause.message : "task failed"
		super("TaskError", msg, taskName, cause)
	}
}

export class LimiterError extends IUE<"LimiterError"> {
	constructor(op: string, readonly outcome: WaitOutcome) {
		super("LimiterError", `no permit acquired (${outcome})`, op)
	}
}

export class UsageError extends IUE<"UsageError"> {
	constructor(op: string, msg: string) {
		super("UsageError", msg, op)
	}
}

export type IUErrors = StateError | UnknownWaiterError | OptionsError | TaskError | LimiterError | UsageError


export function isE(x: unknown): x is IUE {
	return x !== null && typeof x === "object" && ERR_TAG in x
}

export function errIs<N extends IUErrors["name"]>(x: unknown, name: N): x is Extract<IUErrors, { name: N }> {
	return isE(x) && x.name === name
}
