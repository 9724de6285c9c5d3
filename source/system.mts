import { StateError } from "./errors.mjs"
import type { Task } from "./task.mjs"

class System {
	stack: Array<Task> = []

	get running(): Task | undefined {
		return this.stack.at(-1)
	}
}

export const sys = new System()

export function runningTask(op = "runningTask"): Task {
	const task = sys.running
	if (!task) {
		throw new StateError(op, "must be called from inside a running task")
	}
	return task
}
