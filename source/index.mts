export { Gate, gate, taskGate, type CancelResult, type Entered } from "./gate.mjs"
export { Outcome, outcomeOf, isOutcome, type WaitOutcome, type SignalKind } from "./outcome.mjs"
export { SignalSlot, nextPending } from "./signal-slot.mjs"
export { WaiterRegistry, type Waiter, type WaiterId } from "./waiter-registry.mjs"
export { BaseScheduler, ResumeHandle, TimeoutToken, type SchedulerAdapter, type Suspended } from "./scheduler.mjs"
export { PromiseScheduler, promiseScheduler } from "./promise-scheduler.mjs"
export { TaskScheduler, taskScheduler } from "./task-scheduler.mjs"
export { go, sleep, me, Task, PARKED, type TaskGenFn, type TaskIterable } from "./task.mjs"
export { CapacityLimiter, limiter } from "./limiter.mjs"
export {
	runCommand, runCommands, parseClonePairs, gitCloneCommands, childProcessExecutor,
	archiveKind, extractCommand, extractArchive,
	type Command, type CommandResult, type Executor, type ArchiveKind, type ExtractOptions,
} from "./commands.mjs"
export { loadConfig, type Config, type GateOptions, type WaitOptions, type LimiterOptions } from "./config.mjs"
export { IUE, StateError, UnknownWaiterError, OptionsError, TaskError, LimiterError, UsageError, isE, errIs, type IUErrors } from "./errors.mjs"
