export const Outcome = {
	Unblocked: "Unblocked",
	Interrupted: "Interrupted",
	TimedOut: "TimedOut",
	Cancelled: "Cancelled",
} as const

export type WaitOutcome = typeof Outcome[keyof typeof Outcome]

/** What a signal call leaves behind when nobody is waiting */
export type SignalKind = "Unblock" | "Interrupt"

export function outcomeOf(kind: SignalKind): WaitOutcome {
	return kind === "Interrupt" ? Outcome.Interrupted : Outcome.Unblocked
}

export function isOutcome(x: unknown): x is WaitOutcome {
	return x === Outcome.Unblocked || x === Outcome.Interrupted ||
		x === Outcome.TimedOut || x === Outcome.Cancelled
}
