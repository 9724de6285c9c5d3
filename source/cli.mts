import { readFileSync } from "node:fs"
import { Command, CommanderError, InvalidArgumentError } from "commander"
import { z } from "zod"
import { commandText, extractArchive, gitCloneCommands, parseClonePairs, runCommands, type CommandResult, type Executor } from "./commands.mjs"
import { loadConfig } from "./config.mjs"
import { errIs, isE } from "./errors.mjs"
import { gate } from "./gate.mjs"
import { logger } from "./logger.mjs"
import { isOutcome, Outcome } from "./outcome.mjs"

const log = logger.cli

export const EXIT = {
	[Outcome.Unblocked]: 0,
	usage: 1,
	failed: 1,
	[Outcome.Interrupted]: 2,
	[Outcome.TimedOut]: 3,
	[Outcome.Cancelled]: 4,
	StateError: 5,
} as const

export type SignalSource = {
	on(event: NodeJS.Signals, listener: () => void): unknown
	off(event: NodeJS.Signals, listener: () => void): unknown
}

export type CliIO = {
	out: (line: string) => void
	err: (line: string) => void
	signals: SignalSource
	env: NodeJS.ProcessEnv
	exec?: Executor
}

/** For an outcome or a thrown error */
export function exitCodeFor(x: unknown): number {
	if (isOutcome(x)) {
		return EXIT[x]
	}
	return errIs(x, "StateError") ? EXIT.StateError : EXIT.usage
}


/* **********  Argument parsers  ********** */

function parseMillis(value: string): number {
	const n = Number(value)
	if (value.trim() === "" || !Number.isFinite(n) || n < 0) {
		throw new InvalidArgumentError("Expected a non-negative number of milliseconds.")
	}
	return n
}

function parsePositiveInt(value: string): number {
	const n = Number(value)
	if (!Number.isInteger(n) || n < 1) {
		throw new InvalidArgumentError("Expected a positive integer.")
	}
	return n
}

const PackageJson = z.object({ version: z.string() })

// source/ when run from sources, dist/source/ when built
function readVersion(): string {
	for (const rel of ["../package.json", "../../package.json"]) {
		try {
			const raw: unknown = JSON.parse(readFileSync(new URL(rel, import.meta.url), "utf8"))
			const parsed = PackageJson.safeParse(raw)
			if (parsed.success) {
				return parsed.data.version
			}
		}
		catch (e) {
			log("no package.json at %s: %O", rel, e)
		}
	}
	return "0.0.0"
}


/* **********  Program  ********** */

const KEEP_ALIVE_MS = 2 ** 30

type WaitOpts = { timeout?: number, name: string }
type PoolOpts = { concurrent?: number, cwd?: string }
type CloneOpts = PoolOpts & { separator: string }
type ExtractOpts = { output?: string, remove?: boolean }

/**
 * Builds the `iu` program. Each action stores its exit code in `result.code`.
 * exitOverride() keeps commander from calling process.exit().
 */
export function createProgram(io: CliIO, result: { code: number }): Command {

	const program = new Command("iu")
		.description("Interruptible waits and bounded concurrent commands")
		.version(readVersion())
		.exitOverride()
		.configureOutput({
			writeOut: s => io.out(s.trimEnd()),
			writeErr: s => io.err(s.trimEnd()),
		})

	program.command("wait")
		.description("Wait until signalled: SIGUSR1 unblocks, SIGUSR2 or SIGINT interrupt, SIGTERM cancels")
		.option("-t, --timeout <ms>", "give up after this many milliseconds (default: $IU_TIMEOUT)", parseMillis)
		.option("-n, --name <label>", "label printed with the outcome", "gate")
		.action(async (opts: WaitOpts) => {
			const config = loadConfig(io.env)
			const g = gate({ name: opts.name })
			const { id, outcome } = g.enter({ timeout: opts.timeout ?? config.timeout })

			const handlers: Array<[NodeJS.Signals, () => void]> = [
				["SIGUSR1", () => { g.signalUnblock() }],
				["SIGUSR2", () => { g.signalInterrupt() }],
				["SIGINT", () => { g.signalInterrupt() }],
				["SIGTERM", () => { g.cancel(id) }],
			]
			for (const [sig, handler] of handlers) {
				io.signals.on(sig, handler)
			}
			// signal listeners don't keep node running, a pending timer does
			const keepAlive = setInterval(() => {}, KEEP_ALIVE_MS)

			try {
				const res = await outcome
				io.out(`${g.name}: ${res}`)
				result.code = exitCodeFor(res)
			}
			finally {
				clearInterval(keepAlive)
				for (const [sig, handler] of handlers) {
					io.signals.off(sig, handler)
				}
			}
		})

	program.command("shell")
		.description("Run shell commands concurrently")
		.argument("<commands...>", "commands, each one quoted")
		.option("-c, --concurrent <n>", "maximum concurrent commands (default: $IU_CONCURRENCY or 5)", parsePositiveInt)
		.option("--cwd <dir>", "working directory")
		.action(async (commands: string[], opts: PoolOpts) => {
			const config = loadConfig(io.env)
			const results = await runCommands(commands, {
				maxConcurrent: opts.concurrent ?? config.concurrency,
				cwd: opts.cwd,
				exec: io.exec,
			})
			report(io, results, "commands")
			result.code = 0
		})

	program.command("git-clone")
		.description("Clone repositories concurrently. Format: URL [DEST] [SEP URL [DEST] ...]")
		.argument("<args...>", "URL and optional DEST groups")
		.option("-s, --separator <sep>", "separator between URL/DEST groups", ",")
		.option("-c, --concurrent <n>", "maximum concurrent clones (default: $IU_CONCURRENCY or 5)", parsePositiveInt)
		.option("--cwd <dir>", "working directory")
		.action(async (args: string[], opts: CloneOpts) => {
			const config = loadConfig(io.env)
			const pairs = parseClonePairs(args, opts.separator)
			if (pairs.length === 0) {
				io.err("Error: No valid URL/DEST pairs provided.")
				result.code = EXIT.usage
				return
			}
			const results = await runCommands(gitCloneCommands(pairs), {
				maxConcurrent: opts.concurrent ?? config.concurrency,
				cwd: opts.cwd,
				exec: io.exec,
			})
			report(io, results, "clones")
			result.code = 0
		})

	program.command("extract")
		.description("Extract a ZIP or TAR archive")
		.argument("<archive>", ".zip, .tar, .tar.gz, .tgz, .tar.bz2 or .tar.xz")
		.option("-o, --output <dir>", "output directory (default: the archive's directory)")
		.option("--remove", "remove the archive after extraction")
		.action(async (archive: string, opts: ExtractOpts) => {
			const res = await extractArchive(archive, {
				dest: opts.output,
				remove: opts.remove,
				exec: io.exec,
			})
			if (res.code === 0) {
				io.out(`Extracted ${archive}`)
				result.code = 0
				return
			}
			io.out(`[${res.code}] ${commandText(res.command)}`)
			if (res.stderr.trim()) {
				io.err(res.stderr.trimEnd())
			}
			result.code = EXIT.failed
		})

	return program
}

function report(io: CliIO, results: CommandResult[], noun: string): void {
	let ok = 0
	for (const { command, code, stderr } of results) {
		io.out(`[${code}] ${commandText(command)}`)
		if (code === 0) {
			ok++
		}
		else if (stderr.trim()) {
			io.err(stderr.trimEnd())
		}
	}
	io.out(`Finished ${results.length} ${noun}. ${ok} succeeded.`)
}

/** Runs `iu` with user args (no node/script prefix), resolves to the exit code */
export async function run(argv: string[], io: CliIO): Promise<number> {
	const result = { code: 0 }
	const program = createProgram(io, result)
	try {
		await program.parseAsync(argv, { from: "user" })
		return result.code
	}
	catch (e) {
		if (e instanceof CommanderError) {
			return e.exitCode
		}
		if (isE(e)) {
			io.err(`Error: ${e.message}`)
			return exitCodeFor(e)
		}
		throw e
	}
}
