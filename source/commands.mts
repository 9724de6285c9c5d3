import { exec, execFile } from "node:child_process"
import { mkdir, rm } from "node:fs/promises"
import { basename, dirname } from "node:path"
import { UsageError } from "./errors.mjs"
import { CapacityLimiter } from "./limiter.mjs"
import { logger } from "./logger.mjs"

const log = logger.commands

/** A string runs through the shell, an array runs the program directly */
export type Command = string | string[]

export type CommandResult = {
	command: Command
	/** exit code, -1 when the command couldn't be run at all */
	code: number
	stdout: string
	stderr: string
}

export type ExecOptions = {
	cwd?: string
	env?: NodeJS.ProcessEnv
}

export type Executor = (command: Command, options: ExecOptions) => Promise<CommandResult>

export type RunOptions = ExecOptions & {
	exec?: Executor
}

type ExecCallbackErr = {
	code?: string | number | null
	message: string
}

// output is collected whole, with no size cap
const MAX_BUFFER = Infinity

export const childProcessExecutor: Executor = (command, { cwd, env }) => {
	return new Promise(res => {
		const done = (err: ExecCallbackErr | null, stdout: string, stderr: string) => {
			if (!err) {
				res({ command, code: 0, stdout, stderr })
				return
			}
			// string codes (ENOENT...) mean it never ran
			const code = typeof err.code === "number" ? err.code : -1
			res({ command, code, stdout, stderr: stderr || err.message })
		}

		if (typeof command === "string") {
			exec(command, { cwd, env, encoding: "utf8", maxBuffer: MAX_BUFFER }, done)
			return
		}
		const [file, ...args] = command
		if (file === undefined) {
			res({ command, code: -1, stdout: "", stderr: "empty command" })
			return
		}
		execFile(file, args, { cwd, env, encoding: "utf8", maxBuffer: MAX_BUFFER }, done)
	})
}

export function commandText(command: Command): string {
	return typeof command === "string" ? command : command.join(" ")
}

/** Never rejects: failures come back as code -1 */
export async function runCommand(command: Command, options: RunOptions = {}): Promise<CommandResult> {
	const { exec: executor = childProcessExecutor, cwd, env } = options
	log("run: %s", commandText(command))
	try {
		const result = await executor(command, { cwd, env })
		log("exit %d: %s", result.code, commandText(command))
		return result
	}
	catch (e) {
		const stderr = e instanceof Error ? e.message : String(e)
		log("failed: %s: %s", commandText(command), stderr)
		return { command, code: -1, stdout: "", stderr }
	}
}

/** Results come back in the order of `commands` */
export function runCommands(
	commands: Command[],
	{ maxConcurrent = 5, ...options }: RunOptions & { maxConcurrent?: number } = {},
): Promise<CommandResult[]> {
	const permits = new CapacityLimiter(maxConcurrent, { name: "commands" })
	return Promise.all(commands.map(cmd => permits.use(() => runCommand(cmd, options))))
}


/* **********  git clone  ********** */

export type ClonePair = {
	url: string
	dest?: string
}

/**
 * `URL [DEST] <sep> URL [DEST] ...` into pairs. Empty groups (leading,
 * trailing or doubled separators) are skipped.
 */
export function parseClonePairs(args: string[], separator = ","): ClonePair[] {
	const pairs: ClonePair[] = []
	let group: string[] = []

	const flush = () => {
		const [url, dest, ...rest] = group
		group = []
		if (url === undefined) {
			return
		}
		if (rest.length > 0) {
			throw new UsageError("parseClonePairs", `Invalid group: ${[url, dest, ...rest].join(" ")}. Expected URL and optional DEST.`)
		}
		pairs.push(dest === undefined ? { url } : { url, dest })
	}

	for (const arg of args) {
		if (arg === separator) {
			flush()
		}
		else {
			group.push(arg)
		}
	}
	flush()
	return pairs
}

export function gitCloneCommands(pairs: ClonePair[]): string[][] {
	return pairs.map(({ url, dest }) => dest ? ["git", "clone", url, dest] : ["git", "clone", url])
}


/* **********  archives  ********** */

export type ArchiveKind = "zip" | "tar"

const TAR_SUFFIXES = [".tar", ".tar.gz", ".tgz", ".tar.bz2", ".tar.xz"]

export function archiveKind(path: string): ArchiveKind | undefined {
	const lower = path.toLowerCase()
	if (lower.endsWith(".zip")) {
		return "zip"
	}
	return TAR_SUFFIXES.some(suffix => lower.endsWith(suffix)) ? "tar" : undefined
}

/** unzip for .zip, tar (compression detected by tar) for the rest */
export function extractCommand(archive: string, dest: string): string[] {
	const kind = archiveKind(archive)
	if (kind === undefined) {
		throw new UsageError("extractCommand", `Unsupported archive format for '${basename(archive)}'`)
	}
	return kind === "zip"
		? ["unzip", "-o", "-q", archive, "-d", dest]
		: ["tar", "-xf", archive, "-C", dest]
}

export type ExtractOptions = RunOptions & {
	/** defaults to the archive's directory */
	dest?: string
	/** delete the archive once it extracted cleanly */
	remove?: boolean
}

/**
 * Throws UsageError for an unsupported format. Everything else, including a
 * dest that can't be created, comes back as a failed result.
 */
export async function extractArchive(archive: string, options: ExtractOptions = {}): Promise<CommandResult> {
	const { dest = dirname(archive), remove = false, ...runOpts } = options
	const command = extractCommand(archive, dest)
	try {
		await mkdir(dest, { recursive: true })
	}
	catch (e) {
		const stderr = e instanceof Error ? e.message : String(e)
		log("extract: can't create %s: %s", dest, stderr)
		return { command, code: -1, stdout: "", stderr }
	}

	const result = await runCommand(command, runOpts)
	if (result.code === 0 && remove) {
		await rm(archive, { force: true })
		log("removed %s", archive)
	}
	return result
}
