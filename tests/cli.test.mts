import { EventEmitter } from "node:events"
import { existsSync } from "node:fs"
import { mkdtemp, rm, writeFile } from "node:fs/promises"
import { tmpdir } from "node:os"
import { join } from "node:path"
import { afterEach, beforeEach, describe, expect, it, vi } from "vitest"
import { EXIT, exitCodeFor, run, type CliIO } from "../source/cli.mjs"
import { commandText, type Executor } from "../source/commands.mjs"
import { StateError, UsageError } from "../source/errors.mjs"

function memIO(env: NodeJS.ProcessEnv = {}, exec?: Executor) {
	const out: string[] = []
	const err: string[] = []
	const signals = new EventEmitter()
	const io: CliIO = {
		out: line => { out.push(line) },
		err: line => { err.push(line) },
		signals,
		env,
		exec,
	}
	return { io, out, err, signals }
}

const okExec: Executor = async command => {
	const failed = commandText(command).includes("bad")
	return { command, code: failed ? 2 : 0, stdout: "", stderr: failed ? "bad thing\n" : "" }
}

describe("exit codes", () => {

	it("maps every outcome and StateError to its own code", () => {
		expect(exitCodeFor("Unblocked")).toBe(0)
		expect(exitCodeFor("Interrupted")).toBe(2)
		expect(exitCodeFor("TimedOut")).toBe(3)
		expect(exitCodeFor("Cancelled")).toBe(4)
		expect(exitCodeFor(new StateError("Gate.reset", "busy"))).toBe(EXIT.StateError)
		expect(exitCodeFor(new UsageError("parse", "bad"))).toBe(EXIT.usage)
	})

	it("anything else is a usage failure", () => {
		expect(exitCodeFor("Waiting")).toBe(EXIT.usage)
		expect(exitCodeFor(Error("boom"))).toBe(EXIT.usage)
	})
})

describe("iu wait", () => {

	async function waitFor(signal: NodeJS.Signals, args: string[] = []) {
		const { io, out, signals } = memIO()
		const code = run(["wait", ...args], io)
		await vi.waitFor(() => expect(signals.listenerCount(signal)).toBe(1))
		signals.emit(signal, signal)
		return { code: await code, out, signals }
	}

	it("SIGUSR1 unblocks", async () => {
		const { code, out, signals } = await waitFor("SIGUSR1")
		expect(code).toBe(0)
		expect(out).toStrictEqual(["gate: Unblocked"])
		expect(signals.listenerCount("SIGUSR1")).toBe(0)
	})

	it("SIGUSR2 interrupts", async () => {
		const { code, out } = await waitFor("SIGUSR2", ["--name", "deploy"])
		expect(code).toBe(2)
		expect(out).toStrictEqual(["deploy: Interrupted"])
	})

	it("SIGINT interrupts", async () => {
		const { code } = await waitFor("SIGINT")
		expect(code).toBe(2)
	})

	it("SIGTERM cancels", async () => {
		const { code, out } = await waitFor("SIGTERM")
		expect(code).toBe(4)
		expect(out).toStrictEqual(["gate: Cancelled"])
	})

	it("keeps the process alive until a signal comes", async () => {
		const timers = () => process.getActiveResourcesInfo().filter(r => r === "Timeout").length
		const before = timers()
		const { io, signals } = memIO()

		const code = run(["wait"], io)
		await vi.waitFor(() => expect(signals.listenerCount("SIGUSR1")).toBe(1))
		const during = timers()
		expect(during).toBeGreaterThan(before)

		signals.emit("SIGUSR1", "SIGUSR1")
		expect(await code).toBe(0)
		expect(timers()).toBe(during - 1)
	})

	it("times out", async () => {
		const { io, out } = memIO()
		expect(await run(["wait", "--timeout", "5"], io)).toBe(3)
		expect(out).toStrictEqual(["gate: TimedOut"])
	})

	it("takes its default timeout from IU_TIMEOUT", async () => {
		const { io, out } = memIO({ IU_TIMEOUT: "5" })
		expect(await run(["wait"], io)).toBe(3)
		expect(out).toStrictEqual(["gate: TimedOut"])
	})

	it("rejects a bad timeout", async () => {
		const { io, err } = memIO()
		expect(await run(["wait", "--timeout", "-3"], io)).toBe(1)
		expect(err[0]).toContain("Expected a non-negative number of milliseconds.")
	})

	it("reports a bad environment", async () => {
		const { io, err } = memIO({ IU_TIMEOUT: "later" })
		expect(await run(["wait"], io)).toBe(1)
		expect(err).toStrictEqual(["Error: IU_TIMEOUT: Expected number, received nan"])
	})
})

describe("iu shell", () => {

	it("runs the commands and prints a summary", async () => {
		const { io, out, err } = memIO({}, okExec)
		const code = await run(["shell", "echo one", "bad cmd", "-c", "1"], io)
		expect(code).toBe(0)
		expect(out).toStrictEqual([
			"[0] echo one",
			"[2] bad cmd",
			"Finished 2 commands. 1 succeeded.",
		])
		expect(err).toStrictEqual(["bad thing"])
	})
})

describe("iu git-clone", () => {

	it("clones each URL [DEST] group", async () => {
		const { io, out } = memIO({}, okExec)
		const code = await run(["git-clone", "u1", "d1", ",", "u2"], io)
		expect(code).toBe(0)
		expect(out).toStrictEqual([
			"[0] git clone u1 d1",
			"[0] git clone u2",
			"Finished 2 clones. 2 succeeded.",
		])
	})

	it("a malformed group is a usage error", async () => {
		const { io, err } = memIO({}, okExec)
		expect(await run(["git-clone", "u1", "d1", "x"], io)).toBe(1)
		expect(err).toStrictEqual(["Error: Invalid group: u1 d1 x. Expected URL and optional DEST."])
	})

	it("only separators is a usage error", async () => {
		const { io, err } = memIO({}, okExec)
		expect(await run(["git-clone", ","], io)).toBe(1)
		expect(err).toStrictEqual(["Error: No valid URL/DEST pairs provided."])
	})
})

describe("iu extract", () => {

	let dir = ""

	beforeEach(async () => {
		dir = await mkdtemp(join(tmpdir(), "iu-extract-"))
	})

	afterEach(async () => {
		await rm(dir, { recursive: true, force: true })
	})

	it("extracts next to the archive and can remove it", async () => {
		const archive = join(dir, "site.tar.gz")
		await writeFile(archive, "")
		const exec = vi.fn<Executor>(async command => ({ command, code: 0, stdout: "", stderr: "" }))
		const { io, out } = memIO({}, exec)

		expect(await run(["extract", archive, "--remove"], io)).toBe(0)
		expect(exec).toHaveBeenCalledWith(["tar", "-xf", archive, "-C", dir], { cwd: undefined, env: undefined })
		expect(out).toStrictEqual([`Extracted ${archive}`])
		expect(existsSync(archive)).toBe(false)
	})

	it("reports a failed extraction and keeps the archive", async () => {
		const archive = join(dir, "bad.zip")
		await writeFile(archive, "")
		const exec: Executor = async command => ({ command, code: 9, stdout: "", stderr: "not a zipfile\n" })
		const { io, out, err } = memIO({}, exec)
		const dest = join(dir, "out")

		expect(await run(["extract", archive, "-o", dest], io)).toBe(1)
		expect(out).toStrictEqual([`[9] unzip -o -q ${archive} -d ${dest}`])
		expect(err).toStrictEqual(["not a zipfile"])
		expect(existsSync(archive)).toBe(true)
		expect(existsSync(dest)).toBe(true)
	})

	it("an unknown format is a usage error", async () => {
		const { io, err } = memIO({}, okExec)
		expect(await run(["extract", join(dir, "notes.rar")], io)).toBe(1)
		expect(err).toStrictEqual(["Error: Unsupported archive format for 'notes.rar'"])
	})
})

describe("iu --version", () => {

	it("prints the package version", async () => {
		const { io, out } = memIO()
		expect(await run(["--version"], io)).toBe(0)
		expect(out).toStrictEqual(["0.1.0"])
	})
})
