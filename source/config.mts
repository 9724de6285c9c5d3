import { z } from "zod"
import { OptionsError } from "./errors.mjs"

const millis = z.number().finite().nonnegative()

export const GateOptionsSchema = z.object({
	name: z.string().min(1).optional(),
	/** applies to waits that pass no timeout of their own */
	defaultTimeout: millis.optional(),
})

export const WaitOptionsSchema = z.object({
	timeout: millis.optional(),
	signal: z.instanceof(AbortSignal).optional(),
})

export const LimiterOptionsSchema = z.object({
	total: z.number().int().positive(),
	name: z.string().min(1).optional(),
})

export type GateOptions = z.input<typeof GateOptionsSchema>
export type WaitOptions = z.input<typeof WaitOptionsSchema>
export type LimiterOptions = Omit<z.input<typeof LimiterOptionsSchema>, "total">

/** Throws OptionsError (synchronously) when input doesn't match */
export function parseOptions<T extends z.ZodTypeAny>(schema: T, input: unknown, op: string): z.output<T> {
	const res = schema.safeParse(input)
	if (!res.success) {
		throw new OptionsError(op, res.error)
	}
	return res.data
}


/* **********  Environment  ********** */

// unset and empty variables both fall back to the default
const fromEnv = <T extends z.ZodTypeAny>(schema: T) =>
	z.preprocess(v => (v === "" ? undefined : v), schema)

const EnvSchema = z.object({
	IU_TIMEOUT: fromEnv(z.coerce.number().finite().nonnegative().optional()),
	IU_CONCURRENCY: fromEnv(z.coerce.number().int().positive().default(5)),
})

export type Config = {
	/** default `iu wait` timeout in ms, none when unset */
	timeout?: number
	/** default concurrency of `iu shell` and `iu git-clone` */
	concurrency: number
}

export function loadConfig(env: NodeJS.ProcessEnv = process.env): Config {
	const parsed = parseOptions(EnvSchema, env, "loadConfig")
	return {
		timeout: parsed.IU_TIMEOUT,
		concurrency: parsed.IU_CONCURRENCY,
	}
}
