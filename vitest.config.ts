import { defineConfig } from "vitest/config"

export default defineConfig({
	test: {
		include: ["tests/**/*.test.mts"],
		pool: "forks",
		poolOptions: {
			forks: {
				execArgv: ["--stack-trace-limit=30"]
			}
		}
	}
})
