import { defineConfig } from "vitest/config";

export default defineConfig({
	test: {
		include: ["src/**/*.test.ts"],
		setupFiles: ["./src/test-setup.ts"],
		// commands read process.cwd(); chdir is unavailable in worker threads
		pool: "forks",
	},
});
