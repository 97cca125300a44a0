import { fileURLToPath } from "node:url";
import { defineConfig } from "vitest/config";

export default defineConfig({
	resolve: {
		alias: {
			"@core": fileURLToPath(new URL("./core", import.meta.url)),
			"@tests": fileURLToPath(new URL("./tests", import.meta.url)),
		},
	},
	test: {
		environment: "node",
		include: ["tests/**/*.test.ts"],
		testTimeout: 15_000,
	},
});
