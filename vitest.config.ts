import { defineConfig } from "vitest/config";

export default defineConfig({
	test: {
		include: ["src/**/*.test.ts", "__test__/**/*.test.ts"],
		environment: "node",
		testTimeout: 20_000,
	},
});
