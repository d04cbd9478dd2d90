import { defineConfig } from "vitest/config";

export default defineConfig({
	test: {
		environment: "node",
		include: ["launcher-app/**/*.test.ts"],
		restoreMocks: true,
	},
});
