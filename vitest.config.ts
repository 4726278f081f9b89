// CHANGE: Vitest configuration for CORE/SHELL test suites
// PURITY: SHELL (configuration only)
// INVARIANT: Deterministic test execution; tests import describe/it/expect explicitly

import { defineConfig } from "vitest/config";

export default defineConfig({
	test: {
		globals: false, // IMPORTANT: Use explicit imports for type safety
		environment: "node",
		include: ["test/**/*.{test,spec}.ts"],
		exclude: ["node_modules", "dist"],

		coverage: {
			provider: "v8",
			reporter: ["text", "json", "html"],
			include: ["src/**/*.ts"],
			exclude: ["src/bin/**"],
			thresholds: {
				"src/core/**/*.ts": {
					branches: 90,
					functions: 100,
					lines: 95,
					statements: 95,
				},
			},
		},

		clearMocks: true,
		mockReset: true,
		restoreMocks: true,
	},
});
