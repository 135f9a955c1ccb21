// CHANGE: Vitest configuration for the doculint test suite
// WHY: Native ESM, explicit imports, same test layout as src/ mirrored under test/
// PURITY: SHELL (configuration only)
// INVARIANT: ∀ test: independent(test) ⇒ no shared state between files

import { defineConfig } from "vitest/config";

export default defineConfig({
	test: {
		globals: false, // IMPORTANT: Use explicit imports for type safety
		environment: "node",
		include: ["test/**/*.{test,spec}.ts"],
		exclude: ["node_modules", "dist"],

		// CHANGE: CORE keeps full coverage, SHELL a minimal floor
		// INVARIANT: ∀ f ∈ src/core/**/*.ts: all_metrics(f) = 100%
		coverage: {
			provider: "v8",
			reporter: ["text", "json", "html"],
			include: ["src/**/*.ts"],
			exclude: ["src/bin/**/*.ts"],
			thresholds: {
				"src/core/**/*.ts": {
					branches: 100,
					functions: 100,
					lines: 100,
					statements: 100,
				},
				global: {
					branches: 10,
					functions: 10,
					lines: 10,
					statements: 10,
				},
			},
		},

		clearMocks: true,
		mockReset: true,
		restoreMocks: true,
	},
});
