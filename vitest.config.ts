// CHANGE: Vitest configuration for the calculator
// WHY: Native ESM, explicit imports, node environment
// PURITY: SHELL (configuration only)
// INVARIANT: ∀ test: independent(test_i, test_j) ⇒ no shared state (temp dirs per test)
// COMPLEXITY: O(n) test execution where n = |test_files|

import { defineConfig } from "vitest/config";

export default defineConfig({
	test: {
		globals: false, // IMPORTANT: Use explicit imports for type safety
		environment: "node",
		include: ["test/**/*.{test,spec}.ts"],
		exclude: ["node_modules", "dist"],

		clearMocks: true,
		mockReset: true,
		restoreMocks: true,
	},
});
