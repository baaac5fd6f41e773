#!/usr/bin/env node

// CHANGE: Thin CLI shell wrapper - single point of process.exit
// WHY: APP returns ExitCode; BIN exits the process
// FORMAT THEOREM: ∀run: returns exitCode ∈ {0,1} → process.exit(exitCode) occurs exactly once at shell boundary
// PURITY: SHELL (BIN layer)
// INVARIANT: Single point of termination; no process.exit in APP, SHELL or CORE
// COMPLEXITY: O(1) (delegates to APP)

import { main } from "../main.js";

/**
 * CLI entry point for ratiocalc.
 *
 * @remarks
 * - @pure false (process termination and console I/O)
 * - @postcondition process terminates exactly once with ExitCode ∈ {0,1}
 */
void (async (): Promise<void> => {
	try {
		const code = await main();
		process.exit(code);
	} catch (error) {
		console.error("Fatal error:", error);
		process.exit(1);
	}
})();
