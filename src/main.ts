// CHANGE: Make main.ts a thin APP delegator
// WHY: Programmatic callers get a Promise of the exit code without the process being terminated
// PURITY: APP (no process.exit; only composition)
// INVARIANT: Returns ExitCode as value
// COMPLEXITY: O(1)

import { Effect } from "effect";

import { main as mainEffect } from "./app/runCalculator.js";
import type { ExitCode } from "./core/models.js";

/**
 * Entry for programmatic usage (without terminating process).
 *
 * @param args - Command-line arguments; defaults to process.argv.slice(2)
 * @returns ExitCode (0 | 1)
 */
export async function main(args?: readonly string[]): Promise<ExitCode> {
	return Effect.runPromise(mainEffect(args));
}
