// CHANGE: Pure decision function mapping a run outcome to an exit code
// WHY: Centralize termination logic in the functional core
// FORMAT THEOREM: ∀s: (s.failedInputs > 0 ∨ s.saveFailed) ↔ computeExitCode(s) = 1
// PURITY: CORE
// INVARIANT: No side effects, deterministic mapping State → ExitCode
// COMPLEXITY: O(1) time / O(1) space

import { pipe } from "effect";

import type { DecisionState, ExitCode } from "./models.js";

/**
 * Computes process exit code from the run outcome.
 *
 * @returns 1 if any input failed or the history could not be written; otherwise 0
 *
 * @example
 * ```ts
 * computeExitCode({ failedInputs: 0, saveFailed: false }); // 0
 * computeExitCode({ failedInputs: 2, saveFailed: false }); // 1
 * ```
 */
export const computeExitCode = (state: DecisionState): ExitCode =>
	pipe(
		state,
		(s) => s.failedInputs > 0 || s.saveFailed,
		(failed): ExitCode => (failed ? 1 : 0),
	);
