// CHANGE: Isolated temporary directories for filesystem tests
// WHY: History and settings tests must never touch the user's home directory
// PURITY: SHELL (test support)
// INVARIANT: cleanup() removes the directory recursively and is idempotent

import * as fs from "node:fs";
import * as os from "node:os";
import * as path from "node:path";

export interface TempDir {
	readonly dir: string;
	readonly file: (name: string) => string;
	readonly cleanup: () => void;
}

export function makeTempDir(prefix = "ratiocalc-"): TempDir {
	const dir = fs.mkdtempSync(path.join(os.tmpdir(), prefix));
	return {
		dir,
		file: (name) => path.join(dir, name),
		cleanup: () => {
			fs.rmSync(dir, { recursive: true, force: true });
		},
	};
}

/** Deterministic id source: `${prefix}-1`, `${prefix}-2`, ... */
export function sequentialIds(prefix = "id"): () => string {
	let next = 0;
	return () => {
		next += 1;
		return `${prefix}-${next}`;
	};
}

/** Deterministic clock starting at `start` and advancing by `step` per call. */
export function steppingClock(start = 1_000, step = 1_000): () => number {
	let current = start - step;
	return () => {
		current += step;
		return current;
	};
}
