// CHANGE: Line-oriented prompt over stdin/stdout
// WHY: The APP layer decides what a line means; SHELL owns the terminal
// PURITY: SHELL
// EFFECT: Effect<void>
// INVARIANT: The readline interface is closed on every exit path (end of input, quit, interruption)
// COMPLEXITY: O(n) in lines read

import * as readline from "node:readline";

import { Effect } from "effect";

/** Return false to stop reading. */
export type LineHandler = (line: string) => Effect.Effect<boolean>;

export interface PromptStreams {
	readonly input: NodeJS.ReadableStream;
	readonly output: NodeJS.WritableStream;
}

/**
 * Prompt for lines until end of input or until `onLine` asks to stop.
 *
 * @pure false (reads stdin, writes the prompt to stdout unless other streams are given)
 */
export function runPrompt(
	prompt: string,
	onLine: LineHandler,
	streams: PromptStreams = { input: process.stdin, output: process.stdout },
): Effect.Effect<void> {
	return Effect.acquireUseRelease(
		Effect.sync(() =>
			readline.createInterface({
				input: streams.input,
				output: streams.output,
				prompt,
			}),
		),
		(rl) =>
			Effect.gen(function* () {
				const lines = rl[Symbol.asyncIterator]();
				for (;;) {
					rl.prompt();
					const next = yield* Effect.promise(() => lines.next());
					if (next.done === true) return;
					const keepGoing = yield* onLine(next.value);
					if (!keepGoing) return;
				}
			}),
		(rl) => Effect.sync(() => rl.close()),
	);
}
