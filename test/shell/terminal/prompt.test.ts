// CHANGE: Specs for the prompt loop over in-process streams
// WHY: The loop must stop on request or at end of input without a terminal attached
// PURITY: SHELL - PassThrough streams instead of stdin/stdout

import { PassThrough } from "node:stream";

import { Effect } from "effect";
import { describe, expect, it } from "vitest";

import { runPrompt } from "../../../src/shell/terminal/prompt.js";

const collect = (
	text: string,
	stopAt?: string,
): Promise<{ readonly lines: readonly string[]; readonly output: string }> => {
	const input = new PassThrough();
	const output = new PassThrough();
	let written = "";
	output.on("data", (chunk: Buffer) => {
		written += chunk.toString("utf8");
	});
	const lines: string[] = [];
	const done = Effect.runPromise(
		runPrompt(
			"> ",
			(line) =>
				Effect.sync(() => {
					lines.push(line);
					return line !== stopAt;
				}),
			{ input, output },
		),
	);
	input.end(text);
	return done.then(() => ({ lines, output: written }));
};

describe("runPrompt", () => {
	it("hands every line to the handler until end of input", async () => {
		const { lines, output } = await collect("1+1\nx = 2\n");
		expect(lines).toEqual(["1+1", "x = 2"]);
		expect(output.startsWith("> ")).toBe(true);
	});

	it("stops as soon as the handler asks to", async () => {
		const { lines } = await collect("1\n:quit\n2\n", ":quit");
		expect(lines).toEqual(["1", ":quit"]);
	});
});
