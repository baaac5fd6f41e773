// CHANGE: Specs for the history store lifecycle (open, append, save, recover)
// WHY: The store decides what survives a restart and what happens to unreadable files
// PURITY: SHELL - real files under os.tmpdir(), injected clock and ids
// INVARIANT: open never fails; an unreadable file is reported and moved aside
// COMPLEXITY: O(file size) per test

import * as fs from "node:fs";

import { Effect, Either, Option } from "effect";
import { afterEach, beforeEach, describe, expect, it, vi } from "vitest";

import { emptyContainer } from "../../../src/core/history/model.js";
import { loadHistory, saveHistory } from "../../../src/shell/history/file.js";
import { HistoryStore } from "../../../src/shell/history/store.js";
import { makeTempDir, sequentialIds, steppingClock, type TempDir } from "../../utils/tempDir.js";
import { q } from "../../utils/values.js";

describe("HistoryStore", () => {
	let temp: TempDir;
	let historyPath: string;

	const open = (path = historyPath, prefix = "id"): HistoryStore =>
		Effect.runSync(
			HistoryStore.open({
				path,
				now: steppingClock(),
				generateId: sequentialIds(prefix),
			}),
		);

	beforeEach(() => {
		temp = makeTempDir();
		historyPath = temp.file("history.bin");
	});

	afterEach(() => {
		temp.cleanup();
	});

	it("starts an empty session when no file exists", () => {
		const store = open();
		expect(Option.isNone(store.loadError)).toBe(true);
		expect(store.currentSession()).toEqual({ id: "id-1", startedAt: 1_000, entries: [] });
		expect(store.sessions()).toHaveLength(1);
		expect(store.entries()).toEqual([]);
	});

	it("appends entries with injected ids and timestamps", () => {
		const store = open();
		const first = store.append("1/3", q(1, 3));
		const second = store.append("√2", q(3, 2, true));
		expect(first).toEqual({
			id: "id-2",
			createdAt: 2_000,
			input: "1/3",
			outcome: { _tag: "Value", value: q(1, 3) },
			precisionLoss: false,
		});
		expect(second.id).toBe("id-3");
		expect(second.precisionLoss).toBe(true);
		expect(store.unsavedCount).toBe(2);
		expect(store.entries("id-1").map((entry) => entry.input)).toEqual(["1/3", "√2"]);
	});

	it("looks entries up by id across sessions", () => {
		const store = open();
		store.append("x = 5", q(5));
		expect(Option.map(store.findEntry("id-2"), (entry) => entry.input)).toEqual(
			Option.some("x = 5"),
		);
		expect(Option.isNone(store.findEntry("nope"))).toBe(true);
		expect(store.entries("unknown-session")).toEqual([]);
	});

	it("persists sessions and variables across restarts", () => {
		const first = open();
		Either.getOrThrow(first.variables.set("x", q(5)));
		first.append("x = 5", q(5));
		Effect.runSync(first.save());
		expect(first.unsavedCount).toBe(0);

		const second = open(historyPath, "next");
		expect(second.variables.snapshot()).toEqual([["x", q(5)]]);
		expect(second.sessions().map((session) => session.id)).toEqual(["id-1", "next-1"]);
		expect(second.latestSession().id).toBe("next-1");
		expect(second.entries().map((entry) => entry.input)).toEqual(["x = 5"]);
	});

	it("leaves empty sessions out of the saved file", () => {
		const store = open();
		Effect.runSync(store.save());
		expect(Effect.runSync(loadHistory(historyPath))).toEqual(emptyContainer());
	});

	it("orders sessions by start time rather than load order", () => {
		Effect.runSync(
			saveHistory(historyPath, {
				version: 2,
				variables: [],
				sessions: [{ id: "later", startedAt: 9_000, entries: [] }],
			}),
		);
		const store = open();
		expect(store.sessions().map((session) => session.id)).toEqual(["id-1", "later"]);
		expect(store.latestSession().id).toBe("later");
	});

	it("recovers from a corrupt file and keeps its bytes aside", () => {
		const warn = vi.spyOn(console, "warn").mockImplementation(() => undefined);
		fs.writeFileSync(historyPath, Uint8Array.from([0, 0, 0, 2, 0xff, 0xff, 0xff]));

		const store = open();

		const error = Option.getOrThrow(store.loadError);
		expect(error.reason).toBe("Corrupt");
		expect(store.entries()).toEqual([]);
		expect(store.currentSession().startedAt).toBe(2_000);
		const backup = `${historyPath}.unreadable-1000`;
		expect([...fs.readFileSync(backup)]).toEqual([0, 0, 0, 2, 0xff, 0xff, 0xff]);
		expect(fs.existsSync(historyPath)).toBe(false);
		expect(warn).toHaveBeenCalledWith(`⚠️  Unreadable history kept at ${backup}`);
	});

	it("recovers from an incompatible version", () => {
		const warn = vi.spyOn(console, "warn").mockImplementation(() => undefined);
		fs.writeFileSync(historyPath, Uint8Array.from([0, 0, 0, 9]));

		const store = open();

		expect(Option.map(store.loadError, (error) => error.reason)).toEqual(
			Option.some("IncompatibleVersion"),
		);
		expect(warn).toHaveBeenCalledWith(
			"⚠️  History file version 9 is not supported. Starting with an empty history.",
		);
	});

	it("leaves a file it could not read in place", () => {
		vi.spyOn(console, "warn").mockImplementation(() => undefined);
		const store = open(temp.dir);
		expect(Option.map(store.loadError, (error) => error.reason)).toEqual(Option.some("Io"));
		expect(fs.readdirSync(temp.dir)).toEqual([]);
	});

	it("keeps unsaved entries when a save fails", () => {
		const store = open();
		store.append("1+1", q(2));
		const blocker = temp.file("blocker");
		fs.writeFileSync(blocker, "file");
		const result = Effect.runSync(Effect.either(store.saveTo(`${blocker}/history.bin`)));
		expect(Either.isLeft(result)).toBe(true);
		expect(store.unsavedCount).toBe(1);
		expect(store.entries()).toHaveLength(1);
	});
});
