// CHANGE: In-memory owner of the history container and the variable table
// WHY: One place decides when sessions are created, entries appended and the file replaced
// PURITY: SHELL (clock and id generation are injected; filesystem through ./file.ts)
// EFFECT: Effect<HistoryStore, never> | Effect<void, SaveError>
// INVARIANT: Loaded sessions are never mutated; only the current session grows, by append
// INVARIANT: A failed save keeps every in-memory entry and the unsaved counter
// COMPLEXITY: O(1) append, O(s log s) session listing

import { randomUUID } from "node:crypto";

import { Console, Effect, Either, Option } from "effect";

import { describeError, type LoadError, type SaveError } from "../../core/errors.js";
import {
	CURRENT_FORMAT_VERSION,
	emptyContainer,
	type HistoryContainer,
	type HistoryEntry,
	type Session,
	sortSessions,
	valueEntry,
} from "../../core/history/model.js";
import type { Rational } from "../../core/number/rational.js";
import { VariableTable } from "../../core/variables/table.js";
import { loadHistory, preserveUnreadable, saveHistory } from "./file.js";

export interface HistoryStoreOptions {
	readonly path: string;
	/** Epoch milliseconds; defaults to `Date.now`. */
	readonly now?: () => number;
	/** Entry and session ids; defaults to random UUID v4. */
	readonly generateId?: () => string;
}

interface OpenState {
	readonly container: HistoryContainer;
	readonly loadError: Option.Option<LoadError>;
}

/**
 * Replace an unreadable file by an empty container, keeping the bytes aside.
 *
 * @invariant Io failures leave the file in place; Corrupt and IncompatibleVersion move it
 */
function recover(
	filePath: string,
	error: LoadError,
	now: () => number,
): Effect.Effect<OpenState> {
	return Effect.gen(function* () {
		yield* Console.warn(
			`⚠️  ${describeError(error)}. Starting with an empty history.`,
		);
		if (error.reason !== "Io") {
			yield* preserveUnreadable(filePath, String(now())).pipe(
				Effect.flatMap((backup) =>
					Console.warn(`⚠️  Unreadable history kept at ${backup}`),
				),
				Effect.catchAll((saveError) =>
					Console.warn(`⚠️  ${describeError(saveError)}`),
				),
			);
		}
		return {
			container: emptyContainer(),
			loadError: Option.some(error),
		};
	});
}

export class HistoryStore {
	readonly variables = new VariableTable();
	private readonly currentEntries: HistoryEntry[] = [];
	private unsaved = 0;

	private constructor(
		readonly path: string,
		private readonly previous: readonly Session[],
		private readonly currentId: string,
		private readonly startedAt: number,
		private readonly now: () => number,
		private readonly generateId: () => string,
		readonly loadError: Option.Option<LoadError>,
	) {}

	/**
	 * Load the history at `options.path` and start a new session.
	 *
	 * Never fails: a LoadError is reported, recorded in `loadError` and
	 * replaced by an empty container.
	 */
	static open(options: HistoryStoreOptions): Effect.Effect<HistoryStore> {
		const now = options.now ?? Date.now;
		const generateId = options.generateId ?? randomUUID;
		return Effect.gen(function* () {
			const state = yield* loadHistory(options.path).pipe(
				Effect.map(
					(container): OpenState => ({ container, loadError: Option.none() }),
				),
				Effect.catchAll((error) => recover(options.path, error, now)),
			);
			const store = new HistoryStore(
				options.path,
				state.container.sessions,
				generateId(),
				now(),
				now,
				generateId,
				state.loadError,
			);
			const restored = store.variables.restore(state.container.variables);
			if (Either.isLeft(restored)) {
				yield* Console.warn(
					`⚠️  Stored variables ignored: ${describeError(restored.left)}`,
				);
			}
			return store;
		});
	}

	/** Record a successful evaluation in the current session. */
	append(input: string, value: Rational): HistoryEntry {
		const entry = valueEntry({
			id: this.generateId(),
			createdAt: this.now(),
			input,
			value,
		});
		this.currentEntries.push(entry);
		this.unsaved += 1;
		return entry;
	}

	/** Entries appended since the last successful save. */
	get unsavedCount(): number {
		return this.unsaved;
	}

	currentSession(): Session {
		return {
			id: this.currentId,
			startedAt: this.startedAt,
			entries: [...this.currentEntries],
		};
	}

	/** Every session, oldest first, including the current one. */
	sessions(): readonly Session[] {
		return sortSessions([...this.previous, this.currentSession()]);
	}

	/** Session shown when none is selected. */
	latestSession(): Session {
		return this.sessions().at(-1) ?? this.currentSession();
	}

	/**
	 * Entries of one session, or of all sessions in order when `sessionId` is omitted.
	 *
	 * @returns [] for an unknown session id
	 */
	entries(sessionId?: string): readonly HistoryEntry[] {
		const sessions = this.sessions();
		if (sessionId === undefined) {
			return sessions.flatMap((session) => session.entries);
		}
		return sessions.find((session) => session.id === sessionId)?.entries ?? [];
	}

	findEntry(id: string): Option.Option<HistoryEntry> {
		return Option.fromNullable(this.entries().find((entry) => entry.id === id));
	}

	/** Container as it would be written now; empty sessions are left out. */
	container(): HistoryContainer {
		return {
			version: CURRENT_FORMAT_VERSION,
			variables: this.variables.snapshot(),
			sessions: this.sessions().filter((session) => session.entries.length > 0),
		};
	}

	save(): Effect.Effect<void, SaveError> {
		return this.saveTo(this.path);
	}

	saveTo(filePath: string): Effect.Effect<void, SaveError> {
		return Effect.suspend(() => saveHistory(filePath, this.container())).pipe(
			Effect.tap(() =>
				Effect.sync(() => {
					this.unsaved = 0;
				}),
			),
		);
	}
}
