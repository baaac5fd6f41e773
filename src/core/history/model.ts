// CHANGE: Immutable history entities (entry, session, container)
// PURITY: CORE
// INVARIANT: Entries are never mutated after creation; sessions only grow by append
// INVARIANT: sortSessions(s) is ordered by (startedAt, id)
// COMPLEXITY: O(1) constructors, O(n log n) sorting

import type { Rational } from "../number/rational.js";
import type { VariableSnapshot } from "../variables/table.js";

export type EntryOutcome =
	| { readonly _tag: "Value"; readonly value: Rational }
	| { readonly _tag: "Failure"; readonly message: string };

export interface HistoryEntry {
	readonly id: string;
	/** Epoch milliseconds. */
	readonly createdAt: number;
	readonly input: string;
	readonly outcome: EntryOutcome;
	readonly precisionLoss: boolean;
}

export interface Session {
	readonly id: string;
	readonly startedAt: number;
	readonly entries: readonly HistoryEntry[];
}

export interface HistoryContainer {
	readonly version: number;
	readonly variables: VariableSnapshot;
	readonly sessions: readonly Session[];
}

/** Format version written by this build. */
export const CURRENT_FORMAT_VERSION = 2;

export const emptyContainer = (): HistoryContainer => ({
	version: CURRENT_FORMAT_VERSION,
	variables: [],
	sessions: [],
});

export const valueEntry = (fields: {
	readonly id: string;
	readonly createdAt: number;
	readonly input: string;
	readonly value: Rational;
}): HistoryEntry =>
	Object.freeze({
		id: fields.id,
		createdAt: fields.createdAt,
		input: fields.input,
		outcome: Object.freeze({ _tag: "Value", value: fields.value } as const),
		precisionLoss: fields.value.inexact,
	});

export const compareSessions = (a: Session, b: Session): number =>
	a.startedAt !== b.startedAt
		? a.startedAt - b.startedAt
		: a.id < b.id
			? -1
			: a.id > b.id
				? 1
				: 0;

export const sortSessions = (sessions: readonly Session[]): readonly Session[] =>
	[...sessions].sort(compareSessions);
