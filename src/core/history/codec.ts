// CHANGE: Versioned payload codec and container framing for the history file
// WHY: The history file outlives the program version that wrote it; every layout is tagged and migratable
// PURITY: CORE (checksum and compression are applied by the SHELL between framing and payload)
// FORMAT THEOREM: ∀ c: decodePayload(CURRENT, encodePayload(c)) = Right(sorted(c))
// INVARIANT: file = [u32be version][checksum][zlib payload]; version ∈ SUPPORTED_VERSIONS
// COMPLEXITY: O(n) in payload size

import { Either } from "effect";

import { LoadError } from "../errors.js";
import { gcd, type Rational } from "../number/rational.js";
import {
	type VariableBinding,
	validateVariableName,
} from "../variables/table.js";
import { BinaryReader, BinaryWriter, corrupt } from "./binary.js";
import {
	CURRENT_FORMAT_VERSION,
	type EntryOutcome,
	type HistoryContainer,
	type HistoryEntry,
	type Session,
	sortSessions,
} from "./model.js";

type Decoded<A> = Either.Either<A, LoadError>;

export const HEADER_BYTES = 4;

const FLAG_NEGATIVE = 0b01;
const FLAG_INEXACT = 0b10;
const ENTRY_FLAG_PRECISION_LOSS = 0b1;
const OUTCOME_VALUE = 0;
const OUTCOME_FAILURE = 1;

// ─── rationals ────────────────────────────────────────────────────────────────

const writeRational = (w: BinaryWriter, r: Rational): void => {
	w.u8((r.numerator < 0n ? FLAG_NEGATIVE : 0) | (r.inexact ? FLAG_INEXACT : 0));
	w.bigint(r.numerator);
	w.bigint(r.denominator);
};

const readRational = (r: BinaryReader): Decoded<Rational> =>
	Either.gen(function* () {
		const flags = yield* r.u8("number flags");
		if ((flags & ~(FLAG_NEGATIVE | FLAG_INEXACT)) !== 0) {
			return yield* Either.left(corrupt(`unknown number flags ${flags}`));
		}
		const magnitude = yield* r.bigint("numerator");
		const denominator = yield* r.bigint("denominator");
		if (denominator === 0n) return yield* Either.left(corrupt("zero denominator"));
		if (gcd(magnitude, denominator) !== 1n) {
			return yield* Either.left(corrupt("number not in lowest terms"));
		}
		const negative = (flags & FLAG_NEGATIVE) !== 0;
		if (negative && magnitude === 0n) {
			return yield* Either.left(corrupt("negative zero"));
		}
		return {
			numerator: negative ? -magnitude : magnitude,
			denominator,
			inexact: (flags & FLAG_INEXACT) !== 0,
		};
	});

// ─── entries and sessions ─────────────────────────────────────────────────────

const writeOutcome = (w: BinaryWriter, outcome: EntryOutcome): void => {
	switch (outcome._tag) {
		case "Value":
			w.u8(OUTCOME_VALUE);
			writeRational(w, outcome.value);
			return;
		case "Failure":
			w.u8(OUTCOME_FAILURE);
			w.string(outcome.message);
			return;
	}
};

const readOutcome = (r: BinaryReader): Decoded<EntryOutcome> =>
	Either.gen(function* () {
		const tag = yield* r.u8("outcome tag");
		if (tag === OUTCOME_VALUE) {
			const value = yield* readRational(r);
			return { _tag: "Value", value } satisfies EntryOutcome;
		}
		if (tag === OUTCOME_FAILURE) {
			const message = yield* r.string("failure message");
			return { _tag: "Failure", message } satisfies EntryOutcome;
		}
		return yield* Either.left(corrupt(`unknown outcome tag ${tag}`));
	});

/** Layout differences between payload versions. */
interface EntryLayout {
	readonly hasFlags: boolean;
}

const readEntry = (r: BinaryReader, layout: EntryLayout): Decoded<HistoryEntry> =>
	Either.gen(function* () {
		const id = yield* r.string("entry id");
		const createdAt = yield* r.varint("entry timestamp");
		const input = yield* r.string("entry input");
		const outcome = yield* readOutcome(r);
		const precisionLoss = layout.hasFlags
			? ((yield* r.u8("entry flags")) & ENTRY_FLAG_PRECISION_LOSS) !== 0
			: outcome._tag === "Value" && outcome.value.inexact;
		return { id, createdAt, input, outcome, precisionLoss };
	});

const readCount = <A>(
	r: BinaryReader,
	what: string,
	readOne: (r: BinaryReader) => Decoded<A>,
): Decoded<readonly A[]> =>
	Either.gen(function* () {
		const count = yield* r.varint(`${what} count`);
		const items: A[] = [];
		for (let i = 0; i < count; i++) items.push(yield* readOne(r));
		return items;
	});

const readSession = (r: BinaryReader, layout: EntryLayout): Decoded<Session> =>
	Either.gen(function* () {
		const id = yield* r.string("session id");
		const startedAt = yield* r.varint("session timestamp");
		const entries = yield* readCount(r, "entry", (rr) => readEntry(rr, layout));
		return { id, startedAt, entries };
	});

const readVariable = (r: BinaryReader): Decoded<VariableBinding> =>
	Either.gen(function* () {
		const name = yield* r.string("variable name");
		if (Either.isLeft(validateVariableName(name))) {
			return yield* Either.left(corrupt(`invalid variable name "${name}"`));
		}
		const value = yield* readRational(r);
		return [name, value] as const;
	});

// ─── versions ─────────────────────────────────────────────────────────────────

type PayloadDecoder = (r: BinaryReader) => Decoded<HistoryContainer>;

/** Version 1: sessions only, no variable table, no entry flags. */
const decodeV1: PayloadDecoder = (r) =>
	Either.gen(function* () {
		const sessions = yield* readCount(r, "session", (rr) =>
			readSession(rr, { hasFlags: false }),
		);
		return { version: CURRENT_FORMAT_VERSION, variables: [], sessions };
	});

const decodeV2: PayloadDecoder = (r) =>
	Either.gen(function* () {
		const variables = yield* readCount(r, "variable", readVariable);
		const names = new Set(variables.map(([name]) => name));
		if (names.size !== variables.length) {
			return yield* Either.left(corrupt("duplicate variable name"));
		}
		const sessions = yield* readCount(r, "session", (rr) =>
			readSession(rr, { hasFlags: true }),
		);
		return { version: CURRENT_FORMAT_VERSION, variables, sessions };
	});

const DECODERS: ReadonlyMap<number, PayloadDecoder> = new Map([
	[1, decodeV1],
	[2, decodeV2],
]);

export const SUPPORTED_VERSIONS: readonly number[] = [...DECODERS.keys()];

const incompatible = (version: number): LoadError =>
	new LoadError({
		reason: "IncompatibleVersion",
		version,
		detail:
			version > CURRENT_FORMAT_VERSION
				? `written by a newer release (supported up to ${CURRENT_FORMAT_VERSION})`
				: "no migration available",
	});

/**
 * Reject a header version before any payload byte is touched.
 *
 * @pure true
 */
export const checkVersion = (version: number): Decoded<number> =>
	DECODERS.has(version) ? Either.right(version) : Either.left(incompatible(version));

/**
 * Decode (and migrate) a decompressed payload.
 *
 * @returns container in the current version with sessions sorted by start time
 */
export const decodePayload = (
	version: number,
	payload: Uint8Array,
): Decoded<HistoryContainer> =>
	Either.gen(function* () {
		yield* checkVersion(version);
		const decode = DECODERS.get(version) ?? decodeV2;
		const reader = new BinaryReader(payload);
		const container = yield* decode(reader);
		if (!reader.atEnd()) return yield* Either.left(corrupt("trailing bytes"));
		return { ...container, sessions: sortSessions(container.sessions) };
	});

/** Encode a container in the current payload layout. */
export const encodePayload = (container: HistoryContainer): Uint8Array => {
	const w = new BinaryWriter();
	w.varint(container.variables.length);
	for (const [name, value] of container.variables) {
		w.string(name);
		writeRational(w, value);
	}
	w.varint(container.sessions.length);
	for (const session of container.sessions) {
		w.string(session.id).varint(session.startedAt).varint(session.entries.length);
		for (const entry of session.entries) {
			w.string(entry.id).varint(entry.createdAt).string(entry.input);
			writeOutcome(w, entry.outcome);
			w.u8(entry.precisionLoss ? ENTRY_FLAG_PRECISION_LOSS : 0);
		}
	}
	return w.toBytes();
};

// ─── framing ──────────────────────────────────────────────────────────────────

export const frame = (version: number, body: Uint8Array): Uint8Array => {
	const out = new Uint8Array(HEADER_BYTES + body.length);
	new DataView(out.buffer).setUint32(0, version, false);
	out.set(body, HEADER_BYTES);
	return out;
};

export interface Frame {
	readonly version: number;
	readonly body: Uint8Array;
}

export const unframe = (bytes: Uint8Array): Decoded<Frame> => {
	if (bytes.length < HEADER_BYTES) {
		return Either.left(corrupt("file shorter than its header"));
	}
	const view = new DataView(bytes.buffer, bytes.byteOffset, bytes.byteLength);
	return Either.right({
		version: view.getUint32(0, false),
		body: bytes.subarray(HEADER_BYTES),
	});
};
