// CHANGE: Byte-level writer/reader for the history payload
// WHY: Compact encoding of bigint rationals, strings and counts without a schema runtime
// PURITY: CORE
// INVARIANT: read(write(x)) = x for varint ≤ 2^53-1, bigint ≥ 0, UTF-8 strings
// INVARIANT: every read is bounds-checked and returns Left(Corrupt) instead of throwing
// COMPLEXITY: O(n) in encoded size

import { Either } from "effect";

import { LoadError } from "../errors.js";

export const corrupt = (detail: string): LoadError =>
	new LoadError({ reason: "Corrupt", detail });

type Read<A> = Either.Either<A, LoadError>;

const encoder = new TextEncoder();
const decoder = new TextDecoder("utf-8", { fatal: true });

export class BinaryWriter {
	private readonly bytes: number[] = [];

	u8(value: number): this {
		this.bytes.push(value & 0xff);
		return this;
	}

	/** Unsigned LEB128. */
	varint(value: number): this {
		let rest = Math.max(0, Math.trunc(value));
		while (rest >= 0x80) {
			this.bytes.push((rest % 0x80) | 0x80);
			rest = Math.floor(rest / 0x80);
		}
		this.bytes.push(rest);
		return this;
	}

	/** Length-prefixed big-endian magnitude; the sign is not encoded. */
	bigint(value: bigint): this {
		const magnitude = value < 0n ? -value : value;
		if (magnitude === 0n) return this.varint(0);
		const hex = magnitude.toString(16);
		const padded = hex.length % 2 === 0 ? hex : `0${hex}`;
		this.varint(padded.length / 2);
		for (let i = 0; i < padded.length; i += 2) {
			this.bytes.push(Number.parseInt(padded.slice(i, i + 2), 16));
		}
		return this;
	}

	string(value: string): this {
		const utf8 = encoder.encode(value);
		this.varint(utf8.length);
		for (const byte of utf8) this.bytes.push(byte);
		return this;
	}

	toBytes(): Uint8Array {
		return Uint8Array.from(this.bytes);
	}
}

export class BinaryReader {
	private offset = 0;

	constructor(private readonly bytes: Uint8Array) {}

	atEnd(): boolean {
		return this.offset === this.bytes.length;
	}

	private take(length: number, what: string): Read<Uint8Array> {
		if (length > this.bytes.length - this.offset) {
			return Either.left(corrupt(`unexpected end of data reading ${what}`));
		}
		const slice = this.bytes.subarray(this.offset, this.offset + length);
		this.offset += length;
		return Either.right(slice);
	}

	u8(what = "byte"): Read<number> {
		return Either.map(this.take(1, what), (slice) => slice[0] ?? 0);
	}

	varint(what = "count"): Read<number> {
		let result = 0;
		let multiplier = 1;
		for (;;) {
			const byte = this.bytes[this.offset];
			if (byte === undefined) {
				return Either.left(corrupt(`unexpected end of data reading ${what}`));
			}
			this.offset += 1;
			result += (byte & 0x7f) * multiplier;
			if (!Number.isSafeInteger(result)) {
				return Either.left(corrupt(`${what} out of range`));
			}
			if ((byte & 0x80) === 0) return Either.right(result);
			multiplier *= 0x80;
		}
	}

	bigint(what = "integer"): Read<bigint> {
		const reader = this;
		return Either.gen(function* () {
			const length = yield* reader.varint(`${what} length`);
			const slice = yield* reader.take(length, what);
			if (slice.length === 0) return 0n;
			let hex = "";
			for (const byte of slice) hex += byte.toString(16).padStart(2, "0");
			return BigInt(`0x${hex}`);
		});
	}

	string(what = "string"): Read<string> {
		const reader = this;
		return Either.gen(function* () {
			const length = yield* reader.varint(`${what} length`);
			const slice = yield* reader.take(length, what);
			return yield* Either.try({
				try: () => decoder.decode(slice),
				catch: () => corrupt(`${what} is not valid UTF-8`),
			});
		});
	}
}
