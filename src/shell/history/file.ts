// CHANGE: History file I/O (checksum, compression, framing and atomic replace)
// WHY: CORE owns the byte layout; SHELL owns hashing, zlib and the filesystem
// PURITY: SHELL
// EFFECT: Effect<HistoryContainer, LoadError> | Effect<void, SaveError>
// FORMAT THEOREM: load ∘ save = id on containers (sessions sorted, empty sessions dropped by the caller)
// INVARIANT: A crash during save leaves either the old file or the new file, never a partial one
// INVARIANT: Any change to the bytes after the version header fails the checksum or the zlib Adler-32
// COMPLEXITY: O(n) in file size

import { createHash, randomUUID } from "node:crypto";
import * as fs from "node:fs";
import * as path from "node:path";
import * as zlib from "node:zlib";

import { Effect, Either, Option } from "effect";

import { LoadError, SaveError } from "../../core/errors.js";
import { corrupt } from "../../core/history/binary.js";
import {
	checkVersion,
	decodePayload,
	encodePayload,
	frame,
	unframe,
} from "../../core/history/codec.js";
import {
	CURRENT_FORMAT_VERSION,
	emptyContainer,
	type HistoryContainer,
} from "../../core/history/model.js";

/** Upper bound on the decompressed payload. */
const MAX_PAYLOAD_BYTES = 64 * 1024 * 1024;

/** Leading SHA-256 bytes stored ahead of the compressed stream. */
const CHECKSUM_BYTES = 4;

const ENV: NodeJS.ProcessEnv & { RATIOCALC_DEBUG?: string } = process.env;
const DEBUG = ENV.RATIOCALC_DEBUG === "1";
function debugLog(message: string): void {
	if (DEBUG) {
		console.error("[HISTORY-DEBUG]", message);
	}
}

const errorMessage = (error: unknown): string =>
	error instanceof Error ? error.message : String(error);

function readBytes(filePath: string): Effect.Effect<Option.Option<Uint8Array>, LoadError> {
	return Effect.try({
		try: () =>
			fs.existsSync(filePath)
				? Option.some<Uint8Array>(fs.readFileSync(filePath))
				: Option.none(),
		catch: (error) =>
			new LoadError({ reason: "Io", detail: errorMessage(error), path: filePath }),
	});
}

const checksumOf = (compressed: Uint8Array): Buffer =>
	createHash("sha256").update(compressed).digest().subarray(0, CHECKSUM_BYTES);

/**
 * Prefix a compressed payload with its checksum.
 *
 * Deflate ignores the padding bits of its last byte, so the zlib Adler-32
 * alone cannot see every flipped bit; the checksum covers the stream itself.
 */
export const sealPayload = (compressed: Uint8Array): Uint8Array => {
	const sealed = new Uint8Array(CHECKSUM_BYTES + compressed.length);
	sealed.set(checksumOf(compressed));
	sealed.set(compressed, CHECKSUM_BYTES);
	return sealed;
};

const unseal = (body: Uint8Array): Either.Either<Uint8Array, LoadError> => {
	if (body.length < CHECKSUM_BYTES) {
		return Either.left(corrupt("file is shorter than its checksum"));
	}
	const compressed = body.subarray(CHECKSUM_BYTES);
	return checksumOf(compressed).equals(body.subarray(0, CHECKSUM_BYTES))
		? Either.right(compressed)
		: Either.left(corrupt("checksum mismatch"));
};

function inflate(compressed: Uint8Array): Effect.Effect<Uint8Array, LoadError> {
	return Effect.try({
		try: () => zlib.inflateSync(compressed, { maxOutputLength: MAX_PAYLOAD_BYTES }),
		catch: (error) => corrupt(`payload does not decompress (${errorMessage(error)})`),
	});
}

/**
 * Load a history container.
 *
 * State machine: ReadBytes → VersionCheck → Checksum → Decompress → Deserialize → Migrate → Ready.
 * A missing file yields an empty container.
 *
 * @effect Effect<HistoryContainer, LoadError>
 */
export function loadHistory(
	filePath: string,
): Effect.Effect<HistoryContainer, LoadError> {
	return Effect.gen(function* () {
		const bytes = yield* readBytes(filePath);
		if (Option.isNone(bytes)) {
			debugLog(`no history at ${filePath}`);
			return emptyContainer();
		}
		const { version, body } = yield* unframe(bytes.value);
		debugLog(`file=${filePath} version=${version} compressed=${body.length}`);
		yield* checkVersion(version);
		const compressed = yield* unseal(body);
		const payload = yield* inflate(compressed);
		debugLog(`payload=${payload.length}`);
		return yield* decodePayload(version, payload);
	}).pipe(
		Effect.mapError((error) =>
			error.path === undefined
				? new LoadError({
						reason: error.reason,
						detail: error.detail,
						path: filePath,
						...(error.version === undefined ? {} : { version: error.version }),
					})
				: error,
		),
	);
}

/** Serialize, compress, seal and frame a container in the current format. */
export const serializeContainer = (container: HistoryContainer): Uint8Array =>
	frame(
		CURRENT_FORMAT_VERSION,
		sealPayload(zlib.deflateSync(encodePayload(container))),
	);

/**
 * Write bytes beside the target, flush, then rename over it.
 *
 * @pure false (filesystem)
 * @invariant the temp file never outlives a failed write
 */
export function writeFileAtomically(targetPath: string, data: Uint8Array): void {
	fs.mkdirSync(path.dirname(targetPath), { recursive: true });
	const tempPath = `${targetPath}.tmp-${process.pid}-${randomUUID()}`;
	try {
		const fd = fs.openSync(tempPath, "wx", 0o600);
		try {
			fs.writeSync(fd, data);
			fs.fsyncSync(fd);
		} finally {
			fs.closeSync(fd);
		}
		fs.renameSync(tempPath, targetPath);
	} catch (error) {
		fs.rmSync(tempPath, { force: true });
		throw error;
	}
}

/**
 * Persist a container atomically.
 *
 * @effect Effect<void, SaveError>
 */
export function saveHistory(
	filePath: string,
	container: HistoryContainer,
): Effect.Effect<void, SaveError> {
	return Effect.try({
		try: () => {
			const bytes = serializeContainer(container);
			writeFileAtomically(filePath, bytes);
			debugLog(`saved ${bytes.length} bytes to ${filePath}`);
		},
		catch: (error) =>
			new SaveError({ reason: "Io", detail: errorMessage(error), path: filePath }),
	});
}

/**
 * Move an unreadable history file aside so the next save does not destroy it.
 *
 * @returns the backup path
 */
export function preserveUnreadable(
	filePath: string,
	suffix: string,
): Effect.Effect<string, SaveError> {
	const backupPath = `${filePath}.unreadable-${suffix}`;
	return Effect.try({
		try: () => {
			fs.renameSync(filePath, backupPath);
			return backupPath;
		},
		catch: (error) =>
			new SaveError({ reason: "Io", detail: errorMessage(error), path: filePath }),
	});
}
