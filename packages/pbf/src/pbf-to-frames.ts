import { assertValue } from "@zstd-pbf/shared/assert"
import { concatBytes } from "@zstd-pbf/shared/concat-bytes"
import Pbf from "pbf"
import { FormatError } from "./errors"
import { type OsmPbfBlobHeader, readBlobHeader } from "./fileformat"
import {
	HEADER_LENGTH_BYTES,
	MAX_BLOB_SIZE_BYTES,
	MAX_HEADER_SIZE_BYTES,
} from "./limits"
import { type OsmPbfByteSource, readUint32BE, toByteChunks } from "./utils"

/**
 * One record of an OSM PBF file: the decoded BlobHeader and the still-serialized Blob
 * that follows it. `blob.byteLength` always equals `header.datasize`.
 */
export type OsmPbfFrame = {
	header: OsmPbfBlobHeader
	blob: Uint8Array
}

/**
 * Decode a serialized BlobHeader, rejecting anything that is not a complete, well-formed message.
 * @throws FormatError if the bytes cannot be decoded or the sizes are out of bounds.
 */
export function decodeOsmPbfBlobHeader(bytes: Uint8Array): OsmPbfBlobHeader {
	let header: OsmPbfBlobHeader
	try {
		const pbf = new Pbf(bytes)
		header = readBlobHeader(pbf)
		if (pbf.pos !== bytes.byteLength) {
			throw Error(`read ${pbf.pos} of ${bytes.byteLength} bytes`)
		}
	} catch (error) {
		throw new FormatError("invalid header encoding", { cause: error })
	}
	if (header.datasize < 0) {
		throw new FormatError(`invalid header encoding: datasize ${header.datasize}`)
	}
	if (header.datasize >= MAX_BLOB_SIZE_BYTES) {
		throw new FormatError(`blob too large: datasize ${header.datasize}`)
	}
	return header
}

/**
 * Create a stateful parser that splits raw PBF bytes into frames.
 *
 * OSM PBF files consist of a 4-byte big-endian header length, the BlobHeader, and
 * `datasize` bytes of Blob, repeated. `frames` accumulates incoming byte chunks and
 * yields each frame as soon as it is complete. `end` must be called once the input
 * is exhausted; it throws if a partial frame is left over.
 *
 * @example
 * ```ts
 * const parser = createOsmPbfFrameGenerator()
 * for await (const chunk of stream) {
 *   for (const frame of parser.frames(chunk)) {
 *     // Decode frame.blob...
 *   }
 * }
 * parser.end()
 * ```
 */
export function createOsmPbfFrameGenerator() {
	let buffer: Uint8Array = new Uint8Array(0)
	// Chunks held back until the current field can be read, joined once.
	const pending: Uint8Array[] = []
	let pendingBytes = 0
	let state: "header-length" | "header" | "blob" = "header-length"
	let bytesNeeded: number = HEADER_LENGTH_BYTES
	let blobHeader: OsmPbfBlobHeader | null = null

	/**
	 * Feed the parser with the next chunk of bytes and yield any complete frames.
	 */
	function* frames(chunk: Uint8Array): Generator<OsmPbfFrame> {
		pending.push(chunk)
		pendingBytes += chunk.byteLength
		if (buffer.byteLength + pendingBytes < bytesNeeded) return

		buffer =
			buffer.byteLength === 0 && pending.length === 1
				? chunk
				: concatBytes(buffer, ...pending)
		pending.length = 0
		pendingBytes = 0
		let pos = 0

		try {
			while (pos + bytesNeeded <= buffer.byteLength) {
				const bytes = buffer.subarray(pos, pos + bytesNeeded)
				pos += bytesNeeded
				if (state === "header-length") {
					const headerLength = readUint32BE(bytes)
					if (headerLength >= MAX_HEADER_SIZE_BYTES) {
						throw new FormatError(
							`header too large: ${headerLength} bytes >= ${MAX_HEADER_SIZE_BYTES}`,
						)
					}
					bytesNeeded = headerLength
					state = "header"
				} else if (state === "header") {
					blobHeader = decodeOsmPbfBlobHeader(bytes)
					bytesNeeded = blobHeader.datasize
					state = "blob"
				} else {
					assertValue(blobHeader, "Blob header has not been read")
					// Copy so the frame does not pin the accumulated buffer.
					yield { header: blobHeader, blob: bytes.slice() }

					state = "header-length"
					bytesNeeded = HEADER_LENGTH_BYTES
					blobHeader = null
				}
			}
		} finally {
			buffer = buffer.subarray(pos)
		}
	}

	/**
	 * Signal the end of input.
	 * @throws FormatError if the input stopped in the middle of a frame.
	 */
	function end() {
		const buffered = buffer.byteLength + pendingBytes
		if (state !== "header-length" || buffered > 0) {
			throw new FormatError(
				`truncated frame: input ended while reading ${state} (${buffered} of ${bytesNeeded} bytes)`,
			)
		}
	}

	return { frames, end }
}

/**
 * Read every frame of an OSM PBF byte source, in order.
 *
 * Completes on a clean end of input (a whole number of frames). Anything else is an error.
 *
 * @example
 * ```ts
 * import { createReadStream } from "node:fs"
 *
 * for await (const { header, blob } of readOsmPbfFrames(createReadStream("monaco.pbf"))) {
 *   console.log(header.type, blob.byteLength)
 * }
 * ```
 */
export async function* readOsmPbfFrames(
	data: OsmPbfByteSource,
): AsyncGenerator<OsmPbfFrame> {
	const parser = createOsmPbfFrameGenerator()
	for await (const chunk of toByteChunks(data)) {
		yield* parser.frames(chunk)
	}
	parser.end()
}
