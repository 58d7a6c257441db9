import { promisify } from "node:util"
import { deflate, inflate } from "node:zlib"

/**
 * Anything that can provide PBF bytes: a whole buffer, or a sync/async iterable of chunks
 * such as a Node `fs.ReadStream` or a Web `ReadableStream`.
 */
export type OsmPbfByteSource =
	| Uint8Array
	| ArrayBuffer
	| Iterable<Uint8Array>
	| AsyncIterable<Uint8Array>

/**
 * Convert a byte source to an async generator of chunks.
 */
export async function* toByteChunks(
	source: OsmPbfByteSource,
): AsyncGenerator<Uint8Array> {
	if (source == null) throw Error("Value is null")
	if (source instanceof Uint8Array) {
		yield source
	} else if (source instanceof ArrayBuffer) {
		yield new Uint8Array(source)
	} else {
		for await (const chunk of source) yield chunk
	}
}

const inflateAsync = promisify(inflate)
const deflateAsync = promisify(deflate)

/**
 * Decompress zlib data (deflate with zlib headers, as used by OSM PBF `zlib_data`).
 */
export async function zlibDecompress(data: Uint8Array): Promise<Uint8Array> {
	return new Uint8Array(await inflateAsync(data))
}

/**
 * Compress data into the zlib format used by OSM PBF `zlib_data`.
 */
export async function zlibCompress(data: Uint8Array): Promise<Uint8Array> {
	return new Uint8Array(await deflateAsync(data))
}

/**
 * Encode a 32-bit *big-endian* unsigned integer.
 */
export function uint32BE(n: number): Uint8Array {
	const out = new Uint8Array(4)
	out[0] = (n >>> 24) & 0xff
	out[1] = (n >>> 16) & 0xff
	out[2] = (n >>> 8) & 0xff
	out[3] = n & 0xff
	return out
}

/**
 * Decode a 32-bit *big-endian* unsigned integer from the first four bytes.
 */
export function readUint32BE(bytes: Uint8Array): number {
	return new DataView(bytes.buffer, bytes.byteOffset, 4).getUint32(0, false)
}
