/**
 * Blob decoding and decompression.
 *
 * Turns the serialized Blob of a frame into its tagged-union form and extracts the
 * uncompressed payload. Only `raw` and `zlib` blobs can be decompressed; every other
 * variant is rejected rather than passed through.
 *
 * @module
 */

import Pbf from "pbf"
import { FormatError, UnsupportedError } from "./errors"
import {
	type OsmPbfBlob,
	type OsmPbfBlobHeader,
	readBlob,
	writeBlob,
} from "./fileformat"
import { zlibDecompress } from "./utils"

export type Decompress = (data: Uint8Array) => Promise<Uint8Array>

/**
 * Decode the `header.datasize` bytes of a serialized Blob.
 * @throws FormatError if the length disagrees with the header or the bytes cannot be decoded.
 */
export function readOsmPbfBlob(
	header: OsmPbfBlobHeader,
	bytes: Uint8Array,
): OsmPbfBlob {
	if (bytes.byteLength !== header.datasize) {
		throw new FormatError(
			`invalid blob encoding: expected ${header.datasize} bytes, got ${bytes.byteLength}`,
		)
	}
	try {
		const pbf = new Pbf(bytes)
		const blob = readBlob(pbf)
		if (pbf.pos !== bytes.byteLength) {
			throw Error(`read ${pbf.pos} of ${bytes.byteLength} bytes`)
		}
		return blob
	} catch (error) {
		throw new FormatError("invalid blob encoding", { cause: error })
	}
}

/**
 * Serialize a Blob. The result's length is the `datasize` of the BlobHeader that precedes it.
 */
export function osmPbfBlobToBytes(blob: OsmPbfBlob): Uint8Array {
	const pbf = new Pbf()
	writeBlob(blob, pbf)
	return pbf.finish()
}

/**
 * Extract the uncompressed bytes of a Blob.
 *
 * @param blob - Decoded Blob. Must hold a `raw` or `zlib` payload.
 * @param decompress - zlib decoder, defaults to `node:zlib`.
 * @throws FormatError if the blob is missing, or zlib data is corrupt or not `raw_size` long.
 * @throws UnsupportedError for any other compression, including zstd.
 */
export async function toRawBytes(
	blob: OsmPbfBlob | null | undefined,
	decompress: Decompress = zlibDecompress,
): Promise<Uint8Array> {
	if (blob?.data == null) throw new FormatError("missing blob")

	const { data } = blob
	switch (data.type) {
		case "raw":
			return data.bytes
		case "zlib": {
			if (blob.raw_size === undefined) {
				throw new FormatError("corrupt zlib blob: raw_size is missing")
			}
			let raw: Uint8Array
			try {
				raw = await decompress(data.bytes)
			} catch (error) {
				throw new FormatError("corrupt zlib blob", { cause: error })
			}
			if (raw.byteLength !== blob.raw_size) {
				throw new FormatError(
					`corrupt zlib blob: decompressed to ${raw.byteLength} bytes, raw_size is ${blob.raw_size}`,
				)
			}
			return raw
		}
		default:
			throw new UnsupportedError(data.type)
	}
}
