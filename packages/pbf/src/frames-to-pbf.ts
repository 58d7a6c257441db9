/**
 * Frame-to-PBF serialization utilities.
 *
 * Writes a BlobHeader and its serialized Blob back into a length-prefixed
 * PBF record, checking the sizes the OSM PBF specification recommends.
 *
 * @module
 */

import { concatBytes } from "@zstd-pbf/shared/concat-bytes"
import Pbf from "pbf"
import { FormatError } from "./errors"
import { type OsmPbfBlobHeader, writeBlobHeader } from "./fileformat"
import type { OsmPbfFrame } from "./pbf-to-frames"
import {
	RECOMMENDED_BLOB_SIZE_BYTES,
	RECOMMENDED_HEADER_SIZE_BYTES,
} from "./limits"
import { uint32BE } from "./utils"

/**
 * Serialize a BlobHeader prefixed with its own length as a big-endian uint32.
 *
 * The prefix describes the header only; `header.datasize` describes the Blob that follows.
 */
export function osmPbfBlobHeaderToBytes(header: OsmPbfBlobHeader): Uint8Array {
	const pbf = new Pbf()
	writeBlobHeader(header, pbf)
	const bytes = pbf.finish()

	if (bytes.byteLength > RECOMMENDED_HEADER_SIZE_BYTES) {
		const sizeKiB = (bytes.byteLength / 1024).toFixed(2)
		console.warn(`BlobHeader is ${sizeKiB} KiB, the recommended size is 32KiB`)
	}

	return concatBytes(uint32BE(bytes.byteLength), bytes)
}

/**
 * Serialize a frame into PBF bytes: 4-byte length prefix, BlobHeader, Blob.
 *
 * @throws FormatError if `header.datasize` does not match the Blob length.
 *
 * @example
 * ```ts
 * const bytes = osmPbfFrameToBytes({
 *   header: { type: "OSMData", datasize: blob.byteLength },
 *   blob,
 * })
 * ```
 */
export function osmPbfFrameToBytes({ header, blob }: OsmPbfFrame): Uint8Array {
	if (header.datasize !== blob.byteLength) {
		throw new FormatError(
			`BlobHeader datasize ${header.datasize} does not match Blob length ${blob.byteLength}`,
		)
	}
	if (blob.byteLength > RECOMMENDED_BLOB_SIZE_BYTES) {
		const sizeMiB = (blob.byteLength / 1024 / 1024).toFixed(2)
		console.warn(`Blob is ${sizeMiB} MiB, the recommended size is 16MiB`)
	}
	return concatBytes(osmPbfBlobHeaderToBytes(header), blob)
}
