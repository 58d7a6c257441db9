import { compress, decompress } from "zstd-napi"
import { CodecError } from "./errors"

/** A plain Uint8Array view over the Buffer libzstd returns. */
function toUint8Array(bytes: Uint8Array): Uint8Array {
	return new Uint8Array(bytes.buffer, bytes.byteOffset, bytes.byteLength)
}

/**
 * Compress data into a single zstd frame with the frame content size recorded.
 *
 * Runs on the native libzstd binding, so blobs up to `MAX_BLOB_SIZE_BYTES` compress at
 * every preset.
 *
 * @throws CodecError if libzstd reports a failure.
 */
export async function zstdCompress(
	data: Uint8Array,
	level: number,
): Promise<Uint8Array> {
	try {
		return toUint8Array(compress(data, { compressionLevel: level }))
	} catch (error) {
		throw new CodecError(`zstd compression failed at level ${level}`, {
			cause: error,
		})
	}
}

/**
 * Decompress a single zstd frame.
 * @throws CodecError if the data is not a valid zstd frame.
 */
export async function zstdDecompress(data: Uint8Array): Promise<Uint8Array> {
	try {
		return toUint8Array(decompress(data))
	} catch (error) {
		throw new CodecError("zstd decompression failed", { cause: error })
	}
}
