/**
 * Recompression of blob payloads into zstd.
 *
 * @module
 */

import { type Decompress, toRawBytes } from "./blob-codec"
import { CodecError } from "./errors"
import type { OsmPbfBlob } from "./fileformat"
import { zlibDecompress } from "./utils"
import { zstdCompress } from "./zstd"

/** Named speed/ratio presets, chosen once per run. */
export type CompressionLevel = "fastest" | "default" | "better" | "best"

export const COMPRESSION_LEVELS = [
	"fastest",
	"default",
	"better",
	"best",
] as const satisfies readonly CompressionLevel[]

/** zstd level used for each preset. */
export const ZSTD_COMPRESSION_LEVELS = {
	fastest: 1,
	default: 3,
	better: 7,
	best: 11,
} as const satisfies Record<CompressionLevel, number>

export type Compress = (data: Uint8Array, level: number) => Promise<Uint8Array>

/**
 * The decoder for source blobs and the encoder for the target codec.
 * Defaults to `node:zlib` and `zstd-napi`.
 */
export interface OsmPbfCodecs {
	decompress: Decompress
	compress: Compress
}

export const defaultOsmPbfCodecs: OsmPbfCodecs = {
	decompress: zlibDecompress,
	compress: zstdCompress,
}

/**
 * Compress raw bytes with zstd at the given preset.
 * @throws CodecError if the encoder fails.
 */
export async function recompress(
	raw: Uint8Array,
	level: CompressionLevel,
	compress: Compress = zstdCompress,
): Promise<Uint8Array> {
	try {
		return await compress(raw, ZSTD_COMPRESSION_LEVELS[level])
	} catch (error) {
		if (error instanceof CodecError) throw error
		throw new CodecError(`could not compress blob at level "${level}"`, {
			cause: error,
		})
	}
}

/**
 * Build a Blob holding only `zstd_data`. Any previous variant is gone.
 */
export function wrapZstd(compressed: Uint8Array, rawSize: number): OsmPbfBlob {
	return {
		raw_size: rawSize,
		data: { type: "zstd", bytes: compressed },
	}
}

/**
 * Decompress a raw or zlib Blob and re-wrap its payload as zstd.
 *
 * @example
 * ```ts
 * const blob = readOsmPbfBlob(frame.header, frame.blob)
 * const zstdBlob = await recompressBlob(blob, "best")
 * ```
 */
export async function recompressBlob(
	blob: OsmPbfBlob,
	level: CompressionLevel,
	codecs: OsmPbfCodecs = defaultOsmPbfCodecs,
): Promise<OsmPbfBlob> {
	const raw = await toRawBytes(blob, codecs.decompress)
	const compressed = await recompress(raw, level, codecs.compress)
	return wrapZstd(compressed, raw.byteLength)
}

export function isCompressionLevel(value: string): value is CompressionLevel {
	return COMPRESSION_LEVELS.some((level) => level === value)
}
