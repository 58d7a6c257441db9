/**
 * Frame-by-frame transcoding of an OSM PBF stream from raw/zlib blobs to zstd blobs.
 *
 * Each frame is read, decompressed, recompressed and written before the next one is
 * read, so memory use is bounded by the largest frame. Output frames mirror input
 * frames one to one and in order. The first error aborts the run.
 *
 * @module
 */

import { type ProgressListener, progress } from "@zstd-pbf/shared/progress"
import { osmPbfBlobToBytes, readOsmPbfBlob } from "./blob-codec"
import { PbfError } from "./errors"
import { osmPbfFrameToBytes } from "./frames-to-pbf"
import { type OsmPbfFrame, readOsmPbfFrames } from "./pbf-to-frames"
import {
	type CompressionLevel,
	defaultOsmPbfCodecs,
	type OsmPbfCodecs,
	recompressBlob,
} from "./recompress"
import type { OsmPbfByteSource } from "./utils"

export type TranscodeState =
	| { status: "running" }
	| { status: "draining"; success: true }
	| { status: "failed"; error: unknown }
	| { status: "done" }

export interface TranscodeOptions {
	/** zstd preset for every frame. Defaults to `"default"`. */
	level?: CompressionLevel
	/** Override the zlib decoder and/or zstd encoder. */
	codecs?: Partial<OsmPbfCodecs>
	/** Called after each frame is written. */
	onProgress?: ProgressListener
	/** Called on every state transition. */
	onState?: (state: TranscodeState) => void
}

export interface TranscodeStats {
	frames: number
	/** Sum of the serialized input Blob sizes. */
	blobBytesIn: number
	/** Sum of the serialized output Blob sizes. */
	blobBytesOut: number
}

/**
 * Recompress the Blob of one frame, returning a frame whose `datasize` is recomputed
 * from the new serialized Blob.
 */
export async function transcodeOsmPbfFrame(
	frame: OsmPbfFrame,
	level: CompressionLevel,
	codecs: OsmPbfCodecs = defaultOsmPbfCodecs,
): Promise<OsmPbfFrame> {
	const blob = readOsmPbfBlob(frame.header, frame.blob)
	const zstdBlob = await recompressBlob(blob, level, codecs)
	const blobBytes = osmPbfBlobToBytes(zstdBlob)
	return {
		header: { ...frame.header, datasize: blobBytes.byteLength },
		blob: blobBytes,
	}
}

/**
 * Transcode every frame of `input` and hand the resulting bytes to `write`, in order.
 *
 * `write` is awaited before the next frame is read. Nothing is written for a frame that
 * fails; callers that write to a file must discard it when this rejects.
 *
 * @throws The first error encountered. `PbfError`s are tagged with the failing frame.
 *
 * @example
 * ```ts
 * const chunks: Uint8Array[] = []
 * const stats = await transcodeOsmPbf(pbfBytes, (bytes) => chunks.push(bytes), {
 *   level: "best",
 * })
 * ```
 */
export async function transcodeOsmPbf(
	input: OsmPbfByteSource,
	write: (bytes: Uint8Array) => unknown,
	options: TranscodeOptions = {},
): Promise<TranscodeStats> {
	const level = options.level ?? "default"
	const codecs: OsmPbfCodecs = { ...defaultOsmPbfCodecs, ...options.codecs }
	const setState = (state: TranscodeState) => options.onState?.(state)
	const stats: TranscodeStats = { frames: 0, blobBytesIn: 0, blobBytesOut: 0 }

	setState({ status: "running" })
	try {
		for await (const frame of readOsmPbfFrames(input)) {
			const output = await transcodeOsmPbfFrame(frame, level, codecs)
			await write(osmPbfFrameToBytes(output))

			stats.frames++
			stats.blobBytesIn += frame.blob.byteLength
			stats.blobBytesOut += output.blob.byteLength
			options.onProgress?.(
				progress(
					`Frame ${stats.frames} (${frame.header.type}): ${frame.blob.byteLength} -> ${output.blob.byteLength} bytes`,
				),
			)
		}
	} catch (error) {
		if (error instanceof PbfError) error.frame ??= stats.frames + 1
		setState({ status: "failed", error })
		throw error
	}

	setState({ status: "draining", success: true })
	setState({ status: "done" })
	return stats
}
