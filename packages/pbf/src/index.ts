/**
 * @zstd-pbf/pbf - Recompress OSM PBF files from zlib to zstd.
 *
 * Reads the length-prefixed BlobHeader/Blob frames of an OpenStreetMap PBF file,
 * decompresses each raw or zlib Blob, recompresses it with zstd, and writes frames
 * with their `datasize` recomputed. The content of every block is left untouched.
 *
 * Key capabilities:
 * - **Frame**: Split any byte source into frames and write frames back with correct length prefixes.
 * - **Decode**: Read Blobs as a tagged union of compression variants and extract their raw bytes.
 * - **Recompress**: Re-wrap raw bytes as `zstd_data` at one of four named presets.
 * - **Transcode**: Drive the whole conversion frame by frame, aborting on the first error.
 *
 * @example
 * ```ts
 * import { createReadStream } from "node:fs"
 * import { transcodeOsmPbf } from "@zstd-pbf/pbf"
 *
 * const chunks: Uint8Array[] = []
 * await transcodeOsmPbf(createReadStream("./monaco.pbf"), (bytes) => chunks.push(bytes), {
 *   level: "better",
 * })
 * ```
 *
 * @module @zstd-pbf/pbf
 */

export * from "./blob-codec"
export * from "./errors"
export * from "./fileformat"
export * from "./frames-to-pbf"
export * from "./limits"
export * from "./pbf-to-frames"
export * from "./recompress"
export * from "./transcode"
export * from "./utils"
export * from "./zstd"
