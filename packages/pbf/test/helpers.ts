import { concatBytes } from "@zstd-pbf/shared/concat-bytes"
import Pbf from "pbf"
import { readOsmPbfBlob } from "../src/blob-codec"
import { type OsmPbfBlob, writeBlob } from "../src/fileformat"
import { osmPbfFrameToBytes } from "../src/frames-to-pbf"
import { readOsmPbfFrames } from "../src/pbf-to-frames"
import { zlibCompress } from "../src/utils"
import { zstdDecompress } from "../src/zstd"

const encoder = new TextEncoder()
const decoder = new TextDecoder()

export const text = (value: string) => encoder.encode(value)
export const fromText = (bytes: Uint8Array) => decoder.decode(bytes)

export function blobToBytes(blob: OsmPbfBlob): Uint8Array {
	const pbf = new Pbf()
	writeBlob(blob, pbf)
	return pbf.finish()
}

export async function createZlibBlob(raw: Uint8Array): Promise<OsmPbfBlob> {
	return {
		raw_size: raw.byteLength,
		data: { type: "zlib", bytes: await zlibCompress(raw) },
	}
}

export function createFrameBytes(
	blob: OsmPbfBlob,
	type = "OSMData",
	indexdata?: Uint8Array,
): Uint8Array {
	const bytes = blobToBytes(blob)
	const header =
		indexdata === undefined
			? { type, datasize: bytes.byteLength }
			: { type, indexdata, datasize: bytes.byteLength }
	return osmPbfFrameToBytes({ header, blob: bytes })
}

export const SAMPLE_PAYLOADS = [
	"OsmSchema-V0.6 DenseNodes",
	"first primitive block",
	"second primitive block, stored raw",
]

/**
 * Three frames: a zlib header block, a zlib data block and a raw data block with indexdata.
 */
export async function createSamplePbfFileBytes() {
	const [header, first, second] = SAMPLE_PAYLOADS.map(text)
	if (!header || !first || !second) throw Error("Missing sample payload")
	return concatBytes(
		createFrameBytes(await createZlibBlob(header), "OSMHeader"),
		createFrameBytes(await createZlibBlob(first)),
		createFrameBytes(
			{ raw_size: second.byteLength, data: { type: "raw", bytes: second } },
			"OSMData",
			Uint8Array.of(1, 2, 3),
		),
	)
}

/**
 * Read a transcoded file back, checking every Blob is zstd and decompressing it.
 */
export async function readZstdPayloads(bytes: Uint8Array) {
	const frames: { type: string; indexdata?: Uint8Array; payload: string }[] =
		[]
	for await (const { header, blob } of readOsmPbfFrames(bytes)) {
		const decoded = readOsmPbfBlob(header, blob)
		if (decoded.data?.type !== "zstd") {
			throw Error(`Expected a zstd blob, found ${decoded.data?.type}`)
		}
		const raw = await zstdDecompress(decoded.data.bytes)
		if (raw.byteLength !== decoded.raw_size) {
			throw Error(`raw_size ${decoded.raw_size} != ${raw.byteLength}`)
		}
		frames.push({
			type: header.type,
			indexdata: header.indexdata,
			payload: fromText(raw),
		})
	}
	return frames
}

/**
 * Deterministic, partly compressible bytes: printable noise from a xorshift32 generator
 * with runs of repeated text, roughly the texture of a primitive block.
 */
export function createBlockBytes(length: number, seed = 0x9e3779b9) {
	const bytes = new Uint8Array(length)
	let x = seed >>> 0
	for (let i = 0; i < length; i++) {
		x ^= x << 13
		x ^= x >>> 17
		x ^= x << 5
		x >>>= 0
		bytes[i] = i % 4096 < 1024 ? 0x61 + (i % 26) : 0x20 + (x % 64)
	}
	return bytes
}
