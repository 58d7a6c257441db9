import { mkdtemp, rm, writeFile } from "node:fs/promises"
import { tmpdir } from "node:os"
import { join } from "node:path"
import {
	type OsmPbfBlob,
	osmPbfBlobToBytes,
	osmPbfFrameToBytes,
	readOsmPbfBlob,
	readOsmPbfFrames,
	zlibCompress,
	zstdDecompress,
} from "@zstd-pbf/pbf"
import { concatBytes } from "@zstd-pbf/shared/concat-bytes"

const encoder = new TextEncoder()
const decoder = new TextDecoder()

export function frameBytes(blob: OsmPbfBlob, type = "OSMData") {
	const bytes = osmPbfBlobToBytes(blob)
	return osmPbfFrameToBytes({
		header: { type, datasize: bytes.byteLength },
		blob: bytes,
	})
}

export async function zlibFrameBytes(payload: string, type = "OSMData") {
	const raw = encoder.encode(payload)
	const bytes = await zlibCompress(raw)
	return frameBytes(
		{ raw_size: raw.byteLength, data: { type: "zlib", bytes } },
		type,
	)
}

export async function createPbfFileBytes(...payloads: string[]) {
	const frames: Uint8Array[] = []
	for (const [i, payload] of payloads.entries()) {
		const type = i === 0 ? "OSMHeader" : "OSMData"
		frames.push(await zlibFrameBytes(payload, type))
	}
	return concatBytes(...frames)
}

export const zstdFrameBytes = () =>
	frameBytes({ raw_size: 1, data: { type: "zstd", bytes: Uint8Array.of(1) } })

/**
 * Decompress every zstd Blob of a PBF file into its text payload.
 */
export async function readPayloads(bytes: Uint8Array) {
	const payloads: string[] = []
	for await (const { header, blob } of readOsmPbfFrames(bytes)) {
		const decoded = readOsmPbfBlob(header, blob)
		if (decoded.data?.type !== "zstd") throw Error("Expected a zstd blob")
		payloads.push(decoder.decode(await zstdDecompress(decoded.data.bytes)))
	}
	return payloads
}

/**
 * Create a temporary directory holding `in.pbf`, and a path for `out.pbf` that does not exist yet.
 */
export async function createWorkspace(input: Uint8Array) {
	const dir = await mkdtemp(join(tmpdir(), "zstd-pbf-"))
	const inputPath = join(dir, "in.pbf")
	const outputPath = join(dir, "out.pbf")
	await writeFile(inputPath, input)
	return {
		dir,
		inputPath,
		outputPath,
		cleanup: () => rm(dir, { recursive: true, force: true }),
	}
}
