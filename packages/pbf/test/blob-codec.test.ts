import { describe, expect, it, vi } from "vitest"
import {
	osmPbfBlobToBytes,
	readOsmPbfBlob,
	toRawBytes,
} from "../src/blob-codec"
import { FormatError, UnsupportedError } from "../src/errors"
import { blobToBytes, createZlibBlob, fromText, text } from "./helpers"

describe("readOsmPbfBlob", () => {
	it("decodes the datasize bytes of a blob", async () => {
		const blob = await createZlibBlob(text("hello world"))
		const bytes = blobToBytes(blob)
		const header = { type: "OSMData", datasize: bytes.length }
		expect(readOsmPbfBlob(header, bytes)).toEqual(blob)
	})

	it("rejects bytes that disagree with datasize", () => {
		const bytes = blobToBytes({ data: { type: "raw", bytes: text("abc") } })
		const header = { type: "OSMData", datasize: bytes.length + 1 }
		expect(() => readOsmPbfBlob(header, bytes)).toThrow(
			`invalid blob encoding: expected ${bytes.length + 1} bytes, got ${bytes.length}`,
		)
	})

	it("rejects malformed blob bytes", () => {
		const bytes = Uint8Array.of(0x0f)
		expect(() => readOsmPbfBlob({ type: "OSMData", datasize: 1 }, bytes)).toThrow(
			FormatError,
		)
	})

	it("serializes blobs with osmPbfBlobToBytes", () => {
		const blob = {
			raw_size: 1,
			data: { type: "raw" as const, bytes: Uint8Array.of(5) },
		}
		expect(osmPbfBlobToBytes(blob)).toEqual(blobToBytes(blob))
	})
})

describe("toRawBytes", () => {
	it("returns raw bytes unchanged", async () => {
		const bytes = text("raw block")
		expect(await toRawBytes({ data: { type: "raw", bytes } })).toBe(bytes)
	})

	it("decompresses zlib blobs", async () => {
		const blob = await createZlibBlob(text("hello world"))
		expect(fromText(await toRawBytes(blob))).toBe("hello world")
	})

	it("uses the given zlib decoder", async () => {
		const decompress = vi.fn(async (_data: Uint8Array) => text("abc"))
		const blob = {
			raw_size: 3,
			data: { type: "zlib" as const, bytes: Uint8Array.of(1) },
		}
		expect(fromText(await toRawBytes(blob, decompress))).toBe("abc")
		expect(decompress).toHaveBeenCalledWith(Uint8Array.of(1))
	})

	it("rejects zlib output that differs from raw_size", async () => {
		const blob = await createZlibBlob(text("hello world"))
		blob.raw_size = 12
		await expect(toRawBytes(blob)).rejects.toThrow(
			"corrupt zlib blob: decompressed to 11 bytes, raw_size is 12",
		)
	})

	it("rejects zlib blobs without raw_size", async () => {
		const { data } = await createZlibBlob(text("hello world"))
		await expect(toRawBytes({ data })).rejects.toThrow(
			"corrupt zlib blob: raw_size is missing",
		)
	})

	it("rejects corrupt zlib data", async () => {
		const blob = {
			raw_size: 3,
			data: { type: "zlib" as const, bytes: Uint8Array.of(1, 2, 3) },
		}
		const rejection = toRawBytes(blob)
		await expect(rejection).rejects.toBeInstanceOf(FormatError)
		await expect(rejection).rejects.toThrow("corrupt zlib blob")
	})

	it.each(["zstd", "lzma", "bzip2", "lz4"] as const)(
		"rejects %s blobs as unsupported",
		async (type) => {
			const blob = { raw_size: 1, data: { type, bytes: Uint8Array.of(1) } }
			const rejection = toRawBytes(blob)
			await expect(rejection).rejects.toBeInstanceOf(UnsupportedError)
			await expect(rejection).rejects.toMatchObject({
				code: "UNSUPPORTED",
				variant: type,
				message: `unsupported blob format: ${type}`,
			})
		},
	)

	it("rejects missing blobs", async () => {
		await expect(toRawBytes(undefined)).rejects.toThrow("missing blob")
		await expect(toRawBytes({ raw_size: 4 })).rejects.toBeInstanceOf(
			FormatError,
		)
	})
})
