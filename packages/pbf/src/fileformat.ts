/**
 * Readers and writers for the two messages of `fileformat.proto`.
 *
 * ```proto
 * message Blob {
 *   optional int32 raw_size = 2;
 *   oneof data {
 *     bytes raw = 1;
 *     bytes zlib_data = 3;
 *     bytes lzma_data = 4;
 *     bytes OBSOLETE_bzip2_data = 5 [deprecated=true];
 *     bytes lz4_data = 6;
 *     bytes zstd_data = 7;
 *   }
 * }
 *
 * message BlobHeader {
 *   required string type = 1;
 *   optional bytes indexdata = 2;
 *   required int32 datasize = 3;
 * }
 * ```
 *
 * The `data` oneof is modelled as a tagged union so only one variant can ever be held.
 *
 * @module
 */

import type Pbf from "pbf"

const VARINT = 0
const BYTES = 2

export type OsmPbfBlobHeader = {
	type: string
	indexdata?: Uint8Array
	datasize: number
}

/** Compression variants of the Blob `data` oneof, keyed by field number. */
export const BLOB_DATA_FIELDS = {
	raw: 1,
	zlib: 3,
	lzma: 4,
	bzip2: 5,
	lz4: 6,
	zstd: 7,
} as const

export type OsmPbfBlobDataType = keyof typeof BLOB_DATA_FIELDS

export type OsmPbfBlobData = {
	type: OsmPbfBlobDataType
	bytes: Uint8Array
}

export type OsmPbfBlob = {
	raw_size?: number
	data?: OsmPbfBlobData
}

const BLOB_DATA_TYPES = new Map<number, OsmPbfBlobDataType>(
	(["raw", "zlib", "lzma", "bzip2", "lz4", "zstd"] as const).map((type) => [
		BLOB_DATA_FIELDS[type],
		type,
	]),
)

function expectWireType(pbf: Pbf, tag: number, type: number) {
	if (pbf.type !== type) {
		throw Error(`Field ${tag} has wire type ${pbf.type}, expected ${type}`)
	}
}

type PartialBlobHeader = Partial<OsmPbfBlobHeader>

function readBlobHeaderField(tag: number, obj: PartialBlobHeader, pbf: Pbf) {
	if (tag === 1) {
		expectWireType(pbf, tag, BYTES)
		obj.type = pbf.readString()
	} else if (tag === 2) {
		expectWireType(pbf, tag, BYTES)
		obj.indexdata = pbf.readBytes()
	} else if (tag === 3) {
		expectWireType(pbf, tag, VARINT)
		obj.datasize = pbf.readVarint(true)
	}
}

/**
 * Read a BlobHeader from `pbf` up to `end`.
 * @throws If the required `datasize` field is missing.
 */
export function readBlobHeader(pbf: Pbf, end?: number): OsmPbfBlobHeader {
	const fields: PartialBlobHeader = {}
	const { type, indexdata, datasize } = pbf.readFields(
		readBlobHeaderField,
		fields,
		end,
	)
	if (datasize === undefined) throw Error("BlobHeader has no datasize")
	return indexdata === undefined
		? { type: type ?? "", datasize }
		: { type: type ?? "", indexdata, datasize }
}

export function writeBlobHeader(obj: OsmPbfBlobHeader, pbf: Pbf) {
	pbf.writeStringField(1, obj.type)
	if (obj.indexdata !== undefined) pbf.writeBytesField(2, obj.indexdata)
	pbf.writeVarintField(3, obj.datasize)
}

function readBlobField(tag: number, obj: OsmPbfBlob, pbf: Pbf) {
	if (tag === 2) {
		expectWireType(pbf, tag, VARINT)
		obj.raw_size = pbf.readVarint(true)
		return
	}
	const type = BLOB_DATA_TYPES.get(tag)
	if (type === undefined) return
	expectWireType(pbf, tag, BYTES)
	// A later data field replaces an earlier one, as with any protobuf oneof.
	obj.data = { type, bytes: pbf.readBytes() }
}

export function readBlob(pbf: Pbf, end?: number): OsmPbfBlob {
	const blob: OsmPbfBlob = {}
	return pbf.readFields(readBlobField, blob, end)
}

export function writeBlob(obj: OsmPbfBlob, pbf: Pbf) {
	if (obj.data?.type === "raw") pbf.writeBytesField(1, obj.data.bytes)
	if (obj.raw_size !== undefined) pbf.writeVarintField(2, obj.raw_size)
	if (obj.data && obj.data.type !== "raw") {
		pbf.writeBytesField(BLOB_DATA_FIELDS[obj.data.type], obj.data.bytes)
	}
}
