// Recommended header and blob sizes as defined by the OSM PBF specification
// Header: 32 KiB, Blob: 16 MiB
export const RECOMMENDED_HEADER_SIZE_BYTES = 32 * 1024
export const RECOMMENDED_BLOB_SIZE_BYTES = 16 * 1024 * 1024

// Hard ceilings applied while reading. Lengths at or above these are rejected as malformed.
export const MAX_HEADER_SIZE_BYTES = 64 * 1024 * 1024
export const MAX_BLOB_SIZE_BYTES = 64 * 1024 * 1024

/** Number of bytes used to encode the BlobHeader length prefix (big-endian uint32). */
export const HEADER_LENGTH_BYTES = 4
