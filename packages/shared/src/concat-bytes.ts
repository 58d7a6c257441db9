/**
 * Concatenates multiple `Uint8Array` segments into a contiguous array.
 */
export function concatBytes(...parts: Uint8Array[]): Uint8Array {
	const total = parts.reduce((n, p) => n + p.byteLength, 0)
	const out = new Uint8Array(total)
	let offset = 0
	for (const p of parts) {
		out.set(p, offset)
		offset += p.byteLength
	}
	return out
}
