/**
 * Error types raised while reading, recompressing and writing OSM PBF frames.
 *
 * Every error carries a stable `code`. Errors raised inside the transcoding loop
 * are tagged with the 1-based index of the frame being processed.
 *
 * @module
 */

export type PbfErrorCode = "USAGE" | "IO" | "FORMAT" | "UNSUPPORTED" | "CODEC"

/** Base class for all errors raised by this package. */
export class PbfError extends Error {
	readonly code: PbfErrorCode
	/** Frame being processed when the error was raised, if known. */
	frame?: number

	constructor(code: PbfErrorCode, message: string, options?: ErrorOptions) {
		super(message, options)
		this.name = "PbfError"
		this.code = code
	}
}

/** Conflicting, missing or unknown command-line arguments. */
export class UsageError extends PbfError {
	constructor(message: string) {
		super("USAGE", message)
		this.name = "UsageError"
	}
}

/** Open, read, write or close failure against a file. */
export class IOError extends PbfError {
	readonly path: string

	constructor(message: string, path: string, options?: ErrorOptions) {
		super("IO", message, options)
		this.name = "IOError"
		this.path = path
	}
}

/** Input violates the structure of the PBF container. */
export class FormatError extends PbfError {
	constructor(message: string, options?: ErrorOptions) {
		super("FORMAT", message, options)
		this.name = "FormatError"
	}
}

/** A recognised blob compression that cannot be used as a decompression source. */
export class UnsupportedError extends PbfError {
	readonly variant: string

	constructor(variant: string) {
		super("UNSUPPORTED", `unsupported blob format: ${variant}`)
		this.name = "UnsupportedError"
		this.variant = variant
	}
}

/** The compressor failed to initialise or to encode. */
export class CodecError extends PbfError {
	constructor(message: string, options?: ErrorOptions) {
		super("CODEC", message, options)
		this.name = "CodecError"
	}
}

/**
 * Render an error and its chain of causes as a single line.
 */
export function describeError(error: unknown): string {
	const parts: string[] = []
	let current: unknown = error
	while (current != null && parts.length < 8) {
		if (current instanceof Error) {
			const frame =
				current instanceof PbfError && current.frame != null
					? ` (frame ${current.frame})`
					: ""
			parts.push(`${current.message}${frame}`)
			current = current.cause
		} else {
			parts.push(String(current))
			current = undefined
		}
	}
	return parts.join(": ")
}
