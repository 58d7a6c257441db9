/**
 * Command-line argument parsing.
 *
 * Flags come before the two positional file arguments and may use one or two dashes.
 * `--` ends flag parsing.
 */

import {
	type CompressionLevel,
	isCompressionLevel,
	UsageError,
} from "@zstd-pbf/pbf"

export interface TranscodeArgs {
	input: string
	output: string
	level: CompressionLevel
	verbose: boolean
}

export type Command =
	| { type: "help" }
	| { type: "transcode"; options: TranscodeArgs }

export function getHelpText(): string {
	return `Usage:
  zstd-pbf [-fastest|-better|-best] <IN_FILE> <OUT_FILE>

Recompresses the blobs of an OSM PBF file with zstd. OUT_FILE must not exist.

Options:
  -fastest      use the fastest compression level
  -default      use the default compression level (the default)
  -better       use a compression level with better compression than default
  -best         use the compression level with the best compression
  -v, -verbose  log every converted blob
  -h, -help     show this help`
}

function flagName(arg: string): string | undefined {
	if (arg === "-" || arg === "--" || !arg.startsWith("-")) return undefined
	return arg.replace(/^--?/, "")
}

/**
 * Parse command line arguments into a typed Command.
 * @throws UsageError for unknown flags, conflicting levels or a wrong number of files.
 */
export function parseArgs(argv: string[] = process.argv.slice(2)): Command {
	const levels = new Set<CompressionLevel>()
	const positionals: string[] = []
	let verbose = false

	let i = 0
	for (; i < argv.length; i++) {
		const arg = argv[i]
		if (arg === undefined || arg === "--") {
			i++
			break
		}
		const name = flagName(arg)
		if (name === undefined) break

		if (name === "h" || name === "help") return { type: "help" }
		if (name === "v" || name === "verbose") {
			verbose = true
			continue
		}
		if (!isCompressionLevel(name)) throw new UsageError(`Unknown flag: ${arg}`)
		levels.add(name)
	}
	positionals.push(...argv.slice(i))

	if (levels.size > 1) {
		throw new UsageError("Multiple compression levels have been requested.")
	}
	const [input, output] = positionals
	if (positionals.length !== 2 || input === undefined || output === undefined) {
		throw new UsageError(
			"Give exactly two arguments: The input and output PBF files.",
		)
	}

	const [level = "default"] = levels
	return { type: "transcode", options: { input, output, level, verbose } }
}
