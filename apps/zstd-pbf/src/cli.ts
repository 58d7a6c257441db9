import { describeError, UsageError } from "@zstd-pbf/pbf"
import { logProgress } from "@zstd-pbf/shared/progress"
import { type Command, getHelpText, parseArgs } from "./args"
import { transcodeOsmPbfFile } from "./transcode-file"

/**
 * Run the command line with the given arguments and resolve with the exit status.
 *
 * Usage goes to stderr, as do diagnostics. A summary of a successful run goes to stdout.
 */
export async function runCli(argv: string[]): Promise<number> {
	let command: Command
	try {
		command = parseArgs(argv)
	} catch (error) {
		if (!(error instanceof UsageError)) throw error
		console.error(error.message)
		console.error(getHelpText())
		return 1
	}

	if (command.type === "help") {
		console.error(getHelpText())
		return 0
	}

	const { input, output, level, verbose } = command.options
	try {
		const stats = await transcodeOsmPbfFile(input, output, {
			level,
			onProgress: verbose ? logProgress : undefined,
		})
		console.log(
			`Recompressed ${stats.frames} blobs from '${input}' into '${output}' (${stats.blobBytesIn} -> ${stats.blobBytesOut} bytes, level ${level})`,
		)
		return 0
	} catch (error) {
		console.error(`Could not convert '${input}': ${describeError(error)}`)
		return 1
	}
}
