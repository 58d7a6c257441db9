import { access, type FileHandle, open, rm } from "node:fs/promises"
import {
	describeError,
	IOError,
	type TranscodeOptions,
	type TranscodeStats,
	transcodeOsmPbf,
} from "@zstd-pbf/pbf"

async function exists(path: string) {
	try {
		await access(path)
		return true
	} catch {
		return false
	}
}

async function openFile(path: string, flags: "r" | "wx") {
	try {
		return await open(path, flags)
	} catch (error) {
		throw new IOError(`Could not open file '${path}'`, path, { cause: error })
	}
}

async function* readChunks(
	handle: FileHandle,
	path: string,
): AsyncGenerator<Uint8Array> {
	const stream = handle.createReadStream({ autoClose: false })
	try {
		for await (const chunk of stream) yield chunk
	} catch (error) {
		throw new IOError(`Could not read file '${path}'`, path, { cause: error })
	}
}

async function writeAll(handle: FileHandle, path: string, bytes: Uint8Array) {
	try {
		let offset = 0
		while (offset < bytes.byteLength) {
			const { bytesWritten } = await handle.write(bytes, offset)
			offset += bytesWritten
		}
	} catch (error) {
		throw new IOError(`Could not write file '${path}'`, path, { cause: error })
	}
}

async function closeFile(handle: FileHandle, path: string) {
	try {
		await handle.close()
	} catch (error) {
		throw new IOError(`Could not close file '${path}'`, path, { cause: error })
	}
}

/** Close a file once the run has failed. A close failure is only logged. */
async function closeAfterFailure(handle: FileHandle, path: string) {
	try {
		await closeFile(handle, path)
	} catch (error) {
		console.warn(describeError(error))
	}
}

async function discardOutput(handle: FileHandle, path: string) {
	try {
		await closeAfterFailure(handle, path)
	} finally {
		await rm(path, { force: true })
	}
}

/**
 * Recompress the OSM PBF file at `inputPath` into a new file at `outputPath`.
 *
 * The output is created exclusively and is removed again if anything fails, closing
 * either file included, so a rejected call leaves no output behind. Both files are
 * closed on every path.
 *
 * @throws IOError if the output already exists or a file cannot be opened, read or written.
 */
export async function transcodeOsmPbfFile(
	inputPath: string,
	outputPath: string,
	options: TranscodeOptions = {},
): Promise<TranscodeStats> {
	if (await exists(outputPath)) {
		throw new IOError(`The file '${outputPath}' already exists.`, outputPath)
	}

	const input = await openFile(inputPath, "r")
	const output = await openFile(outputPath, "wx").catch(
		async (error: unknown) => {
			await closeAfterFailure(input, inputPath)
			throw error
		},
	)

	let stats: TranscodeStats
	try {
		stats = await transcodeOsmPbf(
			readChunks(input, inputPath),
			(bytes) => writeAll(output, outputPath, bytes),
			options,
		)
		await closeFile(output, outputPath)
	} catch (error) {
		await discardOutput(output, outputPath)
		await closeAfterFailure(input, inputPath)
		throw error
	}

	try {
		await closeFile(input, inputPath)
	} catch (error) {
		await rm(outputPath, { force: true })
		throw error
	}
	return stats
}
