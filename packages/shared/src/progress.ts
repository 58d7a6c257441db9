/**
 * Progress helpers for long-running operations.
 *
 * Provides a standard payload for reporting progress from the transcoding loop
 * to whoever drives it (the CLI logs them, tests collect them).
 *
 * @module
 */

/**
 * Progress payload containing a message and timestamp.
 */
export type Progress = {
	msg: string
	timestamp: number
}

/** Receives progress payloads, one per processed frame. */
export type ProgressListener = (progress: Progress) => void

/**
 * Create a Progress payload with current timestamp.
 * @param msg - The progress message.
 */
export function progress(msg: string): Progress {
	return {
		msg,
		timestamp: Date.now(),
	}
}

/**
 * Log a progress message to the console.
 */
export function logProgress(progress: Progress) {
	console.log(progress.msg)
}
