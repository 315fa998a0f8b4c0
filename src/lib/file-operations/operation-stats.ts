// Status-line figures derived from operation progress

import type { OperationProgress } from './types'

export interface OperationStats {
    /** 0-100, by bytes when the batch has any, otherwise by items */
    percentComplete: number
    /** 0 until some time has passed */
    bytesPerSecond: number
    /** Null while there isn't enough data to estimate */
    estimatedSecondsRemaining: number | null
    elapsedSeconds: number
}

/** Derives percent, speed and ETA. `startedAt` is the wall-clock start of the operation. */
export function calculateOperationStats(
    progress: OperationProgress,
    startedAt: number,
    now: number = Date.now(),
): OperationStats {
    const elapsedSeconds = Math.max(0, now - startedAt) / 1000

    let percentComplete = 0
    if (progress.bytesTotal > 0) {
        percentComplete = (progress.bytesDone / progress.bytesTotal) * 100
    } else if (progress.itemsTotal > 0) {
        percentComplete = (progress.itemsDone / progress.itemsTotal) * 100
    }

    const bytesPerSecond = elapsedSeconds > 0 ? progress.bytesDone / elapsedSeconds : 0

    let estimatedSecondsRemaining: number | null = null
    if (bytesPerSecond > 0 && progress.bytesTotal > 0) {
        estimatedSecondsRemaining = (progress.bytesTotal - progress.bytesDone) / bytesPerSecond
    } else if (elapsedSeconds > 0 && progress.itemsDone > 0 && progress.itemsTotal > 0) {
        // Item-based fallback for batches of empty files and directories
        const itemsPerSecond = progress.itemsDone / elapsedSeconds
        estimatedSecondsRemaining = (progress.itemsTotal - progress.itemsDone) / itemsPerSecond
    }

    return {
        percentComplete: Math.min(100, Math.max(0, percentComplete)),
        bytesPerSecond,
        estimatedSecondsRemaining,
        elapsedSeconds,
    }
}

/** Formats bytes like "1.5 GB". */
export function formatBytes(bytes: number): string {
    if (bytes < 1024) return `${String(bytes)} B`
    if (bytes < 1024 * 1024) return `${(bytes / 1024).toFixed(1)} KB`
    if (bytes < 1024 * 1024 * 1024) return `${(bytes / (1024 * 1024)).toFixed(1)} MB`
    return `${(bytes / (1024 * 1024 * 1024)).toFixed(1)} GB`
}

/** Formats seconds like "2m 30s". */
export function formatDuration(seconds: number): string {
    if (seconds < 60) return `${String(Math.round(seconds))}s`
    if (seconds < 3600) {
        const mins = Math.floor(seconds / 60)
        const secs = Math.round(seconds % 60)
        return secs > 0 ? `${String(mins)}m ${String(secs)}s` : `${String(mins)}m`
    }
    const hours = Math.floor(seconds / 3600)
    const mins = Math.round((seconds % 3600) / 60)
    return mins > 0 ? `${String(hours)}h ${String(mins)}m` : `${String(hours)}h`
}

/** One-line summary like "3 of 10 items, 1.5 MB of 12.0 MB". */
export function formatProgressLine(progress: OperationProgress): string {
    const items = `${String(progress.itemsDone)} of ${String(progress.itemsTotal)} ${progress.itemsTotal === 1 ? 'item' : 'items'}`
    if (progress.bytesTotal === 0) return items
    return `${items}, ${formatBytes(progress.bytesDone)} of ${formatBytes(progress.bytesTotal)}`
}
