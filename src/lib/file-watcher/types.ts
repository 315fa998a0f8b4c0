import type { UnlistenFn } from '$lib/events/event-channel'
import type { WatcherEventKind } from '$lib/file-explorer/types'

/** A change as reported by a backend, before the adapter stamps it. */
export interface RawChange {
    kind: WatcherEventKind
    path: string
    /** Pairs the two halves of a rename. Required for `renamed_from` / `renamed_to`. */
    cookie?: string
}

/**
 * Source of raw filesystem notifications for a set of directories.
 * Backends report direct children of added directories and the directories themselves.
 */
export interface WatcherBackend {
    add(directory: string): void
    remove(directory: string): void
    onChange(handler: (change: RawChange) => void): UnlistenFn
    onError(handler: (error: unknown) => void): UnlistenFn
    close(): Promise<void>
}
