import { stampEntry } from './entry'
import { sortEntries } from './sorting'
import type { DirectorySnapshot, FileEntry, FileEntryInit, SortConfig } from './types'

export interface CreateSnapshotOptions {
    path: string
    version: number
    sort: SortConfig
    /** Clock stamp taken before the listing started */
    baseline: number
    valid?: boolean
    /** Wall-clock time for cache ages; defaults to `Date.now()` */
    createdAt?: number
}

/**
 * Builds a snapshot from raw listing data: stamps generations, drops duplicate paths
 * (last one wins), and sorts.
 */
export function createSnapshot(entries: readonly FileEntryInit[], options: CreateSnapshotOptions): DirectorySnapshot {
    const byPath = new Map<string, FileEntryInit>()
    for (const entry of entries) {
        byPath.set(entry.path, entry)
    }
    const stamped = sortEntries([...byPath.values()], options.sort).map((e) => stampEntry(e, options.version))

    return Object.freeze({
        path: options.path,
        version: options.version,
        entries: Object.freeze(stamped),
        sort: options.sort,
        valid: options.valid ?? true,
        baseline: options.baseline,
        lastApplied: new Map<string, number>(),
        createdAt: options.createdAt ?? Date.now(),
    })
}

/** The degraded snapshot a pane falls back to when its listing fails. */
export function createInvalidSnapshot(
    path: string,
    version: number,
    sort: SortConfig,
    baseline: number,
    createdAt?: number,
): DirectorySnapshot {
    return createSnapshot([], { path, version, sort, baseline, valid: false, createdAt })
}

/** Re-issues an existing snapshot under a new version (used when a cached snapshot is reused). */
export function reissueSnapshot(snapshot: DirectorySnapshot, version: number): DirectorySnapshot {
    return Object.freeze({ ...snapshot, version })
}

/** Re-sorts under a new configuration. Entries keep their generation; nothing about them changed. */
export function resortSnapshot(snapshot: DirectorySnapshot, sort: SortConfig, version: number): DirectorySnapshot {
    return Object.freeze({
        ...snapshot,
        version,
        sort,
        entries: Object.freeze(sortEntries(snapshot.entries, sort)),
    })
}

export function findEntry(snapshot: DirectorySnapshot, path: string): FileEntry | undefined {
    return snapshot.entries.find((e) => e.path === path)
}

export function snapshotPaths(snapshot: DirectorySnapshot): Set<string> {
    return new Set(snapshot.entries.map((e) => e.path))
}
