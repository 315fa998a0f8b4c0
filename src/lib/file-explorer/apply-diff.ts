// Apply a patch (watcher events or local operation results) to a directory snapshot
// Extracted to enable thorough unit testing

import { sameEntryState, stampEntry } from './entry'
import { findInsertIndex } from './sorting'
import type { DiffChange, DirectorySnapshot, FileEntry } from './types'

export interface ApplyDiffResult {
    /** The new snapshot, or the input snapshot itself when nothing applied */
    snapshot: DirectorySnapshot
    applied: DiffChange[]
    /** Changes older than (or as old as) the last mutation already applied to their path */
    dropped: DiffChange[]
}

function changePath(change: DiffChange): string {
    return change.type === 'upsert' ? change.entry.path : change.path
}

/**
 * Applies a patch as one atomic step: at most one version increment, however many changes.
 *
 * Ordering is last-writer-wins per path: changes are applied in timestamp order, and a change whose
 * timestamp is not newer than the last one applied to its path (or the snapshot's listing baseline)
 * is dropped. Different paths never block each other.
 *
 * Upserts keep sort order by binary-search insertion; an upsert identical to the current entry
 * still counts as applied (it advances the path's timestamp) but keeps the existing entry object.
 *
 * `version` defaults to the next one; a fresh listing replaying buffered changes passes its own.
 */
export function applyDiff(
    snapshot: DirectorySnapshot,
    changes: readonly DiffChange[],
    version: number = snapshot.version + 1,
): ApplyDiffResult {
    const ordered = [...changes].sort((a, b) => a.timestamp - b.timestamp)
    const lastApplied = new Map(snapshot.lastApplied)
    const applied: DiffChange[] = []
    const dropped: DiffChange[] = []
    const nextVersion = version

    const list: FileEntry[] = [...snapshot.entries]

    for (const change of ordered) {
        const path = changePath(change)
        const last = lastApplied.get(path) ?? snapshot.baseline
        if (change.timestamp <= last) {
            dropped.push(change)
            continue
        }
        lastApplied.set(path, change.timestamp)
        applied.push(change)

        const existingIndex = list.findIndex((e) => e.path === path)

        if (change.type === 'remove') {
            if (existingIndex >= 0) {
                list.splice(existingIndex, 1)
            }
            continue
        }

        if (existingIndex >= 0) {
            if (sameEntryState(list[existingIndex], change.entry)) {
                continue
            }
            list.splice(existingIndex, 1)
        }
        const entry = stampEntry(change.entry, nextVersion)
        list.splice(findInsertIndex(list, entry, snapshot.sort), 0, entry)
    }

    if (applied.length === 0) {
        return { snapshot, applied, dropped }
    }

    return {
        snapshot: Object.freeze({
            ...snapshot,
            version: nextVersion,
            entries: Object.freeze(list),
            lastApplied,
        }),
        applied,
        dropped,
    }
}
