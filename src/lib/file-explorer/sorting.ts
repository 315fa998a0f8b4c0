/**
 * Ordering of snapshot entries.
 * The comparator is total: every tie falls through to the path, so sorting is deterministic.
 */

import { getExtension } from '$lib/utils/filename-validation'
import { isDirectoryEntry } from './entry'
import type { FileEntryInit, SortConfig } from './types'

function compareStrings(a: string, b: string): number {
    if (a < b) return -1
    if (a > b) return 1
    return 0
}

function compareColumn(a: FileEntryInit, b: FileEntryInit, sort: SortConfig): number {
    switch (sort.sortBy) {
        case 'name':
            return compareStrings(a.name.toLowerCase(), b.name.toLowerCase())
        case 'extension':
            return compareStrings(getExtension(a.name).toLowerCase(), getExtension(b.name).toLowerCase())
        case 'size':
            // Unknown sizes (directories) sort as zero
            return (a.size ?? 0) - (b.size ?? 0)
        case 'modified':
            return a.modifiedAt - b.modifiedAt
    }
}

export function compareEntries(a: FileEntryInit, b: FileEntryInit, sort: SortConfig): number {
    if (sort.directoriesFirst) {
        const aDir = isDirectoryEntry(a)
        const bDir = isDirectoryEntry(b)
        if (aDir !== bDir) return aDir ? -1 : 1
    }

    const column = compareColumn(a, b, sort)
    if (column !== 0) return sort.sortOrder === 'ascending' ? column : -column

    const byName = compareStrings(a.name.toLowerCase(), b.name.toLowerCase())
    if (byName !== 0) return byName
    return compareStrings(a.path, b.path)
}

/** Returns a sorted copy. */
export function sortEntries<T extends FileEntryInit>(entries: readonly T[], sort: SortConfig): T[] {
    return [...entries].sort((a, b) => compareEntries(a, b, sort))
}

/** Index at which `entry` must be inserted into the sorted `entries` (binary search). */
export function findInsertIndex(entries: readonly FileEntryInit[], entry: FileEntryInit, sort: SortConfig): number {
    let low = 0
    let high = entries.length
    while (low < high) {
        const mid = (low + high) >>> 1
        if (compareEntries(entries[mid], entry, sort) < 0) {
            low = mid + 1
        } else {
            high = mid
        }
    }
    return low
}

/** True if `entries` is ordered per `sort` and unique by path. */
export function isSortedAndUnique(entries: readonly FileEntryInit[], sort: SortConfig): boolean {
    const seen = new Set<string>()
    for (let i = 0; i < entries.length; i++) {
        if (seen.has(entries[i].path)) return false
        seen.add(entries[i].path)
        if (i > 0 && compareEntries(entries[i - 1], entries[i], sort) > 0) return false
    }
    return true
}
