// Recently left directory snapshots of one pane, for instant back/forward

import type { DirectorySnapshot } from '../types'

export interface SnapshotCacheOptions {
    /** Max snapshots kept; least recently stored are evicted first */
    capacity: () => number
    /** Max age (ms since the listing was taken) at which a snapshot may still be reused */
    ttlMs: () => number
    now?: () => number
}

export function createSnapshotCache(options: SnapshotCacheOptions) {
    const now = options.now ?? Date.now
    const byPath = new Map<string, DirectorySnapshot>()

    function evictOverflow() {
        const capacity = Math.max(0, options.capacity())
        while (byPath.size > capacity) {
            const oldest = byPath.keys().next()
            if (oldest.done) break
            byPath.delete(oldest.value)
        }
    }

    return {
        /** Stores a snapshot the pane is leaving. Invalid snapshots aren't worth keeping. */
        store(snapshot: DirectorySnapshot): void {
            byPath.delete(snapshot.path)
            if (!snapshot.valid) return
            byPath.set(snapshot.path, snapshot)
            evictOverflow()
        },

        /** A snapshot for `path` that is valid and younger than the TTL, if any. */
        take(path: string): DirectorySnapshot | undefined {
            const cached = byPath.get(path)
            if (!cached) return undefined
            byPath.delete(path)
            if (!cached.valid || now() - cached.createdAt >= options.ttlMs()) return undefined
            return cached
        },

        paths(): string[] {
            return [...byPath.keys()]
        },

        clear(): void {
            byPath.clear()
        },
    }
}

export type SnapshotCache = ReturnType<typeof createSnapshotCache>
