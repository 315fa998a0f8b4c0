// Path-keyed selection. A selection can hold paths the latest snapshot doesn't list yet;
// reconciliation against a new snapshot drops those that are gone.

import type { DirectorySnapshot, SelectionMode } from '../types'

/** Returns the new selection. The input set is never mutated. */
export function applySelection(current: ReadonlySet<string>, paths: readonly string[], mode: SelectionMode): Set<string> {
    switch (mode) {
        case 'replace':
            return new Set(paths)
        case 'add':
            return new Set([...current, ...paths])
        case 'remove': {
            const next = new Set(current)
            for (const p of paths) next.delete(p)
            return next
        }
        case 'toggle': {
            const next = new Set(current)
            for (const p of paths) {
                if (next.has(p)) next.delete(p)
                else next.add(p)
            }
            return next
        }
    }
}

/** Keeps only paths the snapshot lists. */
export function reconcileSelection(selection: ReadonlySet<string>, snapshot: DirectorySnapshot): Set<string> {
    if (selection.size === 0) return new Set()
    const present = new Set(snapshot.entries.map((e) => e.path))
    return new Set([...selection].filter((p) => present.has(p)))
}

/** Selection as a list: snapshot order first, then paths the snapshot doesn't list, sorted. */
export function orderSelection(selection: ReadonlySet<string>, snapshot: DirectorySnapshot): string[] {
    if (selection.size === 0) return []
    const ordered: string[] = []
    const seen = new Set<string>()
    for (const entry of snapshot.entries) {
        if (selection.has(entry.path)) {
            ordered.push(entry.path)
            seen.add(entry.path)
        }
    }
    const rest = [...selection].filter((p) => !seen.has(p)).sort()
    return [...ordered, ...rest]
}

export function sameSelection(a: ReadonlySet<string>, b: ReadonlySet<string>): boolean {
    if (a.size !== b.size) return false
    for (const p of a) if (!b.has(p)) return false
    return true
}
