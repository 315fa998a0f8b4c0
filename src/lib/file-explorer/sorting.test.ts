import { describe, expect, it } from 'vitest'
import { createSnapshot, findEntry, resortSnapshot } from './snapshot'
import { findInsertIndex, isSortedAndUnique, sortEntries } from './sorting'
import { createFileEntry } from './test-helpers'
import { DEFAULT_SORT, type SortConfig } from './types'

const entries = [
    createFileEntry({ name: 'beta.md', path: '/p/beta.md', isDirectory: false, size: 300, modifiedAt: 3 }),
    createFileEntry({ name: 'Alpha.txt', path: '/p/Alpha.txt', isDirectory: false, size: 100, modifiedAt: 2 }),
    createFileEntry({ name: 'zeta', path: '/p/zeta', isDirectory: true, modifiedAt: 1 }),
    createFileEntry({ name: 'gamma.txt', path: '/p/gamma.txt', isDirectory: false, size: 200, modifiedAt: 4 }),
]

function namesBy(sort: SortConfig): string[] {
    return sortEntries(entries, sort).map((e) => e.name)
}

describe('sortEntries', () => {
    it('sorts by name case-insensitively with directories first', () => {
        expect(namesBy(DEFAULT_SORT)).toEqual(['zeta', 'Alpha.txt', 'beta.md', 'gamma.txt'])
    })

    it('mixes directories in when directoriesFirst is off', () => {
        expect(namesBy({ ...DEFAULT_SORT, directoriesFirst: false })).toEqual([
            'Alpha.txt',
            'beta.md',
            'gamma.txt',
            'zeta',
        ])
    })

    it('sorts by size and falls back to the name on ties', () => {
        expect(namesBy({ sortBy: 'size', sortOrder: 'descending', directoriesFirst: false })).toEqual([
            'beta.md',
            'gamma.txt',
            'Alpha.txt',
            'zeta',
        ])
    })

    it('sorts by extension, then by name', () => {
        expect(namesBy({ sortBy: 'extension', sortOrder: 'ascending', directoriesFirst: true })).toEqual([
            'zeta',
            'beta.md',
            'Alpha.txt',
            'gamma.txt',
        ])
    })

    it('sorts by modification time', () => {
        expect(namesBy({ sortBy: 'modified', sortOrder: 'ascending', directoriesFirst: false })).toEqual([
            'zeta',
            'Alpha.txt',
            'beta.md',
            'gamma.txt',
        ])
    })
})

describe('findInsertIndex', () => {
    it('finds the slot that keeps the list sorted', () => {
        const sorted = sortEntries(entries, DEFAULT_SORT)
        const delta = createFileEntry({ name: 'delta.txt', path: '/p/delta.txt', isDirectory: false })
        expect(findInsertIndex(sorted, delta, DEFAULT_SORT)).toBe(3)
    })
})

describe('isSortedAndUnique', () => {
    it('rejects duplicates and disorder', () => {
        const sorted = sortEntries(entries, DEFAULT_SORT)
        expect(isSortedAndUnique(sorted, DEFAULT_SORT)).toBe(true)
        expect(isSortedAndUnique([...sorted].reverse(), DEFAULT_SORT)).toBe(false)
        expect(isSortedAndUnique([sorted[0], sorted[0]], DEFAULT_SORT)).toBe(false)
    })
})

describe('snapshots', () => {
    it('dedupes by path (last wins), sorts and stamps the version', () => {
        const replacement = createFileEntry({ name: 'beta.md', path: '/p/beta.md', isDirectory: false, size: 1 })
        const snapshot = createSnapshot([...entries, replacement], { path: '/p', version: 7, sort: DEFAULT_SORT, baseline: 0 })

        expect(snapshot.entries.map((e) => e.name)).toEqual(['zeta', 'Alpha.txt', 'beta.md', 'gamma.txt'])
        expect(findEntry(snapshot, '/p/beta.md')?.size).toBe(1)
        expect(snapshot.entries.every((e) => e.generation === 7)).toBe(true)
        expect(Object.isFrozen(snapshot.entries[0])).toBe(true)
        expect(snapshot.valid).toBe(true)
    })

    it('re-sorts without touching entry generations', () => {
        const snapshot = createSnapshot(entries, { path: '/p', version: 2, sort: DEFAULT_SORT, baseline: 0 })
        const resorted = resortSnapshot(snapshot, { ...DEFAULT_SORT, sortOrder: 'descending' }, 3)

        expect(resorted.version).toBe(3)
        expect(resorted.entries.map((e) => e.name)).toEqual(['zeta', 'gamma.txt', 'beta.md', 'Alpha.txt'])
        expect(resorted.entries.every((e) => e.generation === 2)).toBe(true)
    })
})
