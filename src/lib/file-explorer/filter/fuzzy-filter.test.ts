import { describe, expect, it } from 'vitest'
import { stampEntry } from '../entry'
import { createFileEntry } from '../test-helpers'
import type { FileEntry } from '../types'
import { createIncrementalFilter, filterEntries, getFilterIndex, scoreName, UNIFORM_SCORE } from './fuzzy-filter'

function entries(...names: string[]): FileEntry[] {
    return names.map((name) => stampEntry(createFileEntry({ name, path: `/d/${name}`, isDirectory: false }), 1))
}

describe('scoreName', () => {
    it('returns null when the query is not a subsequence', () => {
        expect(scoreName('readme.md', 'readme.md', 'rz')).toBeNull()
        expect(scoreName('ab', 'ab', 'abc')).toBeNull()
    })

    it('reports the matched indices of the tightest window', () => {
        // Leftmost match ends at the second "b"; the window then tightens to "ab" at 3..4
        expect(scoreName('a_xab', 'a_xab', 'ab')?.indices).toEqual([3, 4])
    })

    it('scores a contiguous run above a scattered match of the same length', () => {
        const contiguous = scoreName('xabcx', 'xabcx', 'abc')
        const scattered = scoreName('xaxbc', 'xaxbc', 'abc')
        expect(contiguous?.score).toBeGreaterThan(scattered?.score ?? Infinity)
    })

    it('rewards word boundaries', () => {
        const boundary = scoreName('my_report', 'my_report', 'r')
        const inner = scoreName('myxreport', 'myxreport', 'r')
        expect(boundary?.score).toBeGreaterThan(inner?.score ?? Infinity)
    })

    it('treats camelCase humps as boundaries', () => {
        const hump = scoreName('fooreport', 'fooReport', 'r')
        const flat = scoreName('fooreport', 'fooreport', 'r')
        expect(hump?.score).toBeGreaterThan(flat?.score ?? Infinity)
    })

    it('prefers shorter names for otherwise identical matches', () => {
        const short = scoreName('notes', 'notes', 'no')
        const long = scoreName('notesxxxx', 'notesxxxx', 'no')
        expect(short?.score).toBe((long?.score ?? 0) + 4)
    })
})

describe('filterEntries', () => {
    const list = entries('Makefile', 'main.ts', 'readme.md', 'mail.txt', 'Résumé.pdf')

    it('returns every entry in snapshot order with a uniform score for an empty query', () => {
        const result = filterEntries(list, '')
        expect(result.map((m) => m.path)).toEqual(list.map((e) => e.path))
        expect(new Set(result.map((m) => m.score))).toEqual(new Set([UNIFORM_SCORE]))
        expect(result.every((m) => m.matchedIndices.length === 0)).toBe(true)
    })

    it('matches case-insensitively by default', () => {
        const result = filterEntries(list, 'MAKE')
        expect(result.map((m) => m.path)).toEqual(['/d/Makefile'])
        expect(result[0].matchedIndices).toEqual([0, 1, 2, 3])
    })

    it('respects case when asked', () => {
        expect(filterEntries(list, 'make', { caseSensitive: true })).toEqual([])
        expect(filterEntries(list, 'Make', { caseSensitive: true }).map((m) => m.path)).toEqual(['/d/Makefile'])
    })

    it('folds diacritics on both sides', () => {
        expect(filterEntries(list, 'resume').map((m) => m.path)).toEqual(['/d/Résumé.pdf'])
        expect(filterEntries(list, 'résumé').map((m) => m.path)).toEqual(['/d/Résumé.pdf'])
    })

    it('orders by score, best first', () => {
        // Contiguous prefix runs beat the gapped match in Makefile; main.ts wins on length
        const result = filterEntries(list, 'mai')
        expect(result.map((m) => m.path)).toEqual(['/d/main.ts', '/d/mail.txt', '/d/Makefile'])
        expect(result.map((m) => m.score)).toEqual([73, 72, 59])
    })

    it('breaks ties by path', () => {
        const twins = entries('b-x', 'a-x')
        const result = filterEntries(twins, 'x')
        expect(result[0].score).toBe(result[1].score)
        expect(result.map((m) => m.path)).toEqual(['/d/a-x', '/d/b-x'])
    })

    it('is idempotent', () => {
        expect(filterEntries(list, 'ma')).toEqual(filterEntries(list, 'ma'))
    })

    it('never grows the result when the query is extended', () => {
        const queries = ['m', 'ma', 'mai', 'main', 'main.', 'main.t', 'main.ts']
        let previous = new Set(list.map((e) => e.path))
        for (const q of queries) {
            const current = new Set(filterEntries(list, q).map((m) => m.path))
            for (const p of current) expect(previous.has(p)).toBe(true)
            previous = current
        }
        expect([...previous]).toEqual(['/d/main.ts'])
    })

    it('lower-cases a query the same way whatever follows it', () => {
        // On its own "ΑΣ" lowers to "ας" (final sigma); each character folds alone instead
        const greek = entries('ΑΣΑ')
        expect(filterEntries(greek, 'ΑΣ').map((m) => m.path)).toEqual(['/d/ΑΣΑ'])
        expect(filterEntries(greek, 'ΑΣΑ').map((m) => m.path)).toEqual(['/d/ΑΣΑ'])
        expect(filterEntries(greek, 'ας')).toEqual([])
        expect(filterEntries(greek, 'ΑΣ')[0].matchedIndices).toEqual([0, 1])
    })

    it('caches the name index per entry list', () => {
        expect(getFilterIndex(list)).toBe(getFilterIndex(list))
        expect(getFilterIndex([...list])).not.toBe(getFilterIndex(list))
    })
})

describe('createIncrementalFilter', () => {
    const list = entries('alpha.ts', 'alphabet.md', 'beta.ts', 'gamma.ts')

    it('gives the same result as a full filter while narrowing', () => {
        const filter = createIncrementalFilter()
        for (const q of ['a', 'al', 'alp', 'alph', 'alpha.']) {
            expect(filter.run(list, q)).toEqual(filterEntries(list, q))
        }
    })

    it('rescans when the query no longer extends the previous one', () => {
        const filter = createIncrementalFilter()
        filter.run(list, 'alpha')
        expect(filter.run(list, 'beta').map((m) => m.path)).toEqual(['/d/beta.ts'])
        expect(filter.run(list, '').map((m) => m.path)).toEqual(list.map((e) => e.path))
    })

    it('keeps narrowing correct across context-sensitive lower-casing', () => {
        const filter = createIncrementalFilter()
        const greek = entries('ΑΣΑ', 'ΒΗΤΑ')
        expect(filter.run(greek, 'Α').map((m) => m.path)).toEqual(['/d/ΑΣΑ', '/d/ΒΗΤΑ'])
        expect(filter.run(greek, 'ΑΣ').map((m) => m.path)).toEqual(['/d/ΑΣΑ'])
        expect(filter.run(greek, 'ΑΣΑ').map((m) => m.path)).toEqual(['/d/ΑΣΑ'])
    })

    it('rescans when the entry list changes', () => {
        const filter = createIncrementalFilter()
        filter.run(list, 'g')
        const next = entries('gamma.ts', 'gz.txt')
        expect(filter.run(next, 'gz').map((m) => m.path)).toEqual(['/d/gz.txt'])
    })
})
