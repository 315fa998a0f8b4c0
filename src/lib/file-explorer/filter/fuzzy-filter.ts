/**
 * Fuzzy filtering of pane entries by display name.
 *
 * Matching is subsequence-based: every query character must appear in the name, in order, not
 * necessarily contiguously. Because of that, extending a query can only shrink the result set,
 * which the incremental filter uses to re-score just the previous matches on each keystroke.
 *
 * Names are folded once per snapshot into a flat index (diacritics via uFuzzy's latinize, then
 * lower-cased), so a keystroke never walks the richer entry objects. Names and queries fold the
 * same way, one character at a time, so the fold of a longer query always extends the fold of
 * the shorter one.
 */

import uFuzzy from '@leeoniya/ufuzzy'
import type { FileEntry, FilterMatch } from '../types'

const SCORE_MATCH = 16
const BONUS_CONSECUTIVE = 8
const BONUS_BOUNDARY = 10
const BONUS_FIRST_CHAR = 6
const PENALTY_GAP_START = 3
const PENALTY_GAP_EXTENSION = 1

/** Score given to every entry when the query is empty */
export const UNIFORM_SCORE = 0

const BOUNDARY_CHARS = new Set([' ', '-', '_', '.', '/', '(', '[', '+'])

export interface FilterOptions {
    caseSensitive?: boolean
}

/** Flat, pre-extracted view of a snapshot's names. */
export interface FilterIndex {
    paths: string[]
    names: string[]
    /** Latinized names, case preserved (same length as `names` when folding is 1:1) */
    latinized: string[]
    /** Latinized and lower-cased names */
    folded: string[]
}

const indexCache = new WeakMap<readonly FileEntry[], FilterIndex>()

function foldSameLength(original: string, candidate: string): string {
    // Highlight indices must line up with the displayed name
    return candidate.length === original.length ? candidate : original
}

/** No context-sensitive lowering (a final sigma stays σ); a character whose lower case changes length is kept. */
function foldCase(text: string): string {
    let folded = ''
    for (const ch of text) {
        const lower = ch.toLowerCase()
        folded += lower.length === ch.length ? lower : ch
    }
    return folded
}

export function buildFilterIndex(entries: readonly FileEntry[]): FilterIndex {
    const paths = entries.map((e) => e.path)
    const names = entries.map((e) => e.name)
    const latinized = uFuzzy.latinize(names).map((l, i) => foldSameLength(names[i], l))
    const folded = latinized.map(foldCase)
    return { paths, names, latinized, folded }
}

/** Index for an entry list, built once and reused for as long as the list object lives. */
export function getFilterIndex(entries: readonly FileEntry[]): FilterIndex {
    let index = indexCache.get(entries)
    if (!index) {
        index = buildFilterIndex(entries)
        indexCache.set(entries, index)
    }
    return index
}

export function foldQuery(query: string, options?: FilterOptions): string {
    const latin = uFuzzy.latinize(query)
    return options?.caseSensitive ? latin : foldCase(latin)
}

function isBoundary(name: string, i: number): boolean {
    if (i === 0) return true
    const prev = name[i - 1]
    if (BOUNDARY_CHARS.has(prev)) return true
    // camelCase and digit runs
    const cur = name[i]
    if (prev === prev.toLowerCase() && prev !== prev.toUpperCase() && cur !== cur.toLowerCase()) return true
    const prevIsDigit = prev >= '0' && prev <= '9'
    const curIsDigit = cur >= '0' && cur <= '9'
    return prevIsDigit !== curIsDigit && curIsDigit
}

export interface ScoredName {
    score: number
    indices: number[]
}

/**
 * Scores `query` against one name, or returns null if it isn't a subsequence.
 * Finds the leftmost match, then narrows it to the shortest window ending at the same position
 * (scanning backwards), and scores the greedy match inside that window.
 *
 * @param haystack - The folded name the query is matched against
 * @param display - The name as shown, for boundary detection
 */
export function scoreName(haystack: string, display: string, query: string): ScoredName | null {
    if (query.length === 0) return { score: UNIFORM_SCORE, indices: [] }
    if (query.length > haystack.length) return null

    // Forward pass: leftmost subsequence end
    let qi = 0
    let end = -1
    for (let i = 0; i < haystack.length; i++) {
        if (haystack[i] === query[qi]) {
            qi++
            if (qi === query.length) {
                end = i
                break
            }
        }
    }
    if (end < 0) return null

    // Backward pass: latest start that still matches everything up to `end`
    qi = query.length - 1
    let start = end
    for (let i = end; i >= 0; i--) {
        if (haystack[i] === query[qi]) {
            qi--
            if (qi < 0) {
                start = i
                break
            }
        }
    }

    const indices: number[] = []
    qi = 0
    for (let i = start; i <= end && qi < query.length; i++) {
        if (haystack[i] === query[qi]) {
            indices.push(i)
            qi++
        }
    }

    let score = 0
    for (let k = 0; k < indices.length; k++) {
        const i = indices[k]
        score += SCORE_MATCH
        if (isBoundary(display, i)) score += BONUS_BOUNDARY
        if (i === 0) score += BONUS_FIRST_CHAR
        if (k > 0) {
            const gap = i - indices[k - 1] - 1
            if (gap === 0) {
                score += BONUS_CONSECUTIVE
            } else {
                score -= PENALTY_GAP_START + PENALTY_GAP_EXTENSION * (gap - 1)
            }
        }
    }
    // Shorter names win among otherwise equal matches
    score -= display.length

    return { score, indices }
}

function compareMatches(a: FilterMatch, b: FilterMatch): number {
    if (a.score !== b.score) return b.score - a.score
    if (a.path < b.path) return -1
    if (a.path > b.path) return 1
    return 0
}

interface IndexedMatch extends FilterMatch {
    position: number
}

function runFilter(
    index: FilterIndex,
    query: string,
    options: FilterOptions | undefined,
    candidates: readonly number[] | null,
): IndexedMatch[] {
    if (query.length === 0) {
        return index.paths.map((path, position) => ({ path, position, score: UNIFORM_SCORE, matchedIndices: [] }))
    }

    const needle = foldQuery(query, options)
    const haystacks = options?.caseSensitive ? index.latinized : index.folded
    const matches: IndexedMatch[] = []
    const visit = (position: number) => {
        const scored = scoreName(haystacks[position], index.names[position], needle)
        if (scored) {
            matches.push({
                path: index.paths[position],
                position,
                score: scored.score,
                matchedIndices: scored.indices,
            })
        }
    }

    if (candidates) {
        for (const position of candidates) visit(position)
    } else {
        for (let position = 0; position < haystacks.length; position++) visit(position)
    }

    return matches.sort(compareMatches)
}

function stripPosition(match: IndexedMatch): FilterMatch {
    return { path: match.path, score: match.score, matchedIndices: match.matchedIndices }
}

/**
 * Filters entries by query. Pure and deterministic: best score first, ties by path.
 * An empty query returns every entry in its original order with a uniform score.
 */
export function filterEntries(entries: readonly FileEntry[], query: string, options?: FilterOptions): FilterMatch[] {
    return runFilter(getFilterIndex(entries), query, options, null).map(stripPosition)
}

/**
 * Keystroke-friendly filter. When a query extends the previous one against the same entry list,
 * only the previous matches are re-scored.
 */
export function createIncrementalFilter() {
    let lastEntries: readonly FileEntry[] | null = null
    let lastQuery = ''
    let lastCaseSensitive = false
    let lastPositions: number[] | null = null

    function run(entries: readonly FileEntry[], query: string, options?: FilterOptions): FilterMatch[] {
        const caseSensitive = options?.caseSensitive ?? false
        const canNarrow =
            lastEntries === entries &&
            lastPositions !== null &&
            lastCaseSensitive === caseSensitive &&
            lastQuery.length > 0 &&
            query.startsWith(lastQuery)

        const matches = runFilter(getFilterIndex(entries), query, options, canNarrow ? lastPositions : null)

        lastEntries = entries
        lastQuery = query
        lastCaseSensitive = caseSensitive
        lastPositions = query.length === 0 ? null : matches.map((m) => m.position)

        return matches.map(stripPosition)
    }

    function reset() {
        lastEntries = null
        lastQuery = ''
        lastPositions = null
    }

    return { run, reset }
}

export type IncrementalFilter = ReturnType<typeof createIncrementalFilter>
