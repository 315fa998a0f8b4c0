// Palette search over command names. Short phrases against short phrases, so typos and
// out-of-order words are allowed here, unlike the subsequence filter panes use.

import uFuzzy from '@leeoniya/ufuzzy'
import { getPaletteCommands } from './command-registry'
import type { CommandDescriptor } from './types'

export interface CommandMatch {
    command: CommandDescriptor
    /** Indices into `command.name`, for highlighting */
    matchedIndices: number[]
}

const fuzzy = new uFuzzy({
    intraMode: 1,
    interIns: 3,
})

/** uFuzzy ranges are flat [start, end) pairs. */
function expandRanges(ranges: readonly number[]): number[] {
    const indices: number[] = []
    for (let i = 0; i + 1 < ranges.length; i += 2) {
        for (let j = ranges[i]; j < ranges[i + 1]; j++) indices.push(j)
    }
    return indices
}

/** Best match first. An empty query lists every palette command in catalog order. */
export function searchCommands(query: string): CommandMatch[] {
    const commands = getPaletteCommands()
    if (query.trim() === '') {
        return commands.map((command) => ({ command, matchedIndices: [] }))
    }

    const [idxs, info, order] = fuzzy.search(
        commands.map((c) => c.name),
        query,
    )
    if (!idxs || !info || !order) return []

    return order.map((rank) => ({
        command: commands[info.idx[rank]],
        matchedIndices: expandRanges(info.ranges[rank]),
    }))
}
