/**
 * Back/forward history for one pane.
 * `entries[index]` is always the current path. Histories are immutable values.
 */

export interface NavigationHistory {
    readonly entries: readonly string[]
    readonly index: number
}

export const DEFAULT_MAX_HISTORY = 100

export function createHistory(path: string): NavigationHistory {
    return { entries: [path], index: 0 }
}

export function getCurrentPath(history: NavigationHistory): string {
    return history.entries[history.index]
}

/**
 * Records a navigation: drops any forward entries, appends `path`, and evicts the oldest entries
 * beyond `maxEntries`. Navigating to the current path is a no-op.
 */
export function push(history: NavigationHistory, path: string, maxEntries: number = DEFAULT_MAX_HISTORY): NavigationHistory {
    if (getCurrentPath(history) === path) {
        return history
    }
    const kept = [...history.entries.slice(0, history.index + 1), path]
    const overflow = Math.max(0, kept.length - Math.max(1, maxEntries))
    const entries = overflow > 0 ? kept.slice(overflow) : kept
    return { entries, index: entries.length - 1 }
}

export function canGoBack(history: NavigationHistory): boolean {
    return history.index > 0
}

export function canGoForward(history: NavigationHistory): boolean {
    return history.index < history.entries.length - 1
}

/** Moves one step back. Returns the same history when already at the oldest entry. */
export function back(history: NavigationHistory): NavigationHistory {
    if (!canGoBack(history)) return history
    return { entries: history.entries, index: history.index - 1 }
}

/** Moves one step forward. Returns the same history when already at the newest entry. */
export function forward(history: NavigationHistory): NavigationHistory {
    if (!canGoForward(history)) return history
    return { entries: history.entries, index: history.index + 1 }
}
