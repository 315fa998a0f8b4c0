/**
 * Strictly increasing millisecond clock shared by the watcher adapter and the
 * directory state manager. Two stamps taken by the same clock never compare equal,
 * so "drop if older or equal" reconciliation can't lose a genuine later event.
 */
export interface MonotonicClock {
    now(): number
}

export function createMonotonicClock(source: () => number = Date.now): MonotonicClock {
    let last = 0
    return {
        now() {
            const t = source()
            last = t > last ? t : last + 1
            return last
        },
    }
}
