// Leading-edge throttle with a trailing call: the first call fires at once, and calls made inside
// the interval collapse into one that fires when the interval ends. Paces progress events.

export interface Throttle {
    call(): void
    /** Drops the pending trailing call. */
    cancel(): void
    /** Fires the pending trailing call now. No-op when nothing is pending. */
    flush(): void
}

export function createThrottle(fn: () => void, intervalMs: number): Throttle {
    let lastFiredAt = Number.NEGATIVE_INFINITY
    let trailing: ReturnType<typeof setTimeout> | undefined

    function fire(): void {
        lastFiredAt = Date.now()
        fn()
    }

    function clearTrailing(): boolean {
        if (trailing === undefined) return false
        clearTimeout(trailing)
        trailing = undefined
        return true
    }

    return {
        call() {
            const wait = lastFiredAt + intervalMs - Date.now()
            if (wait <= 0) {
                clearTrailing()
                fire()
                return
            }
            trailing ??= setTimeout(() => {
                trailing = undefined
                fire()
            }, wait)
        },
        cancel() {
            clearTrailing()
        },
        flush() {
            if (clearTrailing()) fire()
        },
    }
}
