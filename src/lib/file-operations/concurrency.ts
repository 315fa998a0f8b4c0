/**
 * Concurrency primitives for the scheduler.
 *
 * - `createLimiter`: at most `capacity()` tasks run at once; the rest wait in FIFO order.
 *   Capacity is read on every release, so a settings change applies to the next task.
 * - `createKeyedLock`: one holder per key; waiters are served in acquisition order.
 */

export interface Limiter {
    run<T>(task: () => Promise<T>): Promise<T>
    readonly active: number
    readonly waiting: number
}

export function createLimiter(capacity: () => number): Limiter {
    let active = 0
    const queue: Array<() => void> = []

    function pump() {
        while (queue.length > 0 && active < Math.max(1, capacity())) {
            const start = queue.shift()
            if (!start) return
            active++
            start()
        }
    }

    return {
        run<T>(task: () => Promise<T>): Promise<T> {
            return new Promise<T>((resolve, reject) => {
                queue.push(() => {
                    void task()
                        .then(resolve, reject)
                        .finally(() => {
                            active--
                            pump()
                        })
                })
                pump()
            })
        },
        get active() {
            return active
        },
        get waiting() {
            return queue.length
        },
    }
}

export type Release = () => void

export interface KeyedLock {
    /** Resolves once the caller holds `key`. Call the returned function exactly once to release. */
    acquire(key: string): Promise<Release>
    isLocked(key: string): boolean
}

export function createKeyedLock(): KeyedLock {
    const tails = new Map<string, Promise<void>>()

    return {
        async acquire(key) {
            const previous = tails.get(key) ?? Promise.resolve()
            let release: Release = () => undefined
            const held = new Promise<void>((resolve) => {
                release = resolve
            })
            const tail = previous.then(() => held)
            tails.set(key, tail)

            await previous

            let released = false
            return () => {
                if (released) return
                released = true
                release()
                if (tails.get(key) === tail) tails.delete(key)
            }
        },
        isLocked(key) {
            return tails.has(key)
        },
    }
}
