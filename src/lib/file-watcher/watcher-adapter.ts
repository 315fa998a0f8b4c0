/**
 * Turns raw backend notifications into stamped, batched watcher events.
 *
 * - Every change is stamped with the shared monotonic clock when it's observed, so the
 *   directory state manager can order it against its own listings and local operations.
 * - Changes are delivered in batches after `debounceMs` of quiet (or immediately on `flush`).
 * - Rename halves are paired by cookie inside a batch. A half whose partner isn't in the same
 *   batch is delivered as a plain `removed` / `created`.
 * - Directories are reference-counted: two panes on the same directory share one backend watch.
 */

import type { UnlistenFn } from '$lib/events/event-channel'
import type { WatcherEvent } from '$lib/file-explorer/types'
import { getAppLogger } from '$lib/logger'
import type { MonotonicClock } from '$lib/utils/clock'
import type { RawChange, WatcherBackend } from './types'

const log = getAppLogger('watcher')

export const DEFAULT_WATCHER_DEBOUNCE_MS = 50

export interface WatcherAdapterOptions {
    backend: WatcherBackend
    clock: MonotonicClock
    debounceMs?: number
}

export interface WatcherAdapter {
    /** Starts (or shares) a watch on `directory`. Call the returned function to release it. */
    watch(directory: string): UnlistenFn
    onEvents(handler: (events: WatcherEvent[]) => void): UnlistenFn
    setDebounce(ms: number): void
    /** Delivers the pending batch now. */
    flush(): void
    watchedDirectories(): string[]
    close(): Promise<void>
}

/** Resolves rename pairs within one batch; unpaired halves degrade to removed/created. */
export function pairRenames(events: readonly WatcherEvent[]): WatcherEvent[] {
    const halves = new Map<string, { from: boolean; to: boolean }>()
    for (const event of events) {
        if (event.kind !== 'renamed_from' && event.kind !== 'renamed_to') continue
        const state = halves.get(event.cookie) ?? { from: false, to: false }
        if (event.kind === 'renamed_from') state.from = true
        else state.to = true
        halves.set(event.cookie, state)
    }

    return events.map((event): WatcherEvent => {
        if (event.kind !== 'renamed_from' && event.kind !== 'renamed_to') return event
        const state = halves.get(event.cookie)
        if (state?.from && state.to) return event
        return {
            kind: event.kind === 'renamed_from' ? 'removed' : 'created',
            path: event.path,
            timestamp: event.timestamp,
        }
    })
}

function stamp(change: RawChange, timestamp: number): WatcherEvent {
    if (change.kind === 'renamed_from' || change.kind === 'renamed_to') {
        if (change.cookie !== undefined) {
            return { kind: change.kind, path: change.path, timestamp, cookie: change.cookie }
        }
        // A rename half without a cookie can't be paired
        return { kind: change.kind === 'renamed_from' ? 'removed' : 'created', path: change.path, timestamp }
    }
    return { kind: change.kind, path: change.path, timestamp }
}

export function createWatcherAdapter(options: WatcherAdapterOptions): WatcherAdapter {
    const { backend, clock } = options
    let debounceMs = options.debounceMs ?? DEFAULT_WATCHER_DEBOUNCE_MS
    const refCounts = new Map<string, number>()
    const handlers = new Set<(events: WatcherEvent[]) => void>()
    let pending: WatcherEvent[] = []
    let timer: ReturnType<typeof setTimeout> | null = null
    let closed = false

    function deliver() {
        if (timer !== null) {
            clearTimeout(timer)
            timer = null
        }
        if (pending.length === 0) return
        const batch = pairRenames(pending)
        pending = []
        log.debug('Delivering {count} watcher events', { count: batch.length })
        for (const handler of handlers) {
            try {
                handler(batch)
            } catch (error) {
                log.error('Watcher event handler threw: {error}', { error })
            }
        }
    }

    const unlistenChange = backend.onChange((change) => {
        if (closed) return
        pending.push(stamp(change, clock.now()))
        if (timer === null) {
            timer = setTimeout(deliver, debounceMs)
        }
    })

    const unlistenError = backend.onError((error) => {
        log.warn('Watcher backend error: {error}', { error })
    })

    return {
        watch(directory) {
            const count = refCounts.get(directory) ?? 0
            refCounts.set(directory, count + 1)
            if (count === 0) {
                log.debug('Watching {path}', { path: directory })
                backend.add(directory)
            }

            let released = false
            return () => {
                if (released) return
                released = true
                const current = refCounts.get(directory) ?? 0
                if (current <= 1) {
                    refCounts.delete(directory)
                    if (!closed) {
                        log.debug('Stopped watching {path}', { path: directory })
                        backend.remove(directory)
                    }
                } else {
                    refCounts.set(directory, current - 1)
                }
            }
        },

        onEvents(handler) {
            handlers.add(handler)
            return () => {
                handlers.delete(handler)
            }
        },

        setDebounce(ms) {
            debounceMs = Math.max(0, ms)
        },

        flush: deliver,

        watchedDirectories() {
            return [...refCounts.keys()]
        },

        async close() {
            if (closed) return
            closed = true
            if (timer !== null) {
                clearTimeout(timer)
                timer = null
            }
            pending = []
            unlistenChange()
            unlistenError()
            handlers.clear()
            refCounts.clear()
            await backend.close()
        },
    }
}
