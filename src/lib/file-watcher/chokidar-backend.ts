// Watcher backend on chokidar. Each watched directory is followed one level deep.

import { watch, type FSWatcher } from 'chokidar'
import type { UnlistenFn } from '$lib/events/event-channel'
import type { WatcherEventKind } from '$lib/file-explorer/types'
import type { RawChange, WatcherBackend } from './types'

const CHOKIDAR_EVENTS: ReadonlyArray<[string, WatcherEventKind]> = [
    ['add', 'created'],
    ['addDir', 'created'],
    ['change', 'modified'],
    ['unlink', 'removed'],
    ['unlinkDir', 'removed'],
]

export function createChokidarBackend(): WatcherBackend {
    const changeHandlers = new Set<(change: RawChange) => void>()
    const errorHandlers = new Set<(error: unknown) => void>()
    let watcher: FSWatcher | null = null

    function ensureWatcher(): FSWatcher {
        if (watcher) return watcher
        const created = watch([], {
            ignoreInitial: true,
            depth: 0,
            persistent: true,
        })
        for (const [chokidarEvent, kind] of CHOKIDAR_EVENTS) {
            created.on(chokidarEvent, (changedPath: string) => {
                for (const handler of changeHandlers) handler({ kind, path: changedPath })
            })
        }
        created.on('error', (error: unknown) => {
            for (const handler of errorHandlers) handler(error)
        })
        watcher = created
        return created
    }

    function subscribe<T>(set: Set<T>, handler: T): UnlistenFn {
        set.add(handler)
        return () => {
            set.delete(handler)
        }
    }

    return {
        add(directory) {
            ensureWatcher().add(directory)
        },
        remove(directory) {
            watcher?.unwatch(directory)
        },
        onChange: (handler) => subscribe(changeHandlers, handler),
        onError: (handler) => subscribe(errorHandlers, handler),
        async close() {
            const current = watcher
            watcher = null
            changeHandlers.clear()
            errorHandlers.clear()
            if (current) await current.close()
        },
    }
}
