// Test helpers: entries with sensible defaults, temp directory trees, and an in-process watcher backend

import { mkdtemp, mkdir, rm, writeFile } from 'fs/promises'
import { tmpdir } from 'os'
import path from 'path'
import type { UnlistenFn } from '$lib/events/event-channel'
import type { RawChange, WatcherBackend } from '$lib/file-watcher/types'
import type { EntryKind, FileEntryInit } from './types'

/**
 * Creates a FileEntryInit with all required fields, using sensible defaults.
 * Only name, path and isDirectory are required.
 */
export function createFileEntry(partial: {
    name: string
    path: string
    isDirectory: boolean
    size?: number
    modifiedAt?: number
    permissions?: number
    kind?: EntryKind
}): FileEntryInit {
    const isDir = partial.isDirectory
    return {
        name: partial.name,
        path: partial.path,
        kind: partial.kind ?? (isDir ? { type: 'directory' } : { type: 'file' }),
        size: isDir ? undefined : (partial.size ?? 0),
        modifiedAt: partial.modifiedAt ?? 1_700_000_000_000,
        permissions: partial.permissions ?? (isDir ? 0o755 : 0o644),
    }
}

/** A tree description: file contents as strings, nested objects as directories. */
export interface TreeSpec {
    [name: string]: string | TreeSpec
}

/** Writes `tree` under `root`. */
export async function writeTree(root: string, tree: TreeSpec): Promise<void> {
    await mkdir(root, { recursive: true })
    for (const [name, value] of Object.entries(tree)) {
        const target = path.join(root, name)
        if (typeof value === 'string') {
            await writeFile(target, value)
        } else {
            await writeTree(target, value)
        }
    }
}

/** Creates a fresh temp directory and returns it with a cleanup function. */
export async function createTempDir(prefix = 'pane-engine-'): Promise<{ dir: string; cleanup: () => Promise<void> }> {
    const dir = await mkdtemp(path.join(tmpdir(), prefix))
    return {
        dir,
        cleanup: () => rm(dir, { recursive: true, force: true }),
    }
}

/** Watcher backend driven by the test: `emit` pushes a raw change to the adapter. */
export interface FakeWatcherBackend extends WatcherBackend {
    emit(change: RawChange): void
    emitError(error: unknown): void
    watched: Set<string>
    addCalls: string[]
    removeCalls: string[]
    closed: boolean
}

export function createFakeWatcherBackend(): FakeWatcherBackend {
    const changeHandlers = new Set<(change: RawChange) => void>()
    const errorHandlers = new Set<(error: unknown) => void>()

    function subscribe<T>(set: Set<T>, handler: T): UnlistenFn {
        set.add(handler)
        return () => {
            set.delete(handler)
        }
    }

    const backend: FakeWatcherBackend = {
        watched: new Set(),
        addCalls: [],
        removeCalls: [],
        closed: false,
        add(directory) {
            backend.watched.add(directory)
            backend.addCalls.push(directory)
        },
        remove(directory) {
            backend.watched.delete(directory)
            backend.removeCalls.push(directory)
        },
        onChange: (handler) => subscribe(changeHandlers, handler),
        onError: (handler) => subscribe(errorHandlers, handler),
        close() {
            backend.closed = true
            return Promise.resolve()
        },
        emit(change) {
            for (const handler of changeHandlers) handler(change)
        },
        emitError(error) {
            for (const handler of errorHandlers) handler(error)
        },
    }
    return backend
}
