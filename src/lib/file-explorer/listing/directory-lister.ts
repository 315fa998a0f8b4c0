// Directory listing on the local filesystem, or through a directory-like provider that claims the path

import { lstat, readdir } from 'fs/promises'
import path from 'path'
import { toFileEngineError } from '$lib/errors'
import { getAppLogger } from '$lib/logger'
import { entryFromStats } from '../entry'
import { isHiddenName } from '../paths'
import type { DirectoryLikeProvider, FileEntryInit } from '../types'

const log = getAppLogger('listing')

/** How many lstat calls a single listing keeps in flight */
const STAT_BATCH_SIZE = 64

export interface ListOptions {
    showHidden: boolean
    providers?: readonly DirectoryLikeProvider[]
}

export function findProvider(
    target: string,
    providers: readonly DirectoryLikeProvider[] | undefined,
): DirectoryLikeProvider | undefined {
    return providers?.find((p) => p.canList(target))
}

/**
 * Lists the direct children of `directory`.
 * Children that disappear between readdir and lstat are skipped; the listing itself fails with
 * a `FileEngineError` (`not_found`, `permission_denied`, `io_error`).
 */
export async function listDirectory(directory: string, options: ListOptions): Promise<FileEntryInit[]> {
    const provider = findProvider(directory, options.providers)
    if (provider) {
        log.debug('Listing {path} through provider {provider}', { path: directory, provider: provider.id })
        let entries: FileEntryInit[]
        try {
            entries = await provider.listLikeDirectory(directory)
        } catch (error) {
            throw toFileEngineError(error, directory)
        }
        return options.showHidden ? entries : entries.filter((e) => !isHiddenName(e.name))
    }

    let names: string[]
    try {
        names = await readdir(directory)
    } catch (error) {
        throw toFileEngineError(error, directory)
    }

    const visible = options.showHidden ? names : names.filter((name) => !isHiddenName(name))
    const result: FileEntryInit[] = []

    for (let start = 0; start < visible.length; start += STAT_BATCH_SIZE) {
        const batch = visible.slice(start, start + STAT_BATCH_SIZE)
        const entries = await Promise.all(batch.map((name) => statEntry(path.join(directory, name))))
        for (const entry of entries) {
            if (entry) result.push(entry)
        }
    }

    log.debug('Listed {count} entries in {path}', { count: result.length, path: directory })
    return result
}

/**
 * Re-stats a single path. Returns null if it no longer exists, which callers treat as a removal.
 * Other failures (permissions, I/O) are also reported as null: an entry we can't stat can't be shown.
 */
export async function statEntry(absolutePath: string): Promise<FileEntryInit | null> {
    try {
        const stats = await lstat(absolutePath)
        return await entryFromStats(absolutePath, stats)
    } catch (error) {
        const engineError = toFileEngineError(error, absolutePath)
        if (engineError.code !== 'not_found') {
            log.warn('Could not stat {path}: {error}', { path: absolutePath, error: engineError.message })
        }
        return null
    }
}
