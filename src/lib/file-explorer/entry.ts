import type { Stats } from 'fs'
import { readlink } from 'fs/promises'
import { getAppLogger } from '$lib/logger'
import { baseName } from './paths'
import type { EntryKind, FileEntry, FileEntryInit } from './types'

const log = getAppLogger('listing')

export function isDirectoryEntry(entry: Pick<FileEntry, 'kind'>): boolean {
    return entry.kind.type === 'directory' || (entry.kind.type === 'archive_member' && entry.kind.isDirectory)
}

/** Normalizes platform mode bits to the nine rwx permission bits. */
export function normalizePermissions(mode: number): number {
    return mode & 0o777
}

/**
 * Builds an entry from `lstat` output. Symlinks are reported as symlinks (not followed);
 * their target is read best-effort.
 */
export async function entryFromStats(absolutePath: string, stats: Stats): Promise<FileEntryInit> {
    let kind: EntryKind
    if (stats.isSymbolicLink()) {
        let target: string | null = null
        try {
            target = await readlink(absolutePath)
        } catch (error) {
            // Vanished or unreadable since lstat; the entry stays, without a target
            log.debug('Could not read link {path}: {error}', { path: absolutePath, error })
        }
        kind = { type: 'symlink', target }
    } else if (stats.isDirectory()) {
        kind = { type: 'directory' }
    } else {
        kind = { type: 'file' }
    }

    return {
        name: baseName(absolutePath),
        path: absolutePath,
        kind,
        size: kind.type === 'directory' ? undefined : stats.size,
        modifiedAt: Math.floor(stats.mtimeMs),
        permissions: normalizePermissions(stats.mode),
    }
}

/** Stamps the generation of the snapshot that adopts this entry. Entries are frozen once stamped. */
export function stampEntry(init: FileEntryInit, generation: number): FileEntry {
    return Object.freeze({ ...init, generation })
}

/** True if two entries describe the same observable filesystem state (generation aside). */
export function sameEntryState(a: FileEntryInit, b: FileEntryInit): boolean {
    return (
        a.path === b.path &&
        a.name === b.name &&
        a.size === b.size &&
        a.modifiedAt === b.modifiedAt &&
        a.permissions === b.permissions &&
        JSON.stringify(a.kind) === JSON.stringify(b.kind)
    )
}
