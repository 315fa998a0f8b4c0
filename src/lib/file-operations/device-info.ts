// Filesystem device lookup for move planning. Kept in its own module so tests can fake device boundaries.

import { lstat } from 'fs/promises'

/** Device id of the filesystem holding `target` itself (a symlink is not followed). */
export async function getDeviceId(target: string): Promise<number> {
    const stats = await lstat(target)
    return stats.dev
}
