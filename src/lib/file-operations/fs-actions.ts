/**
 * Filesystem work behind one suboperation: scan, copy, move, remove and free-name lookup.
 *
 * Everything here throws. The scheduler turns `OperationCancelled` into a cancelled item,
 * `OperationFailure` into its carried error, and any other error through `classifyFsError`.
 */

import { createReadStream, createWriteStream, type Stats } from 'fs'
import { lstat, mkdir, readdir, readlink, rename, rm, symlink } from 'fs/promises'
import path from 'path'
import { pipeline } from 'stream/promises'
import { errnoCode, OperationCancelled, OperationFailure } from '$lib/errors'
import { getAppLogger } from '$lib/logger'
import { nameWithSuffix } from '$lib/utils/filename-validation'
import { getDeviceId } from './device-info'

const log = getAppLogger('fileOperations')

export interface TransferContext {
    signal: AbortSignal
    chunkSize: number
    /** Called with the byte count of every chunk written */
    onBytes(bytes: number): void
}

export interface TreeMeasure {
    isDirectory: boolean
    /** Regular file bytes, recursively */
    bytes: number
    /** Number of entries, the root included */
    entries: number
}

export function throwIfCancelled(signal: AbortSignal): void {
    if (signal.aborted) throw new OperationCancelled()
}

export async function lstatOrNull(target: string): Promise<Stats | null> {
    try {
        return await lstat(target)
    } catch (error) {
        if (errnoCode(error) === 'ENOENT' || errnoCode(error) === 'ENOTDIR') return null
        throw error
    }
}

export async function measureTree(target: string): Promise<TreeMeasure> {
    const stats = await lstat(target)
    if (!stats.isDirectory()) {
        return { isDirectory: false, bytes: stats.isFile() ? stats.size : 0, entries: 1 }
    }
    let bytes = 0
    let entries = 1
    for (const name of await readdir(target)) {
        const child = await measureTree(path.join(target, name))
        bytes += child.bytes
        entries += child.entries
    }
    return { isDirectory: true, bytes, entries }
}

/** First `name (n).ext` next to `target` that doesn't exist yet. */
export async function nextFreeName(target: string, isDirectory: boolean): Promise<string> {
    const directory = path.dirname(target)
    const name = path.basename(target)
    for (let n = 1; ; n++) {
        const candidate = path.join(directory, nameWithSuffix(name, n, isDirectory))
        if ((await lstatOrNull(candidate)) === null) return candidate
    }
}

async function copyFileStreaming(source: string, target: string, mode: number, ctx: TransferContext): Promise<void> {
    try {
        await pipeline(
            createReadStream(source, { highWaterMark: ctx.chunkSize }),
            async function* (chunks: AsyncIterable<Buffer>) {
                for await (const chunk of chunks) {
                    ctx.onBytes(chunk.length)
                    yield chunk
                }
            },
            createWriteStream(target, { flags: 'wx', mode }),
            { signal: ctx.signal },
        )
    } catch (error) {
        // With `wx`, EEXIST means the file was never ours
        if (errnoCode(error) !== 'EEXIST') await rm(target, { force: true })
        if (ctx.signal.aborted) throw new OperationCancelled()
        throw error
    }
}

/**
 * Copies a file, symlink or directory tree (depth-first) to `target`, which must not exist.
 * Cancellation is checked between entries and on every chunk. A copy that stops part-way,
 * cancelled or failed, leaves nothing at `target`.
 */
export async function copyTree(source: string, target: string, ctx: TransferContext): Promise<void> {
    throwIfCancelled(ctx.signal)
    const stats = await lstat(source)

    if (stats.isDirectory()) {
        await mkdir(target, { mode: stats.mode & 0o777 })
        try {
            for (const name of await readdir(source)) {
                await copyTree(path.join(source, name), path.join(target, name), ctx)
            }
        } catch (error) {
            await removeTree(target)
            throw error
        }
        return
    }
    if (stats.isSymbolicLink()) {
        await symlink(await readlink(source), target)
        return
    }
    if (stats.isFile()) {
        await copyFileStreaming(source, target, stats.mode & 0o777, ctx)
        return
    }
    throw new OperationFailure({ type: 'io_error', path: source, message: 'Unsupported file type' })
}

export async function removeTree(target: string): Promise<void> {
    await rm(target, { recursive: true, force: true })
}

async function isCrossDevice(source: string, targetDirectory: string): Promise<boolean> {
    const [from, to] = await Promise.all([getDeviceId(source), getDeviceId(targetDirectory)])
    return from !== to
}

/**
 * Copies to the other device, checks entry count and byte total, then removes the source.
 * A failed copy or check removes the partial copy and fails with `cross_device_move_failed`.
 */
async function moveAcrossDevices(source: string, target: string, ctx: TransferContext): Promise<void> {
    const expected = await measureTree(source)
    try {
        await copyTree(source, target, ctx)
        const actual = await measureTree(target)
        if (actual.entries !== expected.entries || actual.bytes !== expected.bytes) {
            throw new OperationFailure({
                type: 'cross_device_move_failed',
                path: source,
                message: `Copy has ${String(actual.entries)} entries (${String(actual.bytes)} bytes), expected ${String(expected.entries)} (${String(expected.bytes)} bytes)`,
            })
        }
    } catch (error) {
        await removeTree(target)
        if (error instanceof OperationCancelled || error instanceof OperationFailure) throw error
        throw new OperationFailure({
            type: 'cross_device_move_failed',
            path: source,
            message: error instanceof Error ? error.message : String(error),
        })
    }

    try {
        await rm(source, { recursive: true })
    } catch (error) {
        // The verified copy stays: part of the source may already be gone
        throw new OperationFailure({
            type: 'cross_device_move_failed',
            path: source,
            message: `Copied, but couldn't remove the original: ${error instanceof Error ? error.message : String(error)}`,
        })
    }
}

/** Renames in place when source and target share a device, otherwise copies then deletes. */
export async function moveTree(source: string, target: string, ctx: TransferContext): Promise<void> {
    throwIfCancelled(ctx.signal)
    if (!(await isCrossDevice(source, path.dirname(target)))) {
        try {
            await rename(source, target)
            return
        } catch (error) {
            if (errnoCode(error) !== 'EXDEV') throw error
        }
    }
    log.debug('Moving {source} across devices', { source })
    await moveAcrossDevices(source, target, ctx)
}
