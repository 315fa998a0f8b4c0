import { readdir, readFile, writeFile } from 'fs/promises'
import { createServer } from 'net'
import path from 'path'
import { afterEach, beforeEach, describe, expect, it, vi } from 'vitest'
import type { EngineEvents } from '$lib/events/engine-events'
import { createEventChannel, type EventChannel } from '$lib/events/event-channel'
import type { LocalChange } from '$lib/file-explorer/directory-state-manager'
import { createSnapshot } from '$lib/file-explorer/snapshot'
import { createFileEntry, createTempDir, writeTree, type TreeSpec } from '$lib/file-explorer/test-helpers'
import { createSettingsStore, type SettingsStore } from '$lib/settings/settings-store'
import { createMonotonicClock } from '$lib/utils/clock'
import { createOperationScheduler, type OperationScheduler } from './scheduler'
import type { ConflictRequest, OperationProgress, OperationRecord } from './types'

let dir: string
let src: string
let dest: string
let cleanup: () => Promise<void>
let events: EventChannel<EngineEvents>
let settings: SettingsStore
let scheduler: OperationScheduler
let localChanges: LocalChange[]

function statuses(record: OperationRecord): string[] {
    return record.transitions.map((t) => t.status)
}

function itemStatuses(record: OperationRecord): string[] {
    return record.items.map((i) => i.status)
}

function thrownBy(fn: () => unknown): unknown {
    try {
        fn()
    } catch (error) {
        return error
    }
    return undefined
}

async function sortedEntries(directory: string): Promise<string[]> {
    return (await readdir(directory)).sort()
}

beforeEach(async () => {
    ;({ dir, cleanup } = await createTempDir())
    src = path.join(dir, 'src')
    dest = path.join(dir, 'dest')
    await writeTree(dir, {
        src: { 'a.txt': 'aaa', 'b.txt': 'bb', folder: { 'x.txt': 'xx', nested: { 'y.txt': 'yyyy' } } },
        dest: {},
    })

    events = createEventChannel<EngineEvents>()
    settings = createSettingsStore()
    localChanges = []
    scheduler = createOperationScheduler({
        settings,
        events,
        clock: createMonotonicClock(),
        backupRoot: path.join(dir, 'backups'),
        panes: {
            getSnapshot: (paneId) =>
                paneId === 'pane-1'
                    ? createSnapshot(
                          [
                              createFileEntry({ name: 'a.txt', path: path.join(src, 'a.txt'), isDirectory: false }),
                              createFileEntry({ name: 'b.txt', path: path.join(src, 'b.txt'), isDirectory: false }),
                          ],
                          {
                              path: src,
                              version: 1,
                              sort: { sortBy: 'name', sortOrder: 'ascending', directoriesFirst: true },
                              baseline: 0,
                          },
                      )
                    : undefined,
            applyLocalChanges: (changes) => {
                localChanges.push(...changes)
                return Promise.resolve()
            },
        },
    })
})

afterEach(async () => {
    scheduler.dispose()
    await scheduler.whenIdle()
    await cleanup()
})

describe('submit validation', () => {
    it('rejects an empty batch', () => {
        expect(thrownBy(() => scheduler.submit({ kind: 'delete', sources: [] }))).toMatchObject({
            code: 'invalid_request',
        })
    })

    it('rejects copy and move without a destination', () => {
        expect(() => scheduler.submit({ kind: 'copy', sources: [path.join(src, 'a.txt')] })).toThrow(
            'A copy needs a destination',
        )
        expect(() => scheduler.submit({ kind: 'move', sources: [path.join(src, 'a.txt')], destination: ' ' })).toThrow(
            'A move needs a destination',
        )
    })

    it('rejects renames of several sources or to invalid names', () => {
        expect(() =>
            scheduler.submit({ kind: 'rename', sources: [path.join(src, 'a.txt'), path.join(src, 'b.txt')], destination: 'c' }),
        ).toThrow('Rename takes exactly one source, got 2')
        expect(() => scheduler.submit({ kind: 'rename', sources: [path.join(src, 'a.txt')], destination: '' })).toThrow(
            "A filename can't be empty",
        )
        expect(() => scheduler.submit({ kind: 'rename', sources: [path.join(src, 'a.txt')], destination: '..' })).toThrow(
            '".." isn\'t a valid filename',
        )
    })

    it('rejects unknown panes and sources the pane does not list', () => {
        expect(thrownBy(() => scheduler.submit({ kind: 'delete', sources: ['a.txt'], paneId: 'pane-7' }))).toMatchObject({
            code: 'not_found',
        })
        expect(thrownBy(() => scheduler.submit({ kind: 'delete', sources: ['folder'], paneId: 'pane-1' }))).toMatchObject({
            code: 'not_found',
            path: path.join(src, 'folder'),
        })
    })

    it('resolves pane-relative sources', async () => {
        const handle = scheduler.submit({ kind: 'copy', sources: ['a.txt'], destination: dest, paneId: 'pane-1' })
        const record = await handle.done
        expect(record.sources).toEqual([path.join(src, 'a.txt')])
        expect(record.status).toBe('completed')
    })
})

describe('copy', () => {
    it('goes pending, in progress, completed', async () => {
        const handle = scheduler.submit({ kind: 'copy', sources: [path.join(src, 'a.txt')], destination: dest })
        expect(scheduler.getOperation(handle.id)?.status).toBe('pending')

        const record = await handle.done

        expect(statuses(record)).toEqual(['pending', 'in_progress', 'completed'])
        expect(record.progress).toEqual({ bytesDone: 3, bytesTotal: 3, itemsDone: 1, itemsTotal: 1 })
        expect(await readFile(path.join(dest, 'a.txt'), 'utf8')).toBe('aaa')
        expect(await readFile(path.join(src, 'a.txt'), 'utf8')).toBe('aaa')
        expect(scheduler.listActiveOperations()).toEqual([])
    })

    it('copies directory trees depth-first', async () => {
        const record = await scheduler.submit({ kind: 'copy', sources: [path.join(src, 'folder')], destination: dest })
            .done

        expect(record.items[0]).toMatchObject({ status: 'succeeded', isDirectory: true, bytes: 6 })
        expect(await readFile(path.join(dest, 'folder', 'nested', 'y.txt'), 'utf8')).toBe('yyyy')
    })

    it('reports local changes for each finished item', async () => {
        await scheduler.submit({ kind: 'copy', sources: [path.join(src, 'a.txt')], destination: dest }).done
        expect(localChanges).toEqual([{ type: 'upsert', path: path.join(dest, 'a.txt'), timestamp: expect.any(Number) }])
    })

    it('reports monotonic progress ending at the totals', async () => {
        settings.set('fileOperations.copyChunkSize', 4096)
        await writeFile(path.join(src, 'big.bin'), Buffer.alloc(64 * 1024, 1))
        const seen: OperationProgress[] = []
        const handle = scheduler.submit({
            kind: 'copy',
            sources: [path.join(src, 'big.bin'), path.join(src, 'a.txt')],
            destination: dest,
        })
        scheduler.onOperationEvents(handle.id, { onProgress: (event) => seen.push(event.progress) })
        await handle.done

        for (let i = 1; i < seen.length; i++) {
            expect(seen[i].bytesDone).toBeGreaterThanOrEqual(seen[i - 1].bytesDone)
            expect(seen[i].itemsDone).toBeGreaterThanOrEqual(seen[i - 1].itemsDone)
        }
        expect(seen[seen.length - 1]).toEqual({ bytesDone: 65539, bytesTotal: 65539, itemsDone: 2, itemsTotal: 2 })
    })

    it('fails a directory copied into itself', async () => {
        const folder = path.join(src, 'folder')
        const record = await scheduler.submit({ kind: 'copy', sources: [folder], destination: path.join(folder, 'nested') })
            .done

        expect(record.status).toBe('failed')
        expect(record.items[0].error).toEqual({
            type: 'destination_inside_source',
            source: folder,
            destination: path.join(folder, 'nested'),
        })
    })

    it('keeps going past failed items', async () => {
        const record = await scheduler.submit({
            kind: 'copy',
            sources: [path.join(src, 'a.txt'), path.join(src, 'gone.txt')],
            destination: dest,
        }).done

        expect(record.status).toBe('partially_completed')
        expect(itemStatuses(record)).toEqual(['succeeded', 'failed'])
        expect(record.items[1].error).toEqual({ type: 'not_found', path: path.join(src, 'gone.txt') })
    })

    it('removes a partly copied directory when one of its entries fails', async () => {
        const folder = path.join(src, 'folder')
        const socket = path.join(folder, 'z.sock')
        const server = createServer()
        await new Promise<void>((resolve) => {
            server.listen(socket, () => {
                resolve()
            })
        })
        try {
            const record = await scheduler.submit({ kind: 'copy', sources: [folder], destination: dest }).done

            expect(record.items[0].error).toEqual({ type: 'io_error', path: socket, message: 'Unsupported file type' })
            expect(await sortedEntries(dest)).toEqual([])
        } finally {
            await new Promise<void>((resolve) => {
                server.close(() => {
                    resolve()
                })
            })
        }
    })

    it('fails when nothing succeeds', async () => {
        const record = await scheduler.submit({ kind: 'copy', sources: [path.join(src, 'gone.txt')], destination: dest })
            .done
        expect(record.status).toBe('failed')
    })
})

describe('conflicts', () => {
    beforeEach(async () => {
        await writeFile(path.join(dest, 'a.txt'), 'old')
        await writeFile(path.join(dest, 'b.txt'), 'old')
    })

    it('asks and applies the answer', async () => {
        const handle = scheduler.submit({ kind: 'copy', sources: [path.join(src, 'a.txt')], destination: dest })
        const requests: ConflictRequest[] = []
        events.listen('operation-conflict', (request) => {
            requests.push(request)
            scheduler.resolveConflict(request.operationId, request.source, 'overwrite')
        })
        const record = await handle.done

        expect(requests).toEqual([
            {
                operationId: handle.id,
                source: path.join(src, 'a.txt'),
                target: path.join(dest, 'a.txt'),
                sourceIsDirectory: false,
                targetIsDirectory: false,
                sourceSize: 3,
                targetSize: 3,
            },
        ])
        expect(record.status).toBe('completed')
        expect(await readFile(path.join(dest, 'a.txt'), 'utf8')).toBe('aaa')
    })

    it('applies an answer to every paused item', async () => {
        const handle = scheduler.submit({
            kind: 'copy',
            sources: [path.join(src, 'a.txt'), path.join(src, 'b.txt')],
            destination: dest,
        })
        let asked = 0
        events.listen('operation-conflict', (request) => {
            asked++
            scheduler.resolveConflict(request.operationId, request.source, 'skip', true)
        })
        const record = await handle.done

        expect(asked).toBeGreaterThanOrEqual(1)
        expect(itemStatuses(record)).toEqual(['skipped', 'skipped'])
        expect(record.status).toBe('completed')
        expect(await readFile(path.join(dest, 'b.txt'), 'utf8')).toBe('old')
    })

    it('fails the item when the configured default is fail', async () => {
        settings.set('fileOperations.conflictDefault', 'fail')
        const record = await scheduler.submit({ kind: 'copy', sources: [path.join(src, 'a.txt')], destination: dest })
            .done

        expect(record.items[0].error).toEqual({ type: 'already_exists', path: path.join(dest, 'a.txt') })
        expect(await readFile(path.join(dest, 'a.txt'), 'utf8')).toBe('old')
    })

    it('keeps an overwritten entry in the backup directory', async () => {
        const record = await scheduler.submit({
            kind: 'copy',
            sources: [path.join(src, 'a.txt')],
            destination: dest,
            conflictPolicy: 'overwrite',
        }).done

        const replaced = path.join(dir, 'backups', record.id, '0', 'a.txt')
        expect(record.items[0].replacedBackupPath).toBe(replaced)
        expect(await readFile(replaced, 'utf8')).toBe('old')
        expect(await readFile(path.join(dest, 'a.txt'), 'utf8')).toBe('aaa')
    })

    it('renames with a numeric suffix', async () => {
        await writeFile(path.join(dest, 'a (1).txt'), 'taken')
        const record = await scheduler.submit({
            kind: 'copy',
            sources: [path.join(src, 'a.txt')],
            destination: dest,
            conflictPolicy: 'rename',
        }).done

        expect(record.items[0].target).toBe(path.join(dest, 'a (2).txt'))
        expect(await readFile(path.join(dest, 'a (2).txt'), 'utf8')).toBe('aaa')
    })

    it('skips with the skip policy', async () => {
        const record = await scheduler.submit({
            kind: 'move',
            sources: [path.join(src, 'a.txt')],
            destination: dest,
            conflictPolicy: 'skip',
        }).done

        expect(itemStatuses(record)).toEqual(['skipped'])
        expect(await readFile(path.join(src, 'a.txt'), 'utf8')).toBe('aaa')
    })

    it('never overwrites a file with itself', async () => {
        const record = await scheduler.submit({
            kind: 'copy',
            sources: [path.join(src, 'a.txt')],
            destination: src,
            conflictPolicy: 'overwrite',
        }).done

        expect(record.items[0].error?.type).toBe('already_exists')
        expect(await readFile(path.join(src, 'a.txt'), 'utf8')).toBe('aaa')
    })

    it('cancels items waiting for an answer', async () => {
        const handle = scheduler.submit({ kind: 'copy', sources: [path.join(src, 'a.txt')], destination: dest })
        events.listen('operation-conflict', () => {
            handle.cancel()
        })
        const record = await handle.done

        expect(record.status).toBe('cancelled')
        expect(itemStatuses(record)).toEqual(['cancelled'])
    })
})

describe('cancellation', () => {
    it('leaves exactly the k items finished before the cancel', async () => {
        const names = ['f1.txt', 'f2.txt', 'f3.txt', 'f4.txt', 'f5.txt']
        await writeTree(path.join(dir, 'many'), Object.fromEntries(names.map((n) => [n, 'data'])))
        settings.set('fileOperations.maxConcurrency', 1)

        const handle = scheduler.submit({
            kind: 'copy',
            sources: names.map((n) => path.join(dir, 'many', n)),
            destination: dest,
        })
        scheduler.onOperationEvents(handle.id, {
            onProgress: (event) => {
                if (event.progress.itemsDone === 2) handle.cancel()
            },
        })
        const record = await handle.done

        expect(record.status).toBe('cancelled')
        expect(record.items.filter((i) => i.status === 'succeeded')).toHaveLength(2)
        expect(record.items.filter((i) => i.status === 'cancelled')).toHaveLength(3)
        expect(await readdir(dest)).toHaveLength(2)
    })

    it('returns false for unknown or finished operations', async () => {
        const handle = scheduler.submit({ kind: 'copy', sources: [path.join(src, 'a.txt')], destination: dest })
        await handle.done
        expect(scheduler.cancel(handle.id)).toBe(false)
        expect(scheduler.cancel('missing')).toBe(false)
    })
})

describe('move, rename and delete', () => {
    it('moves within a device by renaming', async () => {
        const record = await scheduler.submit({ kind: 'move', sources: [path.join(src, 'folder')], destination: dest })
            .done

        expect(record.status).toBe('completed')
        expect(await sortedEntries(src)).toEqual(['a.txt', 'b.txt'])
        expect(await readFile(path.join(dest, 'folder', 'x.txt'), 'utf8')).toBe('xx')
        expect(localChanges.map((c) => [c.type, c.path])).toEqual([
            ['remove', path.join(src, 'folder')],
            ['upsert', path.join(dest, 'folder')],
        ])
    })

    it('skips a move onto itself', async () => {
        const record = await scheduler.submit({ kind: 'move', sources: [path.join(src, 'a.txt')], destination: src }).done
        expect(itemStatuses(record)).toEqual(['skipped'])
    })

    it('renames in place', async () => {
        const record = await scheduler.submit({
            kind: 'rename',
            sources: [path.join(src, 'a.txt')],
            destination: 'renamed.txt',
        }).done

        expect(record.items[0].target).toBe(path.join(src, 'renamed.txt'))
        expect(record.destination).toBe(src)
        expect(await sortedEntries(src)).toEqual(['b.txt', 'folder', 'renamed.txt'])
    })

    it('moves deleted entries into the backup directory', async () => {
        const record = await scheduler.submit({ kind: 'delete', sources: [path.join(src, 'a.txt')] }).done

        expect(record.backupDir).toBe(path.join(dir, 'backups', record.id))
        const backupPath = record.items[0].backupPath
        expect(backupPath).toBe(path.join(dir, 'backups', record.id, '0', 'a.txt'))
        expect(await readFile(backupPath ?? '', 'utf8')).toBe('aaa')
        expect(await sortedEntries(src)).toEqual(['b.txt', 'folder'])
    })

    it('deletes permanently on request or by setting', async () => {
        const first = await scheduler.submit({ kind: 'delete', sources: [path.join(src, 'a.txt')], permanent: true })
            .done
        settings.set('fileOperations.deletePermanently', true)
        const second = await scheduler.submit({ kind: 'delete', sources: [path.join(src, 'folder')] }).done

        expect(first.backupDir).toBeNull()
        expect(first.items[0].backupPath).toBeUndefined()
        expect(second.backupDir).toBeNull()
        expect(await sortedEntries(src)).toEqual(['b.txt'])
    })
})

describe('ordering', () => {
    it('runs batches into one directory in submission order', async () => {
        const many: TreeSpec = {}
        for (let i = 0; i < 300; i++) many[`s${String(i)}.txt`] = 's'
        await writeTree(dir, { x: { d: many }, y: { d: { 'only-y.txt': 'y' } } })
        const finished: string[] = []
        scheduler.onFinished((record) => finished.push(record.id))

        const first = scheduler.submit({
            kind: 'copy',
            sources: [path.join(dir, 'x', 'd')],
            destination: dest,
            conflictPolicy: 'overwrite',
        })
        const second = scheduler.submit({
            kind: 'copy',
            sources: [path.join(dir, 'y', 'd')],
            destination: dest,
            conflictPolicy: 'overwrite',
        })
        await Promise.all([first.done, second.done])

        expect(finished).toEqual([first.id, second.id])
        expect(await sortedEntries(path.join(dest, 'd'))).toEqual(['only-y.txt'])
    })

    it('holds later batches into a directory behind one waiting for an answer', async () => {
        const other = path.join(dir, 'other')
        await writeTree(dir, { other: {} })
        await writeFile(path.join(dest, 'a.txt'), 'old')
        const asked = new Promise<ConflictRequest>((resolve) => {
            events.listen('operation-conflict', resolve)
        })

        const paused = scheduler.submit({ kind: 'copy', sources: [path.join(src, 'a.txt')], destination: dest })
        const queued = scheduler.submit({ kind: 'copy', sources: [path.join(src, 'b.txt')], destination: dest })
        await asked
        const elsewhere = await scheduler.submit({ kind: 'copy', sources: [path.join(src, 'b.txt')], destination: other })
            .done

        expect(elsewhere.status).toBe('completed')
        expect(scheduler.getOperation(queued.id)?.items[0].status).toBe('pending')

        scheduler.resolveConflict(paused.id, path.join(src, 'a.txt'), 'skip')
        expect((await paused.done).status).toBe('completed')
        expect((await queued.done).status).toBe('completed')
        expect(await readFile(path.join(dest, 'b.txt'), 'utf8')).toBe('bb')
    })
})

describe('records', () => {
    it('notifies finish listeners before done resolves', async () => {
        const order: string[] = []
        scheduler.onFinished((record) => order.push(`finished:${record.status}`))
        await scheduler.submit({ kind: 'copy', sources: [path.join(src, 'a.txt')], destination: dest }).done
        order.push('done')

        expect(order).toEqual(['finished:completed', 'done'])
    })

    it('hands out copies of records', async () => {
        const handle = scheduler.submit({ kind: 'copy', sources: [path.join(src, 'a.txt')], destination: dest })
        const record = await handle.done
        record.items[0].status = 'failed'

        expect(scheduler.getOperation(handle.id)?.items[0].status).toBe('succeeded')
    })

    it('orders operations by sequence', async () => {
        const first = scheduler.submit({ kind: 'copy', sources: [path.join(src, 'a.txt')], destination: dest })
        const second = scheduler.submit({ kind: 'copy', sources: [path.join(src, 'b.txt')], destination: dest })
        const [a, b] = await Promise.all([first.done, second.done])
        expect(b.sequence).toBe(a.sequence + 1)
    })

    it('marks finished records as undone', async () => {
        const handle = scheduler.submit({ kind: 'copy', sources: [path.join(src, 'a.txt')], destination: dest })
        await handle.done
        const onStatus = vi.fn()
        scheduler.onOperationEvents(handle.id, { onStatus })

        scheduler.markUndone(handle.id)
        scheduler.markUndone(handle.id)

        expect(onStatus).toHaveBeenCalledTimes(1)
        expect(scheduler.getOperation(handle.id)?.status).toBe('undone')
    })
})
