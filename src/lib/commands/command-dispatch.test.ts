import path from 'path'
import { afterEach, beforeEach, describe, expect, it } from 'vitest'
import { createFileManagerEngine, type FileManagerEngine } from '$lib/engine'
import { createFakeWatcherBackend, createTempDir, writeTree } from '$lib/file-explorer/test-helpers'
import type { PaneView } from '$lib/file-explorer/types'
import type { CommandResult, CommandValue } from './types'

let dir: string
let cleanup: () => Promise<void>
let engine: FileManagerEngine

function valueOf(result: CommandResult): CommandValue {
    if (!result.ok) throw new Error(`${result.intent} failed: ${result.error.message}`)
    return result.value
}

function paneOf(result: CommandResult): PaneView {
    const value = valueOf(result)
    if (value.type !== 'pane') throw new Error(`Expected a pane, got ${value.type}`)
    return value.pane
}

function toastContents(): string[] {
    return engine.toasts.getToasts().map((t) => t.content)
}

beforeEach(async () => {
    ;({ dir, cleanup } = await createTempDir())
    await writeTree(dir, { 'a.txt': 'a', '.hidden': 'h', sub: { 'x.txt': 'x' }, out: {} })
    engine = createFileManagerEngine({
        watcherBackend: createFakeWatcherBackend(),
        backupRoot: path.join(dir, 'out', '.backups'),
    })
})

afterEach(async () => {
    await engine.dispose()
    await cleanup()
})

describe('pane intents', () => {
    it('opens, navigates, goes back and forward', async () => {
        const pane = paneOf(await engine.dispatch({ type: 'open-pane', path: dir }))
        expect(pane.snapshot.entries.map((e) => e.name)).toEqual(['out', 'sub', 'a.txt'])

        const inSub = paneOf(await engine.dispatch({ type: 'navigate', paneId: pane.id, path: 'sub' }))
        expect(inSub.path).toBe(path.join(dir, 'sub'))

        expect(paneOf(await engine.dispatch({ type: 'back', paneId: pane.id })).path).toBe(dir)
        expect(paneOf(await engine.dispatch({ type: 'forward', paneId: pane.id })).path).toBe(path.join(dir, 'sub'))
    })

    it('toggles hidden files', async () => {
        const pane = paneOf(await engine.dispatch({ type: 'open-pane', path: dir }))

        const shown = paneOf(await engine.dispatch({ type: 'toggle-hidden', paneId: pane.id }))
        expect(shown.showHidden).toBe(true)
        expect(shown.snapshot.entries.map((e) => e.name)).toContain('.hidden')

        const hidden = paneOf(await engine.dispatch({ type: 'toggle-hidden', paneId: pane.id }))
        expect(hidden.showHidden).toBe(false)
    })

    it('selects and filters', async () => {
        const pane = paneOf(await engine.dispatch({ type: 'open-pane', path: dir }))

        expect(valueOf(await engine.dispatch({ type: 'select', paneId: pane.id, paths: ['a.txt', 'sub'] }))).toEqual({
            type: 'selection',
            paneId: pane.id,
            selection: [path.join(dir, 'sub'), path.join(dir, 'a.txt')],
        })

        const filtered = valueOf(await engine.dispatch({ type: 'set-filter-query', paneId: pane.id, query: 'ou' }))
        expect(filtered.type === 'filter' && filtered.filter.matches.map((m) => m.path)).toEqual([
            path.join(dir, 'out'),
        ])
    })

    it('closes a pane', async () => {
        const pane = paneOf(await engine.dispatch({ type: 'open-pane', path: dir }))
        expect(valueOf(await engine.dispatch({ type: 'close-pane', paneId: pane.id }))).toEqual({
            type: 'pane-closed',
            paneId: pane.id,
        })
        expect(engine.manager.listPanes()).toEqual([])
    })
})

describe('failures', () => {
    it('returns the error and raises a toast instead of throwing', async () => {
        const result = await engine.dispatch({ type: 'refresh', paneId: 'pane-404' })

        expect(result).toEqual({
            ok: false,
            intent: 'refresh',
            error: { code: 'not_found', message: 'No such pane: pane-404' },
        })
        expect(toastContents()).toEqual(["Couldn't refresh: No such pane: pane-404"])
        expect(engine.toasts.getToasts()[0].level).toBe('error')
    })

    it('reports an empty undo stack', async () => {
        const result = await engine.dispatch({ type: 'undo' })
        expect(result.ok === false && result.error).toEqual({ code: 'not_undoable', message: 'Nothing to undo' })
        expect(toastContents()).toEqual(["Couldn't undo: Nothing to undo"])
    })

    it('rejects invalid operation requests', async () => {
        const result = await engine.dispatch({ type: 'submit-operation', request: { kind: 'copy', sources: [] } })
        expect(result.ok === false && result.error.code).toBe('invalid_request')
    })

    it('fails for unknown operations and conflicts nobody waits on', async () => {
        const cancel = await engine.dispatch({ type: 'cancel-operation', operationId: 'nope' })
        expect(cancel.ok === false && cancel.error).toEqual({ code: 'not_found', message: 'No such operation: nope' })

        const resolve = await engine.dispatch({
            type: 'resolve-conflict',
            operationId: 'nope',
            source: '/x',
            resolution: 'skip',
        })
        expect(resolve.ok === false && resolve.error.code).toBe('invalid_request')
    })
})

describe('operations', () => {
    it('toasts a partial result when the operation ends', async () => {
        const value = valueOf(
            await engine.dispatch({
                type: 'submit-operation',
                request: {
                    kind: 'copy',
                    sources: [path.join(dir, 'a.txt'), path.join(dir, 'gone.txt')],
                    destination: path.join(dir, 'out'),
                },
            }),
        )
        if (value.type !== 'operation') throw new Error(value.type)

        const record = await value.done
        expect(record.status).toBe('partially_completed')
        expect(toastContents()).toEqual(["Copied 1 of 2 items. Couldn't find the file"])
        expect(engine.toasts.getToasts()[0]).toMatchObject({ id: `operation-${record.id}`, level: 'warn' })
    })

    it('raises no toast for a completed operation', async () => {
        const value = valueOf(
            await engine.dispatch({
                type: 'submit-operation',
                request: { kind: 'rename', sources: [path.join(dir, 'a.txt')], destination: 'b.txt' },
            }),
        )
        if (value.type !== 'operation') throw new Error(value.type)

        expect((await value.done).status).toBe('completed')
        expect(toastContents()).toEqual([])
    })

    it('reports whether a cancel reached a running operation', async () => {
        const value = valueOf(
            await engine.dispatch({
                type: 'submit-operation',
                request: { kind: 'copy', sources: [path.join(dir, 'a.txt')], destination: path.join(dir, 'out') },
            }),
        )
        if (value.type !== 'operation') throw new Error(value.type)
        await value.done

        expect(valueOf(await engine.dispatch({ type: 'cancel-operation', operationId: value.operationId }))).toEqual({
            type: 'operation-cancelled',
            operationId: value.operationId,
            cancelled: false,
        })
    })

    it('undoes and redoes through intents', async () => {
        const submitted = valueOf(
            await engine.dispatch({
                type: 'submit-operation',
                request: { kind: 'rename', sources: [path.join(dir, 'a.txt')], destination: 'renamed.txt' },
            }),
        )
        if (submitted.type !== 'operation') throw new Error(submitted.type)
        await submitted.done

        const undo = valueOf(await engine.dispatch({ type: 'undo' }))
        if (undo.type !== 'operation') throw new Error(undo.type)
        expect((await undo.done).origin).toBe('undo')

        const redo = valueOf(await engine.dispatch({ type: 'redo' }))
        if (redo.type !== 'operation') throw new Error(redo.type)
        expect((await redo.done).items[0].target).toBe(path.join(dir, 'renamed.txt'))
    })
})
