/**
 * Undo/redo ledger. Reversal replays an inverse operation through the scheduler instead of
 * restoring saved bytes:
 *
 *   rename  ⇄ rename back
 *   move    ⇄ move back
 *   copy    ⇄ permanent delete of the copies
 *   delete  ⇄ move back out of the backup directory
 *
 * An entry a copy, move or rename overwrote is moved back from the backup directory once the
 * item that replaced it is reversed.
 *
 * Only items that succeeded are reversed. Inverses run with conflict resolution `fail`, so an
 * undo never overwrites something that appeared since.
 */

import path from 'path'
import { FileEngineError } from '$lib/errors'
import type { EngineEventChannel } from '$lib/events/engine-events'
import type { OperationScheduler } from '$lib/file-operations/scheduler'
import type { OperationHandle, OperationItem, OperationPlan, OperationRecord } from '$lib/file-operations/types'
import { getAppLogger } from '$lib/logger'
import type { SettingsStore } from '$lib/settings/settings-store'

const log = getAppLogger('undo')

export interface UndoLedgerOptions {
    scheduler: Pick<OperationScheduler, 'submitPlan' | 'markUndone'>
    settings: SettingsStore
    events: EngineEventChannel
}

function succeededItems(record: OperationRecord): OperationItem[] {
    return record.items.filter((i) => i.status === 'succeeded')
}

function commonDestination(targets: readonly string[]): string | null {
    const parents = new Set(targets.map((t) => path.dirname(t)))
    return parents.size === 1 ? [...parents][0] : null
}

/** The operation that reverses `record`'s succeeded items. Throws `not_undoable`. */
export function buildInversePlan(record: OperationRecord): OperationPlan {
    const items = succeededItems(record)
    if (items.length === 0) {
        throw new FileEngineError('not_undoable', 'Nothing to undo: no item of this operation succeeded')
    }

    switch (record.kind) {
        case 'rename':
        case 'move': {
            const planned = items.flatMap((i) =>
                i.target === null
                    ? []
                    : [{ source: i.target, target: i.source, restoreFrom: i.replacedBackupPath }],
            )
            return {
                kind: record.kind,
                items: planned,
                destination: commonDestination(planned.map((i) => i.target)),
                conflict: 'fail',
                permanent: false,
            }
        }
        case 'copy':
            return {
                kind: 'delete',
                items: items.flatMap((i) =>
                    i.target === null ? [] : [{ source: i.target, target: null, restoreFrom: i.replacedBackupPath }],
                ),
                destination: null,
                conflict: 'fail',
                permanent: true,
            }
        case 'delete': {
            const restorable = items.flatMap((i) =>
                i.backupPath === undefined ? [] : [{ source: i.backupPath, target: i.source }],
            )
            if (restorable.length !== items.length) {
                throw new FileEngineError('not_undoable', 'Permanently deleted items cannot be restored')
            }
            return {
                kind: 'move',
                items: restorable,
                destination: commonDestination(restorable.map((i) => i.target)),
                conflict: 'fail',
                permanent: false,
            }
        }
    }
}

/**
 * The operation that repeats `record`'s succeeded items at their original targets. Items that
 * replaced an entry the first time replace it again, backed up as before.
 */
export function buildRedoPlan(record: OperationRecord): OperationPlan {
    const succeeded = succeededItems(record)
    const replaces = succeeded.some((i) => i.replacedBackupPath !== undefined)
    return {
        kind: record.kind,
        items: succeeded.map((i) => ({ source: i.source, target: i.target })),
        destination: record.destination,
        conflict: replaces ? 'overwrite' : 'fail',
        permanent: false,
    }
}

function hasSucceeded(record: OperationRecord): boolean {
    return record.items.some((i) => i.status === 'succeeded')
}

export function createUndoLedger(options: UndoLedgerOptions) {
    const { scheduler, settings, events } = options
    let undoStack: OperationRecord[] = []
    let redoStack: OperationRecord[] = []
    let busy = 0

    function maxHistory(): number {
        return settings.get('undo.maxHistory')
    }

    function trim(stack: OperationRecord[]): OperationRecord[] {
        const limit = maxHistory()
        return stack.length > limit ? stack.slice(stack.length - limit) : stack
    }

    function notify(): void {
        events.emit('ledger-changed', {
            canUndo: undoStack.length > 0,
            canRedo: redoStack.length > 0,
            undoDepth: undoStack.length,
            redoDepth: redoStack.length,
        })
    }

    const unlistenLimit = settings.onSpecificChange('undo.maxHistory', () => {
        undoStack = trim(undoStack)
        redoStack = trim(redoStack)
        notify()
    })

    // A new edit makes the undone future unreachable as soon as it is submitted
    const unlistenSubmissions = events.listen('operation-status', ({ status, record }) => {
        if (status !== 'pending' || record.origin !== 'user' || redoStack.length === 0) return
        log.debug('Dropping {depth} redo entries for {id}', { depth: redoStack.length, id: record.id })
        redoStack = []
        notify()
    })

    /** Runs `plan` and calls `settle` with the outcome before the handle's `done` resolves. */
    function submitTracked(
        plan: OperationPlan,
        origin: 'undo' | 'redo',
        relatedId: string,
        settle: (result: OperationRecord) => void,
    ): OperationHandle {
        busy++
        const handle = scheduler.submitPlan(plan, { origin, relatedId })
        const done = handle.done.then((result) => {
            busy--
            settle(result)
            return result
        })
        return { ...handle, done }
    }

    return {
        /**
         * Appends a finished record if at least one item succeeded. Records of undo origin are
         * skipped. The redo stack was already cleared when a user operation was submitted.
         */
        record(record: OperationRecord): void {
            if (record.origin === 'undo' || !hasSucceeded(record)) return
            undoStack = trim([...undoStack, record])
            log.debug('Recorded {kind} {id} (undo depth {depth})', {
                kind: record.kind,
                id: record.id,
                depth: undoStack.length,
            })
            notify()
        },

        /** Reverses the latest record. Throws `not_undoable` on an empty stack or an irreversible record. */
        undo(): OperationHandle {
            const record = undoStack.at(-1)
            if (record === undefined) {
                throw new FileEngineError('not_undoable', 'Nothing to undo')
            }
            undoStack = undoStack.slice(0, -1)

            let plan: OperationPlan
            try {
                plan = buildInversePlan(record)
            } catch (error) {
                log.warn('Discarding {id}: {error}', { id: record.id, error })
                notify()
                throw error
            }

            log.info('Undoing {kind} {id}', { kind: record.kind, id: record.id })
            notify()
            return submitTracked(plan, 'undo', record.id, (result) => {
                if (!hasSucceeded(result)) {
                    log.warn('Undo of {id} failed; keeping it on the undo stack', { id: record.id })
                    undoStack = trim([...undoStack, record])
                    notify()
                    return
                }
                // Only the items the inverse reversed can be redone; inverse items follow the same order
                const reversed = succeededItems(record).filter((_, k) => result.items[k].status === 'succeeded')
                const undone: OperationRecord = { ...record, status: 'undone', items: reversed }
                scheduler.markUndone(record.id)
                redoStack = trim([...redoStack, undone])
                notify()
            })
        },

        /** Re-applies the latest undone record. Throws `not_undoable` on an empty stack. */
        redo(): OperationHandle {
            const record = redoStack.at(-1)
            if (record === undefined) {
                throw new FileEngineError('not_undoable', 'Nothing to redo')
            }
            redoStack = redoStack.slice(0, -1)
            log.info('Redoing {kind} {id}', { kind: record.kind, id: record.id })
            notify()

            return submitTracked(buildRedoPlan(record), 'redo', record.id, (result) => {
                if (!hasSucceeded(result)) {
                    log.warn('Redo of {id} failed; keeping it on the redo stack', { id: record.id })
                    redoStack = trim([...redoStack, record])
                    notify()
                }
            })
        },

        canUndo(): boolean {
            return undoStack.length > 0
        },

        canRedo(): boolean {
            return redoStack.length > 0
        },

        /** True while an undo or redo is running. */
        isBusy(): boolean {
            return busy > 0
        },

        /** Latest last. */
        undoHistory(): OperationRecord[] {
            return [...undoStack]
        },

        redoHistory(): OperationRecord[] {
            return [...redoStack]
        },

        clear(): void {
            undoStack = []
            redoStack = []
            notify()
        },

        dispose(): void {
            unlistenLimit()
            unlistenSubmissions()
        },
    }
}

export type UndoLedger = ReturnType<typeof createUndoLedger>
