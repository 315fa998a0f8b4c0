/**
 * The intent boundary. `dispatch` routes each intent to the pane manager, the scheduler or the
 * undo ledger and always resolves with a `CommandResult`: a failure comes back as `ok: false`
 * and as an error toast, never as a rejection. Operations that finish partially or not at all
 * get a toast of their own when they end.
 */

import { FileEngineError, isFileEngineError } from '$lib/errors'
import type { DirectoryStateManager } from '$lib/file-explorer/directory-state-manager'
import { describeOutcome, getTechnicalDetails, getUserFriendlyMessage } from '$lib/file-operations/error-messages'
import { requireOperation, type OperationScheduler } from '$lib/file-operations/scheduler'
import type { OperationHandle, OperationRecord } from '$lib/file-operations/types'
import { getAppLogger } from '$lib/logger'
import type { ToastStore } from '$lib/ui/toast/toast-store'
import type { UndoLedger } from '$lib/undo/undo-ledger'
import { getCommandDescriptor } from './command-registry'
import type { CommandError, CommandIntent, CommandResult, CommandValue, IntentOf } from './types'

const log = getAppLogger('commands')

export interface CommandDispatcherOptions {
    manager: DirectoryStateManager
    scheduler: OperationScheduler
    ledger: UndoLedger
    toasts: ToastStore
}

function toCommandError(error: unknown): CommandError {
    if (isFileEngineError(error)) {
        return error.path === undefined
            ? { code: error.code, message: error.message }
            : { code: error.code, message: error.message, path: error.path }
    }
    return { code: 'io_error', message: error instanceof Error ? error.message : String(error) }
}

export function createCommandDispatcher(options: CommandDispatcherOptions) {
    const { manager, scheduler, ledger, toasts } = options

    /** Toasts a finished operation unless every item went through. */
    function reportOutcome(record: OperationRecord): void {
        if (record.status !== 'partially_completed' && record.status !== 'failed') return

        const firstError = record.items.find((i) => i.error !== undefined)?.error
        const summary = describeOutcome(record)
        const content = firstError ? `${summary}. ${getUserFriendlyMessage(firstError, record.kind).title}` : summary
        if (firstError) {
            log.warn('{id} finished {status}: {details}', {
                id: record.id,
                status: record.status,
                details: getTechnicalDetails(firstError),
            })
        }
        toasts.addToast(content, {
            id: `operation-${record.id}`,
            level: record.status === 'failed' ? 'error' : 'warn',
        })
    }

    function trackOperation(handle: OperationHandle): CommandValue {
        void handle.done.then(reportOutcome)
        return { type: 'operation', operationId: handle.id, done: handle.done }
    }

    function cancelOperation(intent: IntentOf<'cancel-operation'>): CommandValue {
        if (scheduler.cancel(intent.operationId)) {
            return { type: 'operation-cancelled', operationId: intent.operationId, cancelled: true }
        }
        // Unknown ids fail; finished ones are a no-op
        requireOperation(scheduler, intent.operationId)
        return { type: 'operation-cancelled', operationId: intent.operationId, cancelled: false }
    }

    function resolveConflict(intent: IntentOf<'resolve-conflict'>): CommandValue {
        const resolved = scheduler.resolveConflict(
            intent.operationId,
            intent.source,
            intent.resolution,
            intent.applyToAll ?? false,
        )
        if (!resolved) {
            throw new FileEngineError(
                'invalid_request',
                `No conflict is waiting for ${intent.source} in ${intent.operationId}`,
                intent.source,
            )
        }
        return { type: 'conflict-resolved', operationId: intent.operationId, source: intent.source }
    }

    async function route(intent: CommandIntent): Promise<CommandValue> {
        switch (intent.type) {
            case 'open-pane':
                return {
                    type: 'pane',
                    pane: await manager.open(intent.path, { showHidden: intent.showHidden, sort: intent.sort }),
                }
            case 'close-pane':
                manager.close(intent.paneId)
                return { type: 'pane-closed', paneId: intent.paneId }
            case 'navigate':
                return { type: 'pane', pane: await manager.navigate(intent.paneId, intent.path) }
            case 'back':
                return { type: 'pane', pane: await manager.back(intent.paneId) }
            case 'forward':
                return { type: 'pane', pane: await manager.forward(intent.paneId) }
            case 'refresh':
                return { type: 'pane', pane: await manager.refresh(intent.paneId) }
            case 'select':
                return {
                    type: 'selection',
                    paneId: intent.paneId,
                    selection: manager.select(intent.paneId, intent.paths, intent.mode),
                }
            case 'set-filter-query':
                return {
                    type: 'filter',
                    paneId: intent.paneId,
                    filter: manager.setFilterQuery(intent.paneId, intent.query),
                }
            case 'set-sort':
                return { type: 'pane', pane: manager.setSort(intent.paneId, intent.sort) }
            case 'toggle-hidden': {
                const showHidden = intent.showHidden ?? !manager.getPane(intent.paneId).showHidden
                return { type: 'pane', pane: await manager.setShowHidden(intent.paneId, showHidden) }
            }
            case 'submit-operation':
                return trackOperation(scheduler.submit(intent.request))
            case 'cancel-operation':
                return cancelOperation(intent)
            case 'resolve-conflict':
                return resolveConflict(intent)
            case 'undo':
                return trackOperation(ledger.undo())
            case 'redo':
                return trackOperation(ledger.redo())
        }
    }

    return {
        /** Never rejects. */
        async dispatch(intent: CommandIntent): Promise<CommandResult> {
            try {
                const value = await route(intent)
                return { ok: true, intent: intent.type, value }
            } catch (error) {
                const commandError = toCommandError(error)
                const { failureTitle } = getCommandDescriptor(intent.type)
                log.warn('{intent} failed: {error}', { intent: intent.type, error })
                toasts.addToast(`${failureTitle}: ${commandError.message}`, { level: 'error' })
                return { ok: false, intent: intent.type, error: commandError }
            }
        },
    }
}

export type CommandDispatcher = ReturnType<typeof createCommandDispatcher>
