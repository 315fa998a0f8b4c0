/**
 * File operation scheduler: runs copy/move/delete/rename batches in the background.
 *
 * A batch becomes one suboperation per source. Suboperations of a batch run up to
 * `fileOperations.maxConcurrency` at a time, and no two of them work in the same destination
 * directory at once (for deletes, the source's parent). On submission a batch takes its place in
 * line for each of its destination directories and keeps it until its last item there is done,
 * so batches touching one directory run in submission order. That includes time spent waiting
 * for a conflict answer.
 *
 * An overwritten target is moved into the operation's backup directory, so undo can put it back.
 *
 * Per-item failures land in the record's manifest and never stop siblings; `done` never rejects.
 * Each completed item is reported to the panes right away with a fresh clock stamp.
 */

import { randomUUID } from 'crypto'
import { mkdir, rm } from 'fs/promises'
import { tmpdir } from 'os'
import path from 'path'
import { classifyFsError, FileEngineError, OperationCancelled, OperationFailure } from '$lib/errors'
import type { EngineEventChannel } from '$lib/events/engine-events'
import type { UnlistenFn } from '$lib/events/event-channel'
import type { LocalChange } from '$lib/file-explorer/directory-state-manager'
import { isWithinRoot, normalizePath } from '$lib/file-explorer/paths'
import type { DirectorySnapshot, PaneId } from '$lib/file-explorer/types'
import { getAppLogger } from '$lib/logger'
import type { SettingsStore } from '$lib/settings/settings-store'
import type { MonotonicClock } from '$lib/utils/clock'
import { createThrottle, type Throttle } from '$lib/utils/timing'
import { createKeyedLock, createLimiter, type KeyedLock, type Limiter, type Release } from './concurrency'
import {
    copyTree,
    lstatOrNull,
    measureTree,
    moveTree,
    nextFreeName,
    removeTree,
    throwIfCancelled,
    type TransferContext,
} from './fs-actions'
import { planRequest } from './operation-plan'
import type {
    ConflictRequest,
    ConflictResolution,
    ItemStatus,
    OperationHandle,
    OperationItem,
    OperationOrigin,
    OperationPlan,
    OperationProgressEvent,
    OperationRecord,
    OperationRequest,
    OperationStatus,
    OperationStatusEvent,
    PlannedItem,
} from './types'

const log = getAppLogger('fileOperations')

/** Finished records kept for `getOperation` */
const MAX_RETAINED_RECORDS = 500

/** What the scheduler needs from the pane side */
export interface PaneBridge {
    getSnapshot(paneId: PaneId): DirectorySnapshot | undefined
    applyLocalChanges(changes: readonly LocalChange[]): Promise<void>
}

export interface OperationSchedulerOptions {
    settings: SettingsStore
    events: EngineEventChannel
    clock: MonotonicClock
    panes?: PaneBridge
    /** Where deletes park entries; one subdirectory per operation */
    backupRoot?: string
    now?: () => number
}

export interface SubmitOptions {
    origin?: OperationOrigin
    relatedId?: string
}

export interface OperationEventHandlers {
    onStatus?(event: OperationStatusEvent): void
    onProgress?(event: OperationProgressEvent): void
    onConflict?(request: ConflictRequest): void
}

/** A batch's place in line for one directory */
interface Reservation {
    ticket: Promise<Release>
    /** Items of the batch still to finish there */
    remaining: number
}

interface ActiveOperation {
    record: OperationRecord
    plan: OperationPlan
    controller: AbortController
    /** Directory key per item */
    lockKeys: string[]
    reservations: Map<string, Reservation>
    /** Keeps the batch's own items in one directory one at a time */
    directoryLocks: KeyedLock
    /** Paused items by source path */
    pendingConflicts: Map<string, (resolution: ConflictResolution) => void>
    /** Set by an apply-to-all answer */
    sticky: ConflictResolution | null
    /** Bytes counted so far per item */
    credited: number[]
    currentItem: string | null
    progressThrottle: Throttle
    done: Promise<OperationRecord>
}

function snapshotRecord(record: OperationRecord): OperationRecord {
    return structuredClone(record)
}

function finalStatus(items: readonly OperationItem[], cancelled: boolean): OperationStatus {
    if (cancelled && items.some((i) => i.status === 'cancelled')) return 'cancelled'
    const ok = items.filter((i) => i.status === 'succeeded' || i.status === 'skipped').length
    if (ok === items.length) return 'completed'
    if (ok === 0) return 'failed'
    return 'partially_completed'
}

function lockKey(kind: OperationPlan['kind'], item: PlannedItem): string {
    if (kind === 'delete' || item.target === null) return path.dirname(item.source)
    return path.dirname(item.target)
}

export function createOperationScheduler(options: OperationSchedulerOptions) {
    const { settings, events, clock } = options
    const now = options.now ?? Date.now
    const backupRoot = options.backupRoot ?? path.join(tmpdir(), 'pane-engine-backups')
    const records = new Map<string, OperationRecord>()
    const active = new Map<string, ActiveOperation>()
    const finishedListeners = new Set<(record: OperationRecord) => void>()
    const locks = createKeyedLock()
    let sequence = 0

    // ========================================================================
    // Records and events
    // ========================================================================

    function transition(record: OperationRecord, status: OperationStatus): void {
        record.status = status
        record.transitions.push({ status, at: now() })
        events.emit('operation-status', { operationId: record.id, status, record: snapshotRecord(record) })
    }

    function emitProgress(op: ActiveOperation): void {
        events.emit('operation-progress', {
            operationId: op.record.id,
            kind: op.record.kind,
            currentItem: op.currentItem,
            progress: { ...op.record.progress },
        })
    }

    function credit(op: ActiveOperation, index: number, bytes: number): void {
        const room = op.record.items[index].bytes - op.credited[index]
        const added = Math.min(room, bytes)
        if (added <= 0) return
        op.credited[index] += added
        op.record.progress.bytesDone += added
        op.progressThrottle.call()
    }

    function finishItem(op: ActiveOperation, index: number, status: ItemStatus): void {
        const item = op.record.items[index]
        item.status = status
        if (status !== 'cancelled') credit(op, index, item.bytes)
        op.record.progress.itemsDone++
        op.currentItem = null
        op.progressThrottle.cancel()
        emitProgress(op)
    }

    function failItem(op: ActiveOperation, index: number, error: unknown): void {
        const item = op.record.items[index]
        item.error = error instanceof OperationFailure ? error.error : classifyFsError(error, item.source)
        log.warn('{kind} of {path} failed: {error}', { kind: op.record.kind, path: item.source, error: item.error.type })
        finishItem(op, index, 'failed')
    }

    function notifyPanes(changes: LocalChange[]): void {
        if (!options.panes || changes.length === 0) return
        void options.panes.applyLocalChanges(changes)
    }

    // ========================================================================
    // Directory reservations
    // ========================================================================

    /** Synchronous, so reservations follow submission order. */
    function reserve(keys: readonly string[]): Map<string, Reservation> {
        const reservations = new Map<string, Reservation>()
        for (const key of keys) {
            const existing = reservations.get(key)
            if (existing) {
                existing.remaining++
            } else {
                reservations.set(key, { ticket: locks.acquire(key), remaining: 1 })
            }
        }
        return reservations
    }

    function giveUp(reservation: Reservation): void {
        void reservation.ticket.then((release) => {
            release()
        })
    }

    function itemDone(op: ActiveOperation, key: string): void {
        const reservation = op.reservations.get(key)
        if (!reservation) return
        reservation.remaining--
        if (reservation.remaining > 0) return
        op.reservations.delete(key)
        giveUp(reservation)
    }

    function pruneRecords(): void {
        for (const id of records.keys()) {
            if (records.size <= MAX_RETAINED_RECORDS) return
            if (!active.has(id)) records.delete(id)
        }
    }

    // ========================================================================
    // Conflicts
    // ========================================================================

    function askUser(op: ActiveOperation, item: OperationItem, target: string, existing: { isDirectory: boolean; size: number }) {
        if (op.controller.signal.aborted) return Promise.resolve<ConflictResolution>('skip')
        return new Promise<ConflictResolution>((resolve) => {
            op.pendingConflicts.set(item.source, resolve)
            log.info('Waiting for a conflict answer on {target}', { target })
            events.emit('operation-conflict', {
                operationId: op.record.id,
                source: item.source,
                target,
                sourceIsDirectory: item.isDirectory,
                targetIsDirectory: existing.isDirectory,
                sourceSize: item.bytes,
                targetSize: existing.size,
            })
        })
    }

    /** Null when the target is free. */
    async function decideConflict(op: ActiveOperation, item: OperationItem): Promise<ConflictResolution | null> {
        if (item.target === null) return null
        const existing = await lstatOrNull(item.target)
        if (!existing) return null
        if (op.plan.conflict !== 'default') return op.plan.conflict
        if (op.sticky) return op.sticky
        if (settings.get('fileOperations.conflictDefault') === 'fail') return 'fail'
        return askUser(op, item, item.target, {
            isDirectory: existing.isDirectory(),
            size: existing.isFile() ? existing.size : 0,
        })
    }

    /** For moving replaced entries around, which is not part of the item's progress */
    function uncounted(op: ActiveOperation): TransferContext {
        return {
            signal: op.controller.signal,
            chunkSize: settings.get('fileOperations.copyChunkSize'),
            onBytes: () => undefined,
        }
    }

    function backupPathFor(op: ActiveOperation, index: number, entry: string): string | null {
        if (op.record.backupDir === null) return null
        return path.join(op.record.backupDir, String(index), path.basename(entry))
    }

    /** Runs under the directory lock: the target may have changed since the conflict was decided. */
    async function claimTarget(
        op: ActiveOperation,
        index: number,
        target: string,
        resolution: ConflictResolution | null,
    ): Promise<string> {
        const item = op.record.items[index]
        const existing = await lstatOrNull(target)
        if (!existing) return target
        if (resolution === 'rename') {
            const renamed = await nextFreeName(target, item.isDirectory)
            item.target = renamed
            return renamed
        }
        if (resolution !== 'overwrite' || target === item.source) {
            throw new OperationFailure({ type: 'already_exists', path: target })
        }

        const backupPath = backupPathFor(op, index, target)
        if (backupPath === null) {
            await removeTree(target)
            return target
        }
        await mkdir(path.dirname(backupPath), { recursive: true })
        await moveTree(target, backupPath, uncounted(op))
        item.replacedBackupPath = backupPath
        log.debug('Moved replaced {target} to {backupPath}', { target, backupPath })
        return target
    }

    /** Puts back the entry a reversed item had replaced. */
    async function restoreReplaced(op: ActiveOperation, index: number): Promise<LocalChange[]> {
        const { restoreFrom } = op.plan.items[index]
        if (restoreFrom === undefined) return []
        const { source } = op.record.items[index]
        await moveTree(restoreFrom, source, uncounted(op))
        return [{ type: 'upsert', path: source, timestamp: clock.now() }]
    }

    // ========================================================================
    // Execution
    // ========================================================================

    async function perform(
        op: ActiveOperation,
        index: number,
        resolution: ConflictResolution | null,
    ): Promise<LocalChange[]> {
        const { signal } = op.controller
        const item = op.record.items[index]
        throwIfCancelled(signal)
        item.status = 'in_progress'
        op.currentItem = path.basename(item.source)

        const ctx: TransferContext = {
            signal,
            chunkSize: settings.get('fileOperations.copyChunkSize'),
            onBytes: (bytes) => {
                credit(op, index, bytes)
            },
        }
        const stamp = () => clock.now()

        if (op.plan.kind === 'delete') {
            const backupPath = op.plan.permanent ? null : backupPathFor(op, index, item.source)
            if (backupPath === null) {
                await rm(item.source, { recursive: true })
                return [{ type: 'remove', path: item.source, timestamp: stamp() }, ...(await restoreReplaced(op, index))]
            }
            await mkdir(path.dirname(backupPath), { recursive: true })
            await moveTree(item.source, backupPath, ctx)
            item.backupPath = backupPath
            return [{ type: 'remove', path: item.source, timestamp: stamp() }]
        }

        if (item.target === null) {
            throw new OperationFailure({ type: 'io_error', path: item.source, message: 'No target' })
        }
        const target = await claimTarget(op, index, item.target, resolution)
        throwIfCancelled(signal)

        if (op.plan.kind === 'copy') {
            await copyTree(item.source, target, ctx)
            return [{ type: 'upsert', path: target, timestamp: stamp() }]
        }

        await moveTree(item.source, target, ctx)
        const timestamp = stamp()
        return [
            { type: 'remove', path: item.source, timestamp },
            { type: 'upsert', path: target, timestamp },
            ...(await restoreReplaced(op, index)),
        ]
    }

    async function runItem(op: ActiveOperation, index: number, limiter: Limiter): Promise<void> {
        const key = op.lockKeys[index]
        try {
            await runReserved(op, index, limiter, key)
        } finally {
            itemDone(op, key)
        }
    }

    async function runReserved(op: ActiveOperation, index: number, limiter: Limiter, key: string): Promise<void> {
        const item = op.record.items[index]
        if (item.status !== 'pending') return
        const { signal } = op.controller

        try {
            if (item.target === item.source && op.plan.kind !== 'copy') {
                finishItem(op, index, 'skipped')
                return
            }
            // Earlier batches into this directory go first
            await op.reservations.get(key)?.ticket
            throwIfCancelled(signal)
            const resolution = await decideConflict(op, item)
            throwIfCancelled(signal)
            if (resolution === 'skip') {
                finishItem(op, index, 'skipped')
                return
            }
            if (resolution === 'fail') {
                throw new OperationFailure({ type: 'already_exists', path: item.target ?? item.source })
            }

            const release = await op.directoryLocks.acquire(key)
            let changes: LocalChange[]
            try {
                changes = await limiter.run(() => perform(op, index, resolution))
                // Still under the lock, so the next item in this directory sees the cancel flag
                finishItem(op, index, 'succeeded')
            } finally {
                release()
            }
            notifyPanes(changes)
        } catch (error) {
            if (error instanceof OperationCancelled) {
                finishItem(op, index, 'cancelled')
            } else {
                failItem(op, index, error)
            }
        }
    }

    /** Sizes every item and rejects directories copied or moved into themselves. */
    async function scan(op: ActiveOperation): Promise<void> {
        const { record } = op
        await Promise.all(
            record.items.map(async (item, index) => {
                try {
                    const measure = await measureTree(item.source)
                    item.isDirectory = measure.isDirectory
                    item.bytes = measure.bytes
                } catch (error) {
                    failItem(op, index, error)
                    return
                }
                const moving = record.kind === 'copy' || record.kind === 'move'
                if (moving && item.isDirectory && item.target !== null && item.target !== item.source) {
                    const destination = path.dirname(item.target)
                    if (isWithinRoot(destination, item.source)) {
                        failItem(op, index, new OperationFailure({
                            type: 'destination_inside_source',
                            source: item.source,
                            destination,
                        }))
                    }
                }
            }),
        )
        record.progress.bytesTotal = record.items.reduce((sum, i) => sum + i.bytes, 0)
    }

    async function execute(op: ActiveOperation): Promise<void> {
        transition(op.record, 'in_progress')
        await scan(op)
        emitProgress(op)
        const limiter = createLimiter(() => settings.get('fileOperations.maxConcurrency'))
        await Promise.all(op.record.items.map((_, index) => runItem(op, index, limiter)))
    }

    function finalize(op: ActiveOperation): OperationRecord {
        const { record } = op
        op.progressThrottle.cancel()
        for (const reservation of op.reservations.values()) giveUp(reservation)
        op.reservations.clear()
        record.finishedAt = now()
        transition(record, finalStatus(record.items, op.controller.signal.aborted))
        active.delete(record.id)
        log.info('Operation {id} ({kind}) finished: {status}', { id: record.id, kind: record.kind, status: record.status })

        const final = snapshotRecord(record)
        for (const listener of finishedListeners) {
            try {
                listener(final)
            } catch (error) {
                log.error('Operation listener threw: {error}', { error })
            }
        }
        pruneRecords()
        return final
    }

    async function run(op: ActiveOperation): Promise<OperationRecord> {
        try {
            await execute(op)
        } catch (error) {
            log.error('Operation {id} failed unexpectedly: {error}', { id: op.record.id, error })
            op.record.items.forEach((item, index) => {
                if (item.status === 'pending' || item.status === 'in_progress') failItem(op, index, error)
            })
        }
        return finalize(op)
    }

    function cancel(operationId: string): boolean {
        const op = active.get(operationId)
        if (!op) return false
        if (!op.controller.signal.aborted) {
            log.info('Cancelling operation {id}', { id: operationId })
            op.controller.abort()
            for (const resolve of op.pendingConflicts.values()) resolve('skip')
            op.pendingConflicts.clear()
        }
        return true
    }

    // ========================================================================
    // Public API
    // ========================================================================

    function submitPlan(plan: OperationPlan, submitOptions: SubmitOptions = {}): OperationHandle {
        const id = randomUUID()
        const createdAt = now()
        const record: OperationRecord = {
            id,
            sequence: ++sequence,
            kind: plan.kind,
            origin: submitOptions.origin ?? 'user',
            sources: plan.items.map((i) => i.source),
            destination: plan.destination,
            items: plan.items.map((i) => ({
                source: i.source,
                target: i.target,
                status: 'pending',
                isDirectory: false,
                bytes: 0,
            })),
            status: 'pending',
            progress: { bytesDone: 0, bytesTotal: 0, itemsDone: 0, itemsTotal: plan.items.length },
            transitions: [{ status: 'pending', at: createdAt }],
            backupDir: plan.kind === 'delete' && plan.permanent ? null : path.join(backupRoot, id),
            relatedId: submitOptions.relatedId,
            createdAt,
            finishedAt: null,
        }

        const lockKeys = plan.items.map((item) => lockKey(plan.kind, item))
        let resolveDone: (record: OperationRecord) => void = () => undefined
        const op: ActiveOperation = {
            record,
            plan,
            controller: new AbortController(),
            lockKeys,
            reservations: reserve(lockKeys),
            directoryLocks: createKeyedLock(),
            pendingConflicts: new Map(),
            sticky: null,
            credited: plan.items.map(() => 0),
            currentItem: null,
            progressThrottle: createThrottle(() => {
                emitProgress(op)
            }, settings.get('fileOperations.progressUpdateInterval')),
            done: new Promise<OperationRecord>((resolve) => {
                resolveDone = resolve
            }),
        }
        records.set(id, record)
        active.set(id, op)

        log.info('Submitted {kind} of {count} items as {id} ({origin})', {
            kind: plan.kind,
            count: plan.items.length,
            id,
            origin: record.origin,
        })
        events.emit('operation-status', { operationId: id, status: 'pending', record: snapshotRecord(record) })

        // Start on a later turn so callers can subscribe before anything happens
        setImmediate(() => {
            void run(op).then(resolveDone)
        })

        return { id, done: op.done, cancel: () => void cancel(id) }
    }

    return {
        /** Validates and schedules a user request. Throws `invalid_request` / `not_found` without scheduling. */
        submit(request: OperationRequest): OperationHandle {
            const plan = planRequest(request, {
                getSnapshot: (paneId) => options.panes?.getSnapshot(paneId),
                deletePermanently: settings.get('fileOperations.deletePermanently'),
            })
            return submitPlan(plan, { origin: 'user' })
        },

        submitPlan,

        /** Cooperative: returns false for unknown or finished operations. */
        cancel,

        /**
         * Answers a paused conflict. With `applyToAll`, the answer also settles every other paused
         * item of the operation and any later conflict in it.
         */
        resolveConflict(operationId: string, source: string, resolution: ConflictResolution, applyToAll = false): boolean {
            const op = active.get(operationId)
            if (!op) return false
            const key = normalizePath(source)
            const pending = op.pendingConflicts.get(key)
            if (pending) {
                op.pendingConflicts.delete(key)
                pending(resolution)
            }
            if (applyToAll) {
                op.sticky = resolution
                for (const resolve of op.pendingConflicts.values()) resolve(resolution)
                op.pendingConflicts.clear()
            }
            return pending !== undefined || applyToAll
        },

        getOperation(operationId: string): OperationRecord | undefined {
            const record = records.get(operationId)
            return record ? snapshotRecord(record) : undefined
        },

        listActiveOperations(): OperationRecord[] {
            return [...active.values()].map((op) => snapshotRecord(op.record))
        },

        /** Events of one operation. */
        onOperationEvents(operationId: string, handlers: OperationEventHandlers): UnlistenFn {
            const unlisteners = [
                events.listen('operation-status', (event) => {
                    if (event.operationId === operationId) handlers.onStatus?.(event)
                }),
                events.listen('operation-progress', (event) => {
                    if (event.operationId === operationId) handlers.onProgress?.(event)
                }),
                events.listen('operation-conflict', (request) => {
                    if (request.operationId === operationId) handlers.onConflict?.(request)
                }),
            ]
            return () => {
                for (const unlisten of unlisteners) unlisten()
            }
        },

        /** Called with every finished record, before its `done` resolves. */
        onFinished(listener: (record: OperationRecord) => void): UnlistenFn {
            finishedListeners.add(listener)
            return () => {
                finishedListeners.delete(listener)
            }
        },

        /** Marks a finished record as reversed by an undo. */
        markUndone(operationId: string): void {
            const record = records.get(operationId)
            if (!record || active.has(operationId) || record.status === 'undone') return
            transition(record, 'undone')
        },

        /** Resolves once no operation is running. */
        async whenIdle(): Promise<void> {
            while (active.size > 0) {
                await Promise.all([...active.values()].map((op) => op.done))
            }
        },

        dispose(): void {
            for (const id of active.keys()) cancel(id)
        },
    }
}

export type OperationScheduler = ReturnType<typeof createOperationScheduler>

/** Rejects with `not_found` for unknown operations. */
export function requireOperation(scheduler: OperationScheduler, operationId: string): OperationRecord {
    const record = scheduler.getOperation(operationId)
    if (!record) throw new FileEngineError('not_found', `No such operation: ${operationId}`)
    return record
}
