import type { OperationError } from '$lib/errors'
import type { PaneId } from '$lib/file-explorer/types'

// ============================================================================
// Requests
// ============================================================================

export type OperationKind = 'copy' | 'move' | 'delete' | 'rename'

/** How an existing copy/move target is handled without asking. */
export type ConflictPolicy = 'overwrite' | 'skip' | 'rename'

/** Answer to a conflict request. `fail` fails the item with `already_exists`. */
export type ConflictResolution = ConflictPolicy | 'fail'

export interface OperationRequest {
    kind: OperationKind
    sources: string[]
    /** Target directory for copy/move; new name (or full path) for rename */
    destination?: string
    /** When set, every source must be listed in this pane */
    paneId?: PaneId
    conflictPolicy?: ConflictPolicy
    /** Delete only: skip the backup (not undoable) */
    permanent?: boolean
}

export type OperationOrigin = 'user' | 'undo' | 'redo'

/** A fully resolved batch: every item's source and target are explicit. */
export interface OperationPlan {
    kind: OperationKind
    items: PlannedItem[]
    /** Directory copy/move targets are created in, for display */
    destination: string | null
    conflict: ConflictResolution | 'default'
    permanent: boolean
    paneId?: PaneId
}

export interface PlannedItem {
    source: string
    /** Null for delete */
    target: string | null
    /** Moved back to `source` once the item is done; puts back what the reversed item replaced */
    restoreFrom?: string
}

// ============================================================================
// Records
// ============================================================================

export type OperationStatus =
    | 'pending'
    | 'in_progress'
    | 'completed'
    | 'partially_completed'
    | 'failed'
    | 'cancelled'
    | 'undone'

export type ItemStatus = 'pending' | 'in_progress' | 'succeeded' | 'skipped' | 'failed' | 'cancelled'

export interface OperationItem {
    source: string
    /** Where the item ended up. Updated when a conflict renames it. Null for delete. */
    target: string | null
    status: ItemStatus
    error?: OperationError
    /** Where a deleted item was moved to. Absent for permanent deletes. */
    backupPath?: string
    /** Where the entry an overwrite replaced was moved to */
    replacedBackupPath?: string
    /** True if the item was a directory when scanned */
    isDirectory: boolean
    /** Bytes the item accounts for in progress totals */
    bytes: number
}

/** Progress for one operation. Every field only grows. */
export interface OperationProgress {
    bytesDone: number
    bytesTotal: number
    itemsDone: number
    itemsTotal: number
}

export interface StatusTransition {
    status: OperationStatus
    at: number
}

export interface OperationRecord {
    id: string
    /** Total order across all operations of a scheduler */
    sequence: number
    kind: OperationKind
    origin: OperationOrigin
    sources: string[]
    destination: string | null
    items: OperationItem[]
    status: OperationStatus
    progress: OperationProgress
    transitions: StatusTransition[]
    /** Per-operation directory for deleted and overwritten entries. Null for permanent deletes. */
    backupDir: string | null
    /** For undo and redo records, the record they reverse or repeat */
    relatedId?: string
    createdAt: number
    finishedAt: number | null
}

export interface OperationHandle {
    id: string
    /** Resolves with the final record. Never rejects. */
    done: Promise<OperationRecord>
    cancel(): void
}

// ============================================================================
// Events
// ============================================================================

export interface ConflictRequest {
    operationId: string
    source: string
    target: string
    sourceIsDirectory: boolean
    targetIsDirectory: boolean
    sourceSize: number
    targetSize: number
}

export interface OperationStatusEvent {
    operationId: string
    status: OperationStatus
    record: OperationRecord
}

export interface OperationProgressEvent {
    operationId: string
    kind: OperationKind
    /** Current item (filename only) */
    currentItem: string | null
    progress: OperationProgress
}

export const TERMINAL_STATUSES: readonly OperationStatus[] = [
    'completed',
    'partially_completed',
    'failed',
    'cancelled',
    'undone',
]

export function isTerminalStatus(status: OperationStatus): boolean {
    return TERMINAL_STATUSES.includes(status)
}
