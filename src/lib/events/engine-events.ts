// Push notifications the engine emits to its host

import type { DirectorySnapshot, FilterState, ListingErrorInfo, PaneId } from '$lib/file-explorer/types'
import type { ConflictRequest, OperationProgressEvent, OperationStatusEvent } from '$lib/file-operations/types'
import type { EventChannel } from './event-channel'

export interface EngineEvents {
    'snapshot-changed': { paneId: PaneId; snapshot: DirectorySnapshot }
    'selection-changed': { paneId: PaneId; selection: string[] }
    'filter-changed': { paneId: PaneId; filter: FilterState }
    'pane-error': { paneId: PaneId; error: ListingErrorInfo }
    'pane-closed': { paneId: PaneId }
    'operation-status': OperationStatusEvent
    'operation-progress': OperationProgressEvent
    'operation-conflict': ConflictRequest
    'ledger-changed': { canUndo: boolean; canRedo: boolean; undoDepth: number; redoDepth: number }
}

export type EngineEventChannel = EventChannel<EngineEvents>
