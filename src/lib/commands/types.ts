/**
 * Intent and result types for the command boundary. The keybinding layer maps keys to intents;
 * everything below `dispatch` only ever sees these values.
 */

import type { FileEngineErrorCode } from '$lib/errors'
import type { FilterState, PaneId, PaneView, SelectionMode, SortConfig } from '$lib/file-explorer/types'
import type { ConflictResolution, OperationRecord, OperationRequest } from '$lib/file-operations/types'

export type CommandIntent =
    | { type: 'open-pane'; path: string; showHidden?: boolean; sort?: Partial<SortConfig> }
    | { type: 'close-pane'; paneId: PaneId }
    | { type: 'navigate'; paneId: PaneId; path: string }
    | { type: 'back'; paneId: PaneId }
    | { type: 'forward'; paneId: PaneId }
    | { type: 'refresh'; paneId: PaneId }
    | { type: 'select'; paneId: PaneId; paths: string[]; mode?: SelectionMode }
    | { type: 'set-filter-query'; paneId: PaneId; query: string }
    | { type: 'set-sort'; paneId: PaneId; sort: Partial<SortConfig> }
    /** Flips the pane's hidden-file visibility, or sets it when `showHidden` is given */
    | { type: 'toggle-hidden'; paneId: PaneId; showHidden?: boolean }
    | { type: 'submit-operation'; request: OperationRequest }
    | { type: 'cancel-operation'; operationId: string }
    | {
          type: 'resolve-conflict'
          operationId: string
          source: string
          resolution: ConflictResolution
          applyToAll?: boolean
      }
    | { type: 'undo' }
    | { type: 'redo' }

export type CommandIntentType = CommandIntent['type']

export type IntentOf<T extends CommandIntentType> = Extract<CommandIntent, { type: T }>

/** What a successful intent produced. */
export type CommandValue =
    | { type: 'pane'; pane: PaneView }
    | { type: 'pane-closed'; paneId: PaneId }
    | { type: 'selection'; paneId: PaneId; selection: string[] }
    | { type: 'filter'; paneId: PaneId; filter: FilterState }
    /** `done` resolves with the final record and never rejects */
    | { type: 'operation'; operationId: string; done: Promise<OperationRecord> }
    /** `cancelled` is false when the operation had already finished */
    | { type: 'operation-cancelled'; operationId: string; cancelled: boolean }
    | { type: 'conflict-resolved'; operationId: string; source: string }

export interface CommandError {
    code: FileEngineErrorCode
    message: string
    path?: string
}

export type CommandResult =
    | { ok: true; intent: CommandIntentType; value: CommandValue }
    | { ok: false; intent: CommandIntentType; error: CommandError }

/** A catalog entry: how an intent is named to the user */
export interface CommandDescriptor {
    type: CommandIntentType
    /** Display name, for example in a command palette */
    name: string
    /** Toast prefix when the intent fails */
    failureTitle: string
    /** False for intents that only make sense with an argument the palette can't supply */
    showInPalette: boolean
}
