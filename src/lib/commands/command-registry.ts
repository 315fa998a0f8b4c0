/**
 * Every intent the engine accepts, with the names the presentation layer shows for it.
 */

import type { CommandDescriptor, CommandIntentType } from './types'

export const commandCatalog: readonly CommandDescriptor[] = [
    // ============================================================================
    // Panes
    // ============================================================================
    { type: 'open-pane', name: 'Open pane', failureTitle: "Couldn't open the folder", showInPalette: false },
    { type: 'close-pane', name: 'Close pane', failureTitle: "Couldn't close the pane", showInPalette: true },
    { type: 'refresh', name: 'Refresh', failureTitle: "Couldn't refresh", showInPalette: true },
    { type: 'toggle-hidden', name: 'Toggle hidden files', failureTitle: "Couldn't show hidden files", showInPalette: true },
    { type: 'set-sort', name: 'Change sorting', failureTitle: "Couldn't sort", showInPalette: false },

    // ============================================================================
    // Navigation
    // ============================================================================
    { type: 'navigate', name: 'Go to folder', failureTitle: "Couldn't open the folder", showInPalette: false },
    { type: 'back', name: 'Go back', failureTitle: "Couldn't go back", showInPalette: true },
    { type: 'forward', name: 'Go forward', failureTitle: "Couldn't go forward", showInPalette: true },

    // ============================================================================
    // Selection and filter
    // ============================================================================
    { type: 'select', name: 'Select', failureTitle: "Couldn't select", showInPalette: false },
    { type: 'set-filter-query', name: 'Filter', failureTitle: "Couldn't filter", showInPalette: false },

    // ============================================================================
    // File operations
    // ============================================================================
    { type: 'submit-operation', name: 'Run file operation', failureTitle: "Couldn't start", showInPalette: false },
    { type: 'cancel-operation', name: 'Cancel operation', failureTitle: "Couldn't cancel", showInPalette: false },
    {
        type: 'resolve-conflict',
        name: 'Resolve conflict',
        failureTitle: "Couldn't resolve the conflict",
        showInPalette: false,
    },
    { type: 'undo', name: 'Undo', failureTitle: "Couldn't undo", showInPalette: true },
    { type: 'redo', name: 'Redo', failureTitle: "Couldn't redo", showInPalette: true },
]

const byType = new Map(commandCatalog.map((c) => [c.type, c]))

export function getCommandDescriptor(type: CommandIntentType): CommandDescriptor {
    const descriptor = byType.get(type)
    if (!descriptor) {
        throw new Error(`Intent missing from the catalog: ${type}`)
    }
    return descriptor
}

/** Descriptors a command palette can list. */
export function getPaletteCommands(): CommandDescriptor[] {
    return commandCatalog.filter((c) => c.showInPalette)
}
