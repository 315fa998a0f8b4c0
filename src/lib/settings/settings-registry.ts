/**
 * Settings registry - single source of truth for all settings.
 */

import type { SettingDefinition, SettingId, SettingsRegistry, SettingsValues } from './types'
import { SettingValidationError } from './types'

// ============================================================================
// Settings Definitions
// ============================================================================

export const settingsRegistry: SettingsRegistry = {
    // ========================================================================
    // Navigation
    // ========================================================================
    'navigation.maxHistory': {
        id: 'navigation.maxHistory',
        section: ['Navigation'],
        label: 'History length',
        description: 'How many locations each pane remembers for back and forward. The oldest are dropped first.',
        type: 'number',
        default: 100,
        constraints: { min: 1, max: 1000, integer: true },
    },
    'navigation.snapshotCacheSize': {
        id: 'navigation.snapshotCacheSize',
        section: ['Navigation'],
        label: 'Cached listings per pane',
        description: 'How many recently left directory listings each pane keeps for instant back and forward.',
        type: 'number',
        default: 8,
        constraints: { min: 0, max: 64, integer: true },
    },
    'navigation.snapshotCacheTtl': {
        id: 'navigation.snapshotCacheTtl',
        section: ['Navigation'],
        label: 'Cached listing lifetime',
        description: 'How long a cached listing may be shown before it must be listed again.',
        type: 'duration',
        default: 30_000,
        constraints: { minMs: 0, maxMs: 600_000 },
    },

    // ========================================================================
    // Listing
    // ========================================================================
    'listing.showHidden': {
        id: 'listing.showHidden',
        section: ['Listing'],
        label: 'Show hidden files',
        description: 'Show files and folders whose names start with a dot in newly opened panes.',
        type: 'boolean',
        default: false,
    },
    'listing.sortBy': {
        id: 'listing.sortBy',
        section: ['Listing'],
        label: 'Sort by',
        description: 'The column newly opened panes sort by.',
        type: 'enum',
        default: 'name',
        constraints: {
            options: [
                { value: 'name', label: 'Name' },
                { value: 'extension', label: 'Extension' },
                { value: 'size', label: 'Size' },
                { value: 'modified', label: 'Date modified' },
            ],
        },
    },
    'listing.sortOrder': {
        id: 'listing.sortOrder',
        section: ['Listing'],
        label: 'Sort order',
        description: 'The direction newly opened panes sort in.',
        type: 'enum',
        default: 'ascending',
        constraints: {
            options: [
                { value: 'ascending', label: 'Ascending' },
                { value: 'descending', label: 'Descending' },
            ],
        },
    },
    'listing.directoriesFirst': {
        id: 'listing.directoriesFirst',
        section: ['Listing'],
        label: 'Folders first',
        description: 'List folders before files, whatever the sort column.',
        type: 'boolean',
        default: true,
    },

    // ========================================================================
    // File operations
    // ========================================================================
    'fileOperations.maxConcurrency': {
        id: 'fileOperations.maxConcurrency',
        section: ['File operations'],
        label: 'Parallel items',
        description: 'How many items of one copy, move or delete run at the same time.',
        type: 'number',
        default: 4,
        constraints: { min: 1, max: 16, integer: true },
    },
    'fileOperations.progressUpdateInterval': {
        id: 'fileOperations.progressUpdateInterval',
        section: ['File operations'],
        label: 'Progress update interval',
        description: 'How often progress is reported during long copies.',
        type: 'duration',
        default: 200,
        constraints: { minMs: 16, maxMs: 5_000 },
    },
    'fileOperations.copyChunkSize': {
        id: 'fileOperations.copyChunkSize',
        section: ['File operations'],
        label: 'Copy buffer size',
        description: 'Bytes read per chunk when copying. Cancellation is checked on every chunk.',
        type: 'number',
        default: 64 * 1024,
        constraints: { min: 4 * 1024, max: 16 * 1024 * 1024, integer: true },
    },
    'fileOperations.deletePermanently': {
        id: 'fileOperations.deletePermanently',
        section: ['File operations'],
        label: 'Delete permanently',
        description: 'Remove files right away instead of keeping a backup. Permanent deletes cannot be undone.',
        type: 'boolean',
        default: false,
    },
    'fileOperations.conflictDefault': {
        id: 'fileOperations.conflictDefault',
        section: ['File operations'],
        label: 'When a target exists',
        description: 'What a copy or move does when the target already exists and no policy was chosen.',
        type: 'enum',
        default: 'ask',
        constraints: {
            options: [
                { value: 'ask', label: 'Ask', description: 'Pause that item until someone decides' },
                { value: 'fail', label: 'Fail the item', description: 'Report it as already existing' },
            ],
        },
    },

    // ========================================================================
    // Undo
    // ========================================================================
    'undo.maxHistory': {
        id: 'undo.maxHistory',
        section: ['Undo'],
        label: 'Undo steps',
        description: 'How many operations can be undone. The oldest are forgotten first.',
        type: 'number',
        default: 200,
        constraints: { min: 1, max: 10_000, integer: true },
    },

    // ========================================================================
    // Watcher
    // ========================================================================
    'watcher.debounce': {
        id: 'watcher.debounce',
        section: ['Advanced'],
        label: 'File watcher debounce',
        description: 'How long to collect filesystem changes before applying them to panes.',
        type: 'duration',
        default: 50,
        constraints: { minMs: 0, maxMs: 5_000 },
    },

    // ========================================================================
    // Filter
    // ========================================================================
    'filter.caseSensitive': {
        id: 'filter.caseSensitive',
        section: ['Filter'],
        label: 'Case-sensitive filter',
        description: 'Match upper and lower case exactly when filtering a pane.',
        type: 'boolean',
        default: false,
    },

    // ========================================================================
    // Developer
    // ========================================================================
    'developer.verboseLogging': {
        id: 'developer.verboseLogging',
        section: ['Developer'],
        label: 'Verbose logging',
        description: 'Log debug output for every part of the engine.',
        type: 'boolean',
        default: false,
    },
}

// ============================================================================
// Lookup
// ============================================================================

export function isSettingId(id: string): id is SettingId {
    return Object.prototype.hasOwnProperty.call(settingsRegistry, id)
}

export function getSettingDefinition<K extends SettingId>(id: K): SettingDefinition<K> {
    return settingsRegistry[id]
}

/** All definitions, in registry order. */
export function listSettingDefinitions(): SettingDefinition[] {
    return Object.values(settingsRegistry)
}

export function getSettingsInSection(section: string): SettingDefinition[] {
    return listSettingDefinitions().filter((s) => s.section[0] === section)
}

/**
 * Get the default value for a setting.
 */
export function getDefaultValue<K extends SettingId>(id: K): SettingsValues[K] {
    return settingsRegistry[id].default
}

// ============================================================================
// Validation
// ============================================================================

/**
 * Validate a value against a setting's constraints.
 * Throws SettingValidationError if invalid.
 */
export function validateSettingValue(id: string, value: unknown): void {
    if (!isSettingId(id)) {
        throw new SettingValidationError(id, 'Unknown setting')
    }
    const def: SettingDefinition = settingsRegistry[id]

    // Type checking
    switch (def.type) {
        case 'boolean':
            if (typeof value !== 'boolean') {
                throw new SettingValidationError(id, `Expected boolean, got ${typeof value}`)
            }
            break

        case 'number':
        case 'duration':
            if (typeof value !== 'number') {
                throw new SettingValidationError(id, `Expected number, got ${typeof value}`)
            }
            if (!Number.isFinite(value)) {
                throw new SettingValidationError(id, 'Value must be a finite number')
            }
            validateNumberConstraints(id, value, def)
            break

        case 'enum':
            validateEnumValue(id, value, def)
            break
    }
}

/** Type guard over `validateSettingValue`. */
export function isValidSettingValue<K extends SettingId>(id: K, value: unknown): value is SettingsValues[K] {
    try {
        validateSettingValue(id, value)
        return true
    } catch (error) {
        if (error instanceof SettingValidationError) return false
        throw error
    }
}

function validateNumberConstraints(id: string, value: number, def: SettingDefinition): void {
    const c = def.constraints
    if (!c) return

    // For duration type, check minMs/maxMs
    if (def.type === 'duration') {
        if (c.minMs !== undefined && value < c.minMs) {
            throw new SettingValidationError(id, `Value ${String(value)}ms is below minimum ${String(c.minMs)}ms`)
        }
        if (c.maxMs !== undefined && value > c.maxMs) {
            throw new SettingValidationError(id, `Value ${String(value)}ms exceeds maximum ${String(c.maxMs)}ms`)
        }
        return
    }

    if (c.integer && !Number.isInteger(value)) {
        throw new SettingValidationError(id, `Value ${String(value)} must be a whole number`)
    }
    if (c.min !== undefined && value < c.min) {
        throw new SettingValidationError(id, `Value ${String(value)} is below minimum ${String(c.min)}`)
    }
    if (c.max !== undefined && value > c.max) {
        throw new SettingValidationError(id, `Value ${String(value)} exceeds maximum ${String(c.max)}`)
    }
}

function validateEnumValue(id: string, value: unknown, def: SettingDefinition): void {
    const options = def.constraints?.options
    if (!options) return

    if (options.some((o) => o.value === value)) {
        return
    }

    const validValues = options.map((o) => o.value)
    throw new SettingValidationError(id, `Invalid value '${String(value)}'. Valid options: ${validValues.join(', ')}`)
}
