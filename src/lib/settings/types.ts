/**
 * Settings system type definitions.
 */

import type { SortColumn, SortOrder } from '$lib/file-explorer/types'

// ============================================================================
// Core Types
// ============================================================================

export type SettingType = 'boolean' | 'number' | 'enum' | 'duration'

export interface EnumOption {
    value: string
    label: string
    description?: string
}

export interface SettingConstraints {
    // For 'number' type
    min?: number
    max?: number
    /** Values must be whole numbers */
    integer?: boolean

    // For 'enum' type
    options?: EnumOption[]

    // For 'duration' type (milliseconds)
    minMs?: number
    maxMs?: number
}

// ============================================================================
// Setting Value Types (for type-safe access)
// ============================================================================

/** What to do when a copy/move target already exists and the request carries no policy */
export type ConflictDefault = 'ask' | 'fail'

export interface SettingsValues {
    // Navigation
    'navigation.maxHistory': number
    'navigation.snapshotCacheSize': number
    'navigation.snapshotCacheTtl': number

    // Listing
    'listing.showHidden': boolean
    'listing.sortBy': SortColumn
    'listing.sortOrder': SortOrder
    'listing.directoriesFirst': boolean

    // File operations
    'fileOperations.maxConcurrency': number
    'fileOperations.progressUpdateInterval': number
    'fileOperations.copyChunkSize': number
    'fileOperations.deletePermanently': boolean
    'fileOperations.conflictDefault': ConflictDefault

    // Undo
    'undo.maxHistory': number

    // Watcher
    'watcher.debounce': number

    // Filter
    'filter.caseSensitive': boolean

    // Developer
    'developer.verboseLogging': boolean
}

export type SettingId = keyof SettingsValues

export interface SettingDefinition<K extends SettingId = SettingId> {
    // Identity
    id: K
    section: string[]

    // Display
    label: string
    description: string

    // Type and constraints
    type: SettingType
    default: SettingsValues[K]
    constraints?: SettingConstraints
}

/** The registry, keyed by id so each definition's default is typed by its own setting. */
export type SettingsRegistry = { [K in SettingId]: SettingDefinition<K> }

// ============================================================================
// Validation Error
// ============================================================================

export class SettingValidationError extends Error {
    constructor(
        public settingId: string,
        public reason: string,
    ) {
        super(`Invalid value for setting '${settingId}': ${reason}`)
        this.name = 'SettingValidationError'
    }
}
