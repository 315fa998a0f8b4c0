/**
 * In-memory settings store. Starts from the registry defaults and validates every write.
 * Each engine owns one store.
 */

import { getAppLogger } from '$lib/logger'
import {
    getDefaultValue,
    isSettingId,
    isValidSettingValue,
    listSettingDefinitions,
    validateSettingValue,
} from './settings-registry'
import type { SettingId, SettingsValues } from './types'
import { SettingValidationError } from './types'

const log = getAppLogger('settings')

export type SettingChangeListener = (id: SettingId) => void

export interface SettingsStore {
    get<K extends SettingId>(id: K): SettingsValues[K]
    /** Throws SettingValidationError if invalid. */
    set<K extends SettingId>(id: K, value: SettingsValues[K]): void
    reset(id: SettingId): void
    resetAll(): void
    isModified(id: SettingId): boolean
    /**
     * Bulk-loads plain values (for example, parsed from a config file by the embedder).
     * Unknown ids and invalid values are skipped and reported; valid ones are applied.
     */
    load(values: Record<string, unknown>): { applied: SettingId[]; rejected: SettingValidationError[] }
    /** Subscribe to all setting changes. */
    onChange(listener: SettingChangeListener): () => void
    /** Subscribe to changes for a specific setting. */
    onSpecificChange<K extends SettingId>(id: K, listener: (value: SettingsValues[K]) => void): () => void
    getAll(): SettingsValues
}

export function createSettingsStore(initial?: Partial<SettingsValues>): SettingsStore {
    const values: SettingsValues = defaultValues()
    const listeners = new Set<SettingChangeListener>()

    function get<K extends SettingId>(id: K): SettingsValues[K] {
        return values[id]
    }

    function notifyListeners(id: SettingId): void {
        for (const listener of listeners) {
            try {
                listener(id)
            } catch (error) {
                log.error('Setting change listener error: {error}', { error })
            }
        }
    }

    function store<K extends SettingId>(id: K, value: SettingsValues[K]): boolean {
        const previous = get(id)
        values[id] = value
        return previous !== value
    }

    function set<K extends SettingId>(id: K, value: SettingsValues[K]): void {
        validateSettingValue(id, value)
        log.debug('setSetting({id}, {value})', { id, value })
        if (store(id, value)) notifyListeners(id)
    }

    function loadOne<K extends SettingId>(id: K, value: unknown): boolean {
        if (!isValidSettingValue(id, value)) return false
        return store(id, value)
    }

    const api: SettingsStore = {
        get,
        set,

        reset(id) {
            if (store(id, getDefaultValue(id))) notifyListeners(id)
        },

        resetAll() {
            for (const def of listSettingDefinitions()) {
                api.reset(def.id)
            }
        },

        isModified(id) {
            return get(id) !== getDefaultValue(id)
        },

        load(input) {
            const applied: SettingId[] = []
            const rejected: SettingValidationError[] = []
            const changed: SettingId[] = []

            for (const [id, value] of Object.entries(input)) {
                if (!isSettingId(id)) {
                    rejected.push(new SettingValidationError(id, 'Unknown setting'))
                    continue
                }
                try {
                    validateSettingValue(id, value)
                } catch (error) {
                    if (!(error instanceof SettingValidationError)) throw error
                    log.warn('Invalid value for {id}, keeping current', { id })
                    rejected.push(error)
                    continue
                }
                applied.push(id)
                if (loadOne(id, value)) changed.push(id)
            }

            for (const id of changed) notifyListeners(id)
            log.info('Settings loaded: {applied} applied, {rejected} rejected', {
                applied: applied.length,
                rejected: rejected.length,
            })
            return { applied, rejected }
        },

        onChange(listener) {
            listeners.add(listener)
            return () => {
                listeners.delete(listener)
            }
        },

        onSpecificChange(id, listener) {
            return api.onChange((changedId) => {
                if (changedId === id) listener(get(id))
            })
        },

        getAll() {
            return { ...values }
        },
    }

    if (initial) {
        const { rejected } = api.load(initial)
        if (rejected.length > 0) throw rejected[0]
    }

    return api
}

function defaultValues(): SettingsValues {
    return {
        'navigation.maxHistory': getDefaultValue('navigation.maxHistory'),
        'navigation.snapshotCacheSize': getDefaultValue('navigation.snapshotCacheSize'),
        'navigation.snapshotCacheTtl': getDefaultValue('navigation.snapshotCacheTtl'),
        'listing.showHidden': getDefaultValue('listing.showHidden'),
        'listing.sortBy': getDefaultValue('listing.sortBy'),
        'listing.sortOrder': getDefaultValue('listing.sortOrder'),
        'listing.directoriesFirst': getDefaultValue('listing.directoriesFirst'),
        'fileOperations.maxConcurrency': getDefaultValue('fileOperations.maxConcurrency'),
        'fileOperations.progressUpdateInterval': getDefaultValue('fileOperations.progressUpdateInterval'),
        'fileOperations.copyChunkSize': getDefaultValue('fileOperations.copyChunkSize'),
        'fileOperations.deletePermanently': getDefaultValue('fileOperations.deletePermanently'),
        'fileOperations.conflictDefault': getDefaultValue('fileOperations.conflictDefault'),
        'undo.maxHistory': getDefaultValue('undo.maxHistory'),
        'watcher.debounce': getDefaultValue('watcher.debounce'),
        'filter.caseSensitive': getDefaultValue('filter.caseSensitive'),
        'developer.verboseLogging': getDefaultValue('developer.verboseLogging'),
    }
}

export { SettingValidationError }
