/**
 * Pushes settings that live outside the components reading them (logger level, watcher
 * debounce) to their owners, at startup and on every change. Settings the components read
 * on demand need no entry here.
 */

import type { WatcherAdapter } from '$lib/file-watcher/watcher-adapter'
import { getAppLogger, setVerboseLogging } from '$lib/logger'
import type { SettingsStore } from './settings-store'
import type { SettingId } from './types'

const log = getAppLogger('settingsApplier')

export interface SettingsApplierTargets {
    settings: SettingsStore
    watcher: Pick<WatcherAdapter, 'setDebounce'>
}

export function applySettings(targets: SettingsApplierTargets): () => void {
    const { settings, watcher } = targets

    function apply(id: SettingId): void {
        switch (id) {
            case 'watcher.debounce':
                watcher.setDebounce(settings.get('watcher.debounce'))
                break
            case 'developer.verboseLogging':
                void setVerboseLogging(settings.get('developer.verboseLogging'))
                break
            default:
                return
        }
        log.debug('Applied {id}', { id })
    }

    apply('watcher.debounce')
    apply('developer.verboseLogging')

    return settings.onChange(apply)
}
