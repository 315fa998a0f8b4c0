/**
 * Wires the engine's components into one instance:
 *
 *   watcher ─▶ directory state manager ◀─ scheduler ─▶ undo ledger
 *                        ▲                    ▲            ▲
 *                        └──────── command dispatcher ─────┘
 *
 * All of them share one settings store, one event channel and one monotonic clock, so watcher
 * events, listings and local operation results can be ordered against each other.
 */

import { createCommandDispatcher } from './commands/command-dispatch'
import type { CommandIntent, CommandResult } from './commands/types'
import type { EngineEvents } from './events/engine-events'
import { createEventChannel } from './events/event-channel'
import { createDirectoryStateManager } from './file-explorer/directory-state-manager'
import type { DirectoryLikeProvider } from './file-explorer/types'
import { createOperationScheduler } from './file-operations/scheduler'
import { createChokidarBackend } from './file-watcher/chokidar-backend'
import type { WatcherBackend } from './file-watcher/types'
import { createWatcherAdapter } from './file-watcher/watcher-adapter'
import { getAppLogger } from './logger'
import { applySettings } from './settings/settings-applier'
import { createSettingsStore } from './settings/settings-store'
import type { SettingsValues } from './settings/types'
import { createToastStore } from './ui/toast/toast-store'
import { createUndoLedger } from './undo/undo-ledger'
import { createMonotonicClock } from './utils/clock'

const log = getAppLogger('engine')

export interface FileManagerEngineOptions {
    /** Initial setting values; anything left out takes its registry default */
    settings?: Partial<SettingsValues>
    /** Filesystem change source. Defaults to chokidar. */
    watcherBackend?: WatcherBackend
    /** Archive and other directory-like listers */
    providers?: readonly DirectoryLikeProvider[]
    /** Where deletes park entries for undo. Defaults to a directory under the OS temp dir. */
    backupRoot?: string
    /** Wall clock, for cache ages, toast expiry and record timestamps */
    now?: () => number
}

export function createFileManagerEngine(options: FileManagerEngineOptions = {}) {
    const now = options.now ?? Date.now
    const settings = createSettingsStore(options.settings)
    const events = createEventChannel<EngineEvents>()
    const clock = createMonotonicClock(now)
    const toasts = createToastStore(now)

    const watcher = createWatcherAdapter({
        backend: options.watcherBackend ?? createChokidarBackend(),
        clock,
        debounceMs: settings.get('watcher.debounce'),
    })
    const manager = createDirectoryStateManager({
        settings,
        watcher,
        clock,
        events,
        providers: options.providers,
        now,
    })
    const scheduler = createOperationScheduler({
        settings,
        events,
        clock,
        panes: manager,
        backupRoot: options.backupRoot,
        now,
    })
    const ledger = createUndoLedger({ scheduler, settings, events })
    const dispatcher = createCommandDispatcher({ manager, scheduler, ledger, toasts })

    const unlistenFinished = scheduler.onFinished((record) => {
        ledger.record(record)
    })
    const unapplySettings = applySettings({ settings, watcher })
    let disposed = false

    log.info('Engine ready')

    return {
        settings,
        events,
        toasts,
        manager,
        scheduler,
        ledger,

        dispatch(intent: CommandIntent): Promise<CommandResult> {
            return dispatcher.dispatch(intent)
        },

        /** Subscribes to one push notification. */
        listen: events.listen,

        /** Resolves once pending watcher changes, operations and pane updates have been applied. */
        async whenIdle(): Promise<void> {
            watcher.flush()
            await scheduler.whenIdle()
            await manager.whenIdle()
        },

        /** Cancels running operations, closes every pane and stops watching. */
        async dispose(): Promise<void> {
            if (disposed) return
            disposed = true
            unlistenFinished()
            unapplySettings()
            scheduler.dispose()
            await scheduler.whenIdle()
            ledger.dispose()
            manager.dispose()
            await watcher.close()
            events.clear()
            log.info('Engine disposed')
        },
    }
}

export type FileManagerEngine = ReturnType<typeof createFileManagerEngine>
