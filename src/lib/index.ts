// Public surface of the engine

export { createFileManagerEngine, type FileManagerEngine, type FileManagerEngineOptions } from './engine'
export { initLogger, setVerboseLogging, getAppLogger } from './logger'
export {
    FileEngineError,
    isFileEngineError,
    type FileEngineErrorCode,
    type OperationError,
} from './errors'
export type { EngineEvents, EngineEventChannel } from './events/engine-events'
export type { UnlistenFn } from './events/event-channel'

export * from './commands'

export type {
    DirectoryLikeProvider,
    DirectorySnapshot,
    EntryKind,
    FileEntry,
    FileEntryInit,
    FilterMatch,
    FilterState,
    ListingErrorInfo,
    PaneId,
    PaneView,
    SelectionMode,
    SortColumn,
    SortConfig,
    SortOrder,
} from './file-explorer/types'
export { filterEntries } from './file-explorer/filter/fuzzy-filter'

export type {
    ConflictPolicy,
    ConflictRequest,
    ConflictResolution,
    OperationHandle,
    OperationItem,
    OperationKind,
    OperationProgress,
    OperationProgressEvent,
    OperationRecord,
    OperationRequest,
    OperationStatus,
    OperationStatusEvent,
} from './file-operations/types'
export { isTerminalStatus } from './file-operations/types'
export {
    calculateOperationStats,
    formatBytes,
    formatDuration,
    formatProgressLine,
    type OperationStats,
} from './file-operations/operation-stats'
export {
    describeOutcome,
    getTechnicalDetails,
    getUserFriendlyMessage,
    type FriendlyErrorMessage,
} from './file-operations/error-messages'

export type { WatcherBackend, RawChange } from './file-watcher/types'
export { SettingValidationError, type SettingsStore } from './settings/settings-store'
export { listSettingDefinitions, getSettingDefinition } from './settings/settings-registry'
export type { SettingDefinition, SettingId, SettingsValues } from './settings/types'
export type { Toast, ToastLevel, ToastStore } from './ui/toast/toast-store'
