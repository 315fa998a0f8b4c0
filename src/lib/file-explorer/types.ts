/** What kind of filesystem object an entry describes. */
export type EntryKind =
    | { type: 'file' }
    | { type: 'directory' }
    /** `target` is null when the link couldn't be read */
    | { type: 'symlink'; target: string | null }
    /** An entry served by a directory-like provider (for example, a file inside an archive) */
    | { type: 'archive_member'; archivePath: string; isDirectory: boolean }

export interface FileEntry {
    readonly name: string
    /** Absolute path, unique within a snapshot */
    readonly path: string
    readonly kind: EntryKind
    /** Bytes. Absent for directories and when unknown. */
    readonly size?: number
    /** Unix timestamp in milliseconds */
    readonly modifiedAt: number
    /** Permission bits, `mode & 0o777` */
    readonly permissions: number
    /** Version of the snapshot that constructed this entry */
    readonly generation: number
}

/** Raw listing data, before a snapshot stamps its generation on it. */
export type FileEntryInit = Omit<FileEntry, 'generation'>

// ============================================================================
// Sorting types
// ============================================================================

/** Column to sort files by. */
export type SortColumn = 'name' | 'extension' | 'size' | 'modified'

/** Sort order. */
export type SortOrder = 'ascending' | 'descending'

export interface SortConfig {
    sortBy: SortColumn
    sortOrder: SortOrder
    /** Directories before files regardless of column */
    directoriesFirst: boolean
}

/** Default sort order for each column (first selection uses this). */
export const defaultSortOrders: Record<SortColumn, SortOrder> = {
    name: 'ascending',
    extension: 'ascending',
    size: 'descending',
    modified: 'descending',
}

/** Default sort column when opening a new directory. */
export const DEFAULT_SORT_BY: SortColumn = 'name'

export const DEFAULT_SORT: SortConfig = {
    sortBy: DEFAULT_SORT_BY,
    sortOrder: defaultSortOrders[DEFAULT_SORT_BY],
    directoriesFirst: true,
}

// ============================================================================
// Snapshots
// ============================================================================

/**
 * Immutable, versioned listing of one directory.
 * Entries are unique by path and ordered per `sort` whenever a caller can see them.
 */
export interface DirectorySnapshot {
    readonly path: string
    readonly version: number
    readonly entries: readonly FileEntry[]
    readonly sort: SortConfig
    /** Cleared when the listing failed; invalid snapshots are kept until the next refresh */
    readonly valid: boolean
    /** Clock stamp taken when the listing behind this snapshot started; older events are already reflected */
    readonly baseline: number
    /** Per entry path, the timestamp of the last mutation applied to this snapshot */
    readonly lastApplied: ReadonlyMap<string, number>
    /** Unix timestamp in milliseconds */
    readonly createdAt: number
}

/**
 * A single change in a directory patch.
 * Each change carries the timestamp it was observed (watcher) or performed (local operation) at.
 */
export type DiffChange =
    | { type: 'upsert'; entry: FileEntryInit; timestamp: number }
    | { type: 'remove'; path: string; timestamp: number }

// ============================================================================
// Watcher events
// ============================================================================

export type WatcherEventKind = 'created' | 'modified' | 'removed' | 'renamed_from' | 'renamed_to'

export type WatcherEvent =
    | { kind: 'created' | 'modified' | 'removed'; path: string; timestamp: number }
    /** Rename halves share a cookie so a batch can apply them as one patch */
    | { kind: 'renamed_from' | 'renamed_to'; path: string; timestamp: number; cookie: string }

// ============================================================================
// Panes
// ============================================================================

export type PaneId = string

/** Read-only view of one pane, handed to the presentation layer. */
export interface PaneView {
    id: PaneId
    path: string
    snapshot: DirectorySnapshot
    history: { entries: readonly string[]; index: number }
    filter: FilterState
    /** Paths, in snapshot order where present; unreconciled paths last */
    selection: string[]
    showHidden: boolean
    /** Last listing error, cleared by the next successful listing */
    error: ListingErrorInfo | null
}

export interface FilterState {
    query: string
    /** Matching entries, best first. All entries in snapshot order when the query is empty. */
    matches: FilterMatch[]
}

export interface FilterMatch {
    path: string
    score: number
    /** Indices into the entry name, for highlighting */
    matchedIndices: number[]
}

export type SelectionMode = 'replace' | 'add' | 'remove' | 'toggle'

export interface ListingErrorInfo {
    code: 'not_found' | 'permission_denied' | 'io_error'
    path: string
    message: string
}

/**
 * Capability boundary for archive/preview collaborators.
 * A provider that claims a path lists it as if it were a directory.
 */
export interface DirectoryLikeProvider {
    /** Short identifier, for logs */
    id: string
    canList(path: string): boolean
    listLikeDirectory(path: string): Promise<FileEntryInit[]>
}
