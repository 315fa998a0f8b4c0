/**
 * Directory state manager: owns every pane and its snapshot.
 *
 * All pane mutation happens on the event loop. Listings run concurrently (one outstanding per pane;
 * a newer request supersedes the older, whose result is discarded). Watcher batches and local
 * operation results go through a mailbox, so their re-stats and patches apply one batch at a time.
 *
 * While a listing is in flight, changes contained in the directory being listed are kept in a
 * journal and replayed onto the listing's result; the per-path timestamps drop the ones the listing
 * already reflects.
 */

import { FileEngineError, toFileEngineError } from '$lib/errors'
import type { EngineEventChannel } from '$lib/events/engine-events'
import type { UnlistenFn } from '$lib/events/event-channel'
import type { WatcherAdapter } from '$lib/file-watcher/watcher-adapter'
import { getAppLogger } from '$lib/logger'
import type { SettingsStore } from '$lib/settings/settings-store'
import type { MonotonicClock } from '$lib/utils/clock'
import { createMailbox } from '$lib/utils/mailbox'
import { applyDiff } from './apply-diff'
import { createIncrementalFilter, type IncrementalFilter } from './filter/fuzzy-filter'
import { listDirectory, statEntry } from './listing/directory-lister'
import * as navigation from './navigation/navigation-history'
import type { NavigationHistory } from './navigation/navigation-history'
import { applySelection, orderSelection, reconcileSelection, sameSelection } from './pane/selection'
import { createSnapshotCache, type SnapshotCache } from './pane/snapshot-cache'
import { isDirectChild, isHiddenName, normalizePath } from './paths'
import { createInvalidSnapshot, createSnapshot, resortSnapshot, reissueSnapshot } from './snapshot'
import type {
    DiffChange,
    DirectoryLikeProvider,
    DirectorySnapshot,
    FileEntryInit,
    FilterMatch,
    FilterState,
    ListingErrorInfo,
    PaneId,
    PaneView,
    SelectionMode,
    SortConfig,
    WatcherEvent,
} from './types'

const log = getAppLogger('directoryState')

/** A change a local file operation made, stamped when the item completed. */
export interface LocalChange {
    type: 'upsert' | 'remove'
    path: string
    timestamp: number
}

export interface OpenPaneOptions {
    showHidden?: boolean
    sort?: Partial<SortConfig>
}

export interface DirectoryStateManagerOptions {
    settings: SettingsStore
    watcher: WatcherAdapter
    clock: MonotonicClock
    events: EngineEventChannel
    providers?: readonly DirectoryLikeProvider[]
    /** Wall clock for snapshot cache ages */
    now?: () => number
}

interface PaneState {
    id: PaneId
    history: NavigationHistory
    snapshot: DirectorySnapshot
    sort: SortConfig
    showHidden: boolean
    selection: Set<string>
    filterQuery: string
    filterMatches: FilterMatch[]
    filter: IncrementalFilter
    error: ListingErrorInfo | null
    cache: SnapshotCache
    listingToken: number
    /** Directory of the listing in flight, or null */
    listingPath: string | null
    journal: DiffChange[]
    watches: Map<string, UnlistenFn>
    /** Not visible to callers until the first listing lands */
    opening: boolean
    closed: boolean
}

function toListingError(error: FileEngineError, path: string): ListingErrorInfo {
    const code = error.code === 'not_found' || error.code === 'permission_denied' ? error.code : 'io_error'
    return { code, path, message: error.message }
}

function diffPath(change: DiffChange): string {
    return change.type === 'upsert' ? change.entry.path : change.path
}

function sameMatches(a: readonly FilterMatch[], b: readonly FilterMatch[]): boolean {
    if (a.length !== b.length) return false
    return a.every((m, i) => m.path === b[i].path && m.score === b[i].score)
}

function sameSort(a: SortConfig, b: SortConfig): boolean {
    return a.sortBy === b.sortBy && a.sortOrder === b.sortOrder && a.directoriesFirst === b.directoriesFirst
}

export function createDirectoryStateManager(options: DirectoryStateManagerOptions) {
    const { settings, watcher, clock, events } = options
    const providers = options.providers ?? []
    const now = options.now ?? Date.now
    const panes = new Map<PaneId, PaneState>()
    const inflight = new Set<Promise<void>>()
    const mailbox = createMailbox((error) => {
        log.error('Failed to apply changes: {error}', { error })
    })
    let paneSeq = 0

    // ========================================================================
    // Helpers
    // ========================================================================

    function sortFromSettings(): SortConfig {
        return {
            sortBy: settings.get('listing.sortBy'),
            sortOrder: settings.get('listing.sortOrder'),
            directoriesFirst: settings.get('listing.directoriesFirst'),
        }
    }

    function requirePane(id: PaneId): PaneState {
        const pane = panes.get(id)
        if (!pane || pane.opening) {
            throw new FileEngineError('not_found', `No such pane: ${id}`)
        }
        return pane
    }

    function currentPath(pane: PaneState): string {
        return navigation.getCurrentPath(pane.history)
    }

    function filterState(pane: PaneState): FilterState {
        return { query: pane.filterQuery, matches: pane.filterMatches }
    }

    function view(pane: PaneState): PaneView {
        return {
            id: pane.id,
            path: currentPath(pane),
            snapshot: pane.snapshot,
            history: { entries: pane.history.entries, index: pane.history.index },
            filter: filterState(pane),
            selection: orderSelection(pane.selection, pane.snapshot),
            showHidden: pane.showHidden,
            error: pane.error,
        }
    }

    /** Watches exactly the snapshot's directory and the one being listed. */
    function syncWatches(pane: PaneState): void {
        const wanted = new Set<string>()
        if (!pane.closed) {
            wanted.add(pane.snapshot.path)
            if (pane.listingPath !== null) wanted.add(pane.listingPath)
        }
        for (const dir of wanted) {
            if (!pane.watches.has(dir)) pane.watches.set(dir, watcher.watch(dir))
        }
        for (const [dir, release] of pane.watches) {
            if (!wanted.has(dir)) {
                release()
                pane.watches.delete(dir)
            }
        }
    }

    /** Re-runs the filter. Returns true if the visible result changed. */
    function recomputeFilter(pane: PaneState): boolean {
        const matches = pane.filter.run(pane.snapshot.entries, pane.filterQuery, {
            caseSensitive: settings.get('filter.caseSensitive'),
        })
        const changed = !sameMatches(matches, pane.filterMatches)
        pane.filterMatches = matches
        return changed
    }

    function commitSnapshot(pane: PaneState, snapshot: DirectorySnapshot): void {
        const previous = pane.snapshot
        if (previous.path !== snapshot.path) {
            pane.cache.store(previous)
        }
        pane.snapshot = snapshot

        const selection = reconcileSelection(pane.selection, snapshot)
        const selectionChanged = !sameSelection(selection, pane.selection)
        pane.selection = selection
        const filterChanged = recomputeFilter(pane)
        syncWatches(pane)

        if (pane.opening) return
        events.emit('snapshot-changed', { paneId: pane.id, snapshot })
        if (selectionChanged) {
            events.emit('selection-changed', { paneId: pane.id, selection: orderSelection(selection, snapshot) })
        }
        if (filterChanged) {
            events.emit('filter-changed', { paneId: pane.id, filter: filterState(pane) })
        }
    }

    function track(task: Promise<void>): Promise<void> {
        const settled = task.then(
            () => undefined,
            () => undefined,
        )
        inflight.add(settled)
        void settled.then(() => inflight.delete(settled))
        return task
    }

    function supersedeListing(pane: PaneState): void {
        pane.listingToken++
        pane.listingPath = null
        pane.journal = []
    }

    // ========================================================================
    // Listing
    // ========================================================================

    /**
     * Lists `target` into the pane. Superseded requests resolve without touching the pane.
     * A failed listing degrades the pane to an empty, invalid snapshot and rethrows.
     */
    async function load(pane: PaneState, target: string): Promise<void> {
        const token = ++pane.listingToken
        if (pane.listingPath !== target) pane.journal = []
        pane.listingPath = target
        syncWatches(pane)

        const baseline = clock.now()
        let entries: FileEntryInit[]
        try {
            entries = await listDirectory(target, { showHidden: pane.showHidden, providers })
        } catch (error) {
            if (token !== pane.listingToken || pane.closed) return
            pane.listingPath = null
            pane.journal = []

            const engineError = toFileEngineError(error, target)
            const listingError = toListingError(engineError, target)
            pane.error = listingError
            commitSnapshot(pane, createInvalidSnapshot(target, pane.snapshot.version + 1, pane.sort, baseline, now()))
            if (!pane.opening) {
                log.warn('Listing {path} failed: {error}', { path: target, error: engineError.message })
                events.emit('pane-error', { paneId: pane.id, error: listingError })
            }
            throw engineError
        }

        if (token !== pane.listingToken || pane.closed) {
            log.debug('Discarding superseded listing of {path}', { path: target })
            return
        }

        const journal = pane.journal
        pane.listingPath = null
        pane.journal = []

        const version = pane.snapshot.version + 1
        const listed = createSnapshot(entries, { path: target, version, sort: pane.sort, baseline, createdAt: now() })
        const { snapshot, applied } = applyDiff(listed, journal, version)
        if (applied.length > 0) {
            log.debug('Replayed {count} changes onto listing of {path}', { count: applied.length, path: target })
        }
        pane.error = null
        commitSnapshot(pane, snapshot)
    }

    function refreshInBackground(pane: PaneState, target: string): void {
        void track(load(pane, target)).catch((error: unknown) => {
            log.warn('Background refresh of {path} failed: {error}', { path: target, error })
        })
    }

    /** Back/forward target: reuse a fresh cached snapshot right away, or list. */
    async function revisit(pane: PaneState, target: string): Promise<void> {
        const cached = pane.cache.take(target)
        if (!cached) {
            await track(load(pane, target))
            return
        }

        supersedeListing(pane)
        const version = pane.snapshot.version + 1
        const reused = sameSort(cached.sort, pane.sort)
            ? reissueSnapshot(cached, version)
            : resortSnapshot(cached, pane.sort, version)
        pane.error = null
        log.debug('Reusing cached snapshot of {path}', { path: target })
        commitSnapshot(pane, reused)
        refreshInBackground(pane, target)
    }

    // ========================================================================
    // Change application
    // ========================================================================

    function isVisible(pane: PaneState, change: DiffChange): boolean {
        return change.type === 'remove' || pane.showHidden || !isHiddenName(change.entry.name)
    }

    async function applyChanges(changes: readonly LocalChange[]): Promise<void> {
        const live = [...panes.values()].filter((p) => !p.closed)
        const isContained = (path: string) =>
            live.some(
                (p) =>
                    isDirectChild(path, p.snapshot.path) || (p.listingPath !== null && isDirectChild(path, p.listingPath)),
            )
        const relevant = changes.filter((c) => isContained(c.path))
        if (relevant.length === 0) return

        // One re-stat per path per batch; a failed re-stat counts as a removal
        const stats = new Map<string, Promise<FileEntryInit | null>>()
        for (const change of relevant) {
            if (change.type === 'upsert' && !stats.has(change.path)) {
                stats.set(change.path, statEntry(change.path))
            }
        }
        const resolved = new Map<string, FileEntryInit | null>()
        await Promise.all(
            [...stats].map(async ([path, pending]) => {
                resolved.set(path, await pending)
            }),
        )

        const diffs: DiffChange[] = relevant.map((change): DiffChange => {
            const entry = change.type === 'upsert' ? resolved.get(change.path) : null
            return entry
                ? { type: 'upsert', entry, timestamp: change.timestamp }
                : { type: 'remove', path: change.path, timestamp: change.timestamp }
        })

        for (const pane of panes.values()) {
            if (pane.closed) continue
            const visible = diffs.filter((d) => isVisible(pane, d))

            const listingPath = pane.listingPath
            if (listingPath !== null) {
                pane.journal.push(...visible.filter((d) => isDirectChild(diffPath(d), listingPath)))
            }

            if (!pane.snapshot.valid) continue
            const patch = visible.filter((d) => isDirectChild(diffPath(d), pane.snapshot.path))
            if (patch.length === 0) continue

            const result = applyDiff(pane.snapshot, patch)
            if (result.dropped.length > 0) {
                log.debug('Dropped {count} stale changes for {path}', {
                    count: result.dropped.length,
                    path: pane.snapshot.path,
                })
            }
            if (result.snapshot !== pane.snapshot) {
                commitSnapshot(pane, result.snapshot)
            }
        }
    }

    async function processWatcherEvents(batch: readonly WatcherEvent[]): Promise<void> {
        const removedSelves = new Set<PaneState>()
        for (const event of batch) {
            if (event.kind !== 'removed' && event.kind !== 'renamed_from') continue
            for (const pane of panes.values()) {
                if (!pane.closed && !pane.opening && event.path === pane.snapshot.path) removedSelves.add(pane)
            }
        }

        await applyChanges(
            batch.map(
                (event): LocalChange => ({
                    type: event.kind === 'removed' || event.kind === 'renamed_from' ? 'remove' : 'upsert',
                    path: event.path,
                    timestamp: event.timestamp,
                }),
            ),
        )

        for (const pane of removedSelves) {
            log.info('Directory of pane {id} went away: {path}', { id: pane.id, path: pane.snapshot.path })
            refreshInBackground(pane, currentPath(pane))
        }
    }

    const unlistenWatcher = watcher.onEvents((batch) => {
        void mailbox.post(() => processWatcherEvents(batch))
    })

    const unlistenCaseSetting = settings.onSpecificChange('filter.caseSensitive', () => {
        for (const pane of panes.values()) {
            if (!pane.opening && recomputeFilter(pane)) {
                events.emit('filter-changed', { paneId: pane.id, filter: filterState(pane) })
            }
        }
    })

    function disposePane(pane: PaneState): void {
        pane.closed = true
        supersedeListing(pane)
        syncWatches(pane)
        pane.cache.clear()
        panes.delete(pane.id)
    }

    // ========================================================================
    // Public API
    // ========================================================================

    return {
        /** Opens a pane. Fails (and creates no pane) if the directory can't be listed. */
        async open(path: string, openOptions: OpenPaneOptions = {}): Promise<PaneView> {
            const target = normalizePath(path)
            const sort = { ...sortFromSettings(), ...openOptions.sort }
            const pane: PaneState = {
                id: `pane-${String(++paneSeq)}`,
                history: navigation.createHistory(target),
                snapshot: createInvalidSnapshot(target, 0, sort, 0, now()),
                sort,
                showHidden: openOptions.showHidden ?? settings.get('listing.showHidden'),
                selection: new Set(),
                filterQuery: '',
                filterMatches: [],
                filter: createIncrementalFilter(),
                error: null,
                cache: createSnapshotCache({
                    capacity: () => settings.get('navigation.snapshotCacheSize'),
                    ttlMs: () => settings.get('navigation.snapshotCacheTtl'),
                    now,
                }),
                listingToken: 0,
                listingPath: null,
                journal: [],
                watches: new Map(),
                opening: true,
                closed: false,
            }
            panes.set(pane.id, pane)

            try {
                await track(load(pane, target))
            } catch (error) {
                disposePane(pane)
                throw error
            }
            if (pane.closed) {
                throw new FileEngineError('cancelled', `Pane closed while opening ${target}`, target)
            }

            pane.opening = false
            log.info('Opened pane {id} at {path}', { id: pane.id, path: target })
            events.emit('snapshot-changed', { paneId: pane.id, snapshot: pane.snapshot })
            return view(pane)
        },

        close(paneId: PaneId): void {
            const pane = requirePane(paneId)
            disposePane(pane)
            log.info('Closed pane {id}', { id: paneId })
            events.emit('pane-closed', { paneId })
        },

        /** Re-lists the current directory. Selection survives for paths that still exist. */
        async refresh(paneId: PaneId): Promise<PaneView> {
            const pane = requirePane(paneId)
            await track(load(pane, currentPath(pane)))
            return view(pane)
        },

        /** Records `path` in the history (dropping forward entries), then lists it. */
        async navigate(paneId: PaneId, path: string): Promise<PaneView> {
            const pane = requirePane(paneId)
            const target = normalizePath(path, currentPath(pane))
            pane.history = navigation.push(pane.history, target, settings.get('navigation.maxHistory'))
            await track(load(pane, target))
            return view(pane)
        },

        async back(paneId: PaneId): Promise<PaneView> {
            const pane = requirePane(paneId)
            if (!navigation.canGoBack(pane.history)) return view(pane)
            pane.history = navigation.back(pane.history)
            await revisit(pane, currentPath(pane))
            return view(pane)
        },

        async forward(paneId: PaneId): Promise<PaneView> {
            const pane = requirePane(paneId)
            if (!navigation.canGoForward(pane.history)) return view(pane)
            pane.history = navigation.forward(pane.history)
            await revisit(pane, currentPath(pane))
            return view(pane)
        },

        /** Updates the selection. Relative paths resolve against the pane's directory. */
        select(paneId: PaneId, paths: readonly string[], mode: SelectionMode = 'replace'): string[] {
            const pane = requirePane(paneId)
            const base = currentPath(pane)
            const next = applySelection(
                pane.selection,
                paths.map((p) => normalizePath(p, base)),
                mode,
            )
            const ordered = orderSelection(next, pane.snapshot)
            if (!sameSelection(next, pane.selection)) {
                pane.selection = next
                events.emit('selection-changed', { paneId, selection: ordered })
            }
            return ordered
        },

        setFilterQuery(paneId: PaneId, query: string): FilterState {
            const pane = requirePane(paneId)
            const queryChanged = pane.filterQuery !== query
            pane.filterQuery = query
            const matchesChanged = recomputeFilter(pane)
            if (queryChanged || matchesChanged) {
                events.emit('filter-changed', { paneId, filter: filterState(pane) })
            }
            return filterState(pane)
        },

        setSort(paneId: PaneId, sort: Partial<SortConfig>): PaneView {
            const pane = requirePane(paneId)
            const next = { ...pane.sort, ...sort }
            if (sameSort(next, pane.sort)) return view(pane)
            pane.sort = next
            commitSnapshot(pane, resortSnapshot(pane.snapshot, next, pane.snapshot.version + 1))
            return view(pane)
        },

        async setShowHidden(paneId: PaneId, showHidden: boolean): Promise<PaneView> {
            const pane = requirePane(paneId)
            if (pane.showHidden === showHidden) return view(pane)
            pane.showHidden = showHidden
            pane.cache.clear()
            await track(load(pane, currentPath(pane)))
            return view(pane)
        },

        getPane(paneId: PaneId): PaneView {
            return view(requirePane(paneId))
        },

        /** The pane's current snapshot, or undefined for unknown panes. */
        getSnapshot(paneId: PaneId): DirectorySnapshot | undefined {
            const pane = panes.get(paneId)
            return pane && !pane.opening ? pane.snapshot : undefined
        },

        listPanes(): PaneView[] {
            return [...panes.values()].filter((p) => !p.opening).map(view)
        },

        /** Applies results of local file operations (re-stats upserts). */
        applyLocalChanges(changes: readonly LocalChange[]): Promise<void> {
            return mailbox.post(() => applyChanges(changes))
        },

        /** Resolves once all queued listings, re-stats and messages have been applied. */
        async whenIdle(): Promise<void> {
            while (inflight.size > 0 || mailbox.size > 0) {
                await Promise.all([...inflight])
                await mailbox.idle()
            }
        },

        dispose(): void {
            unlistenWatcher()
            unlistenCaseSetting()
            for (const pane of [...panes.values()]) disposePane(pane)
        },
    }
}

export type DirectoryStateManager = ReturnType<typeof createDirectoryStateManager>
