// Turns a submitted request into a fully resolved plan, or throws before anything is scheduled

import path from 'path'
import { FileEngineError } from '$lib/errors'
import { normalizePath } from '$lib/file-explorer/paths'
import type { DirectorySnapshot, PaneId } from '$lib/file-explorer/types'
import { validateFilename } from '$lib/utils/filename-validation'
import type { OperationPlan, OperationRequest, PlannedItem } from './types'

export type SnapshotLookup = (paneId: PaneId) => DirectorySnapshot | undefined

function invalid(message: string): FileEngineError {
    return new FileEngineError('invalid_request', message)
}

/** A bare name stays in the source's directory; anything with a slash is a path relative to it. */
function renameTarget(source: string, destination: string): string {
    const parent = path.dirname(source)
    const isPath = destination.includes('/')
    const check = validateFilename(isPath ? path.basename(destination) : destination)
    if (check.severity === 'error') {
        throw invalid(check.message)
    }
    return isPath ? normalizePath(destination, parent) : path.join(parent, destination)
}

export function planRequest(
    request: OperationRequest,
    options: { getSnapshot: SnapshotLookup; deletePermanently: boolean },
): OperationPlan {
    const snapshot = request.paneId !== undefined ? options.getSnapshot(request.paneId) : undefined
    if (request.paneId !== undefined && !snapshot) {
        throw new FileEngineError('not_found', `No such pane: ${request.paneId}`)
    }
    const base = snapshot?.path ?? process.cwd()
    const sources = [...new Set(request.sources.map((s) => normalizePath(s, base)))]

    if (sources.length === 0) {
        throw invalid(`Nothing to ${request.kind}: no sources given`)
    }

    if (snapshot) {
        const listed = new Set(snapshot.entries.map((e) => e.path))
        const missing = sources.find((s) => !listed.has(s))
        if (missing !== undefined) {
            throw new FileEngineError('not_found', `${missing} is not listed in pane ${snapshot.path}`, missing)
        }
    }

    let items: PlannedItem[]
    let destination: string | null = null

    switch (request.kind) {
        case 'copy':
        case 'move': {
            if (request.destination === undefined || request.destination.trim() === '') {
                throw invalid(`A ${request.kind} needs a destination`)
            }
            const target = normalizePath(request.destination, base)
            destination = target
            items = sources.map((source) => ({ source, target: path.join(target, path.basename(source)) }))
            break
        }
        case 'rename': {
            if (sources.length !== 1) {
                throw invalid(`Rename takes exactly one source, got ${String(sources.length)}`)
            }
            if (request.destination === undefined) {
                throw invalid('A rename needs a new name')
            }
            const target = renameTarget(sources[0], request.destination)
            destination = path.dirname(target)
            items = [{ source: sources[0], target }]
            break
        }
        case 'delete':
            items = sources.map((source) => ({ source, target: null }))
            break
    }

    return {
        kind: request.kind,
        items,
        destination,
        conflict: request.conflictPolicy ?? 'default',
        permanent: request.kind === 'delete' && (request.permanent ?? options.deletePermanently),
        paneId: request.paneId,
    }
}
