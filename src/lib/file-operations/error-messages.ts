/**
 * User-facing wording for per-item operation errors and operation outcomes.
 * Used by the command dispatcher to build toasts; the technical details go to logs.
 */

import type { OperationError } from '$lib/errors'
import type { OperationKind, OperationRecord } from './types'

export interface FriendlyErrorMessage {
    /** Short title for the error */
    title: string
    /** Main explanation of what happened */
    message: string
    /** What the user can do about it */
    suggestion: string
}

const operationVerbMap: Record<OperationKind, { verb: string; pastTense: string; gerund: string }> = {
    copy: { verb: 'copy', pastTense: 'copied', gerund: 'copying' },
    move: { verb: 'move', pastTense: 'moved', gerund: 'moving' },
    delete: { verb: 'delete', pastTense: 'deleted', gerund: 'deleting' },
    rename: { verb: 'rename', pastTense: 'renamed', gerund: 'renaming' },
}

function capitalize(word: string): string {
    return word.charAt(0).toUpperCase() + word.slice(1)
}

export function getUserFriendlyMessage(error: OperationError, kind: OperationKind = 'copy'): FriendlyErrorMessage {
    const { verb, gerund } = operationVerbMap[kind]

    switch (error.type) {
        case 'not_found':
            return {
                title: "Couldn't find the file",
                message: `The file or folder you tried to ${verb} no longer exists.`,
                suggestion: 'It may have been moved or deleted. Try refreshing the file list.',
            }
        case 'already_exists':
            return {
                title: 'File already exists',
                message: "There's already a file with this name at the destination.",
                suggestion: 'Choose a different name or location, or pick "rename" when asked.',
            }
        case 'permission_denied':
            return {
                title: "Couldn't access this location",
                message: `You don't have permission to ${verb} files here.`,
                suggestion: 'Check that you have write access to the folder.',
            }
        case 'cross_device_move_failed':
            return {
                title: "Couldn't move between drives",
                message: 'Copying to the other drive failed, so the original was left in place.',
                suggestion: 'Check that the destination has enough space and try again.',
            }
        case 'destination_inside_source':
            return {
                title: `Can't ${verb} a folder into itself`,
                message: `You're trying to ${verb} a folder into one of its own subfolders.`,
                suggestion: `Choose a destination outside of the folder you are ${gerund}.`,
            }
        case 'io_error':
            return {
                title: `${capitalize(verb)} failed`,
                message: getIoErrorMessage(error.message, kind),
                suggestion: 'Try again. If the problem persists, check the technical details.',
            }
    }
}

function getIoErrorMessage(rawMessage: string, kind: OperationKind): string {
    const lower = rawMessage.toLowerCase()
    if (lower.includes('read-only')) {
        return 'The destination is read-only.'
    }
    if (lower.includes('no space')) {
        return 'The destination is full.'
    }
    if (lower.includes('name too long')) {
        return 'The file name is too long for the destination.'
    }
    return `Couldn't ${operationVerbMap[kind].verb} the file.`
}

/** Path and raw message lines for logs and a details view. */
export function getTechnicalDetails(error: OperationError): string {
    const lines: string[] = []

    switch (error.type) {
        case 'not_found':
        case 'already_exists':
            lines.push(`Path: ${error.path}`)
            break
        case 'permission_denied':
        case 'cross_device_move_failed':
        case 'io_error':
            lines.push(`Path: ${error.path}`)
            lines.push(`Details: ${error.message}`)
            break
        case 'destination_inside_source':
            lines.push(`Source: ${error.source}`)
            lines.push(`Destination: ${error.destination}`)
            break
    }

    lines.push(`Error type: ${error.type}`)
    return lines.join('\n')
}

function countItems(count: number): string {
    return `${String(count)} ${count === 1 ? 'item' : 'items'}`
}

/** Summary for a finished operation, like "Copied 3 of 5 items". */
export function describeOutcome(record: OperationRecord): string {
    const { verb, pastTense } = operationVerbMap[record.kind]
    const succeeded = record.items.filter((i) => i.status === 'succeeded').length
    const total = record.items.length

    switch (record.status) {
        case 'completed':
            return `${capitalize(pastTense)} ${countItems(succeeded)}`
        case 'partially_completed':
            return `${capitalize(pastTense)} ${String(succeeded)} of ${countItems(total)}`
        case 'failed':
            return `Couldn't ${verb} ${countItems(total)}`
        case 'cancelled':
            return `${capitalize(verb)} cancelled after ${countItems(succeeded)}`
        case 'undone':
            return `Undid ${verb} of ${countItems(succeeded)}`
        default:
            return `${capitalize(verb)} in progress`
    }
}
