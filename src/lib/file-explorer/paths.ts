/**
 * Pure path helpers. All engine paths are absolute and normalized through `normalizePath`.
 */

import path from 'path'
import { homedir } from 'os'

/** Expands a leading `~`, resolves relative paths against `cwd`, and drops trailing separators. */
export function normalizePath(value: string, cwd: string = process.cwd()): string {
    let expanded = value
    if (expanded === '~') {
        expanded = homedir()
    } else if (expanded.startsWith('~/')) {
        expanded = homedir() + expanded.slice(1)
    }
    return path.resolve(cwd, expanded)
}

export function parentOf(target: string): string {
    return path.dirname(target)
}

export function baseName(target: string): string {
    return path.basename(target)
}

/** True if `target` is an immediate child of `directory`. */
export function isDirectChild(target: string, directory: string): boolean {
    return target !== directory && path.dirname(target) === directory
}

/** True if `target` is `root` itself or anywhere below it. */
export function isWithinRoot(target: string, root: string): boolean {
    const relative = path.relative(root, target)
    return relative === '' || (!relative.startsWith('..') && !path.isAbsolute(relative))
}

export function isHiddenName(name: string): boolean {
    return name.startsWith('.')
}
