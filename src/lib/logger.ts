/**
 * Logging on LogTape. Every engine logger lives under the `app` category:
 *
 *   const log = getAppLogger('scheduler')
 *   log.info('Copied {count} items to {path}', { count, path })
 *
 * Levels: info and up during development, error and up when NODE_ENV is production, debug for
 * everything while verbose logging is on. `debugFeatures` raises single features to debug.
 *
 * The engine never configures LogTape on its own. Hosts call `initLogger` once, or configure
 * LogTape themselves and skip it.
 */

import { configure, getConsoleSink, getLogger, type LogLevel, type Logger } from '@logtape/logtape'

export type { Logger } from '@logtape/logtape'

const production = process.env.NODE_ENV === 'production'

/** Features logged at debug level outside verbose mode, for example 'directoryState' */
const debugFeatures: readonly string[] = []

interface LoggerState {
    initialized: boolean
    verbose: boolean
}

const state: LoggerState = { initialized: false, verbose: false }

interface LoggerRoute {
    category: string | string[]
    lowestLevel: LogLevel
    sinks: string[]
}

function routes(verbose: boolean): LoggerRoute[] {
    const base: LoggerRoute = {
        category: 'app',
        lowestLevel: verbose ? 'debug' : production ? 'error' : 'info',
        sinks: ['console'],
    }
    const features = verbose
        ? []
        : debugFeatures.map((feature): LoggerRoute => ({
              category: ['app', feature],
              lowestLevel: 'debug',
              sinks: ['console'],
          }))
    const meta: LoggerRoute = { category: ['logtape', 'meta'], lowestLevel: 'warning', sinks: ['console'] }
    return [base, ...features, meta]
}

async function reconfigure(verbose: boolean): Promise<void> {
    await configure({
        sinks: { console: getConsoleSink() },
        loggers: routes(verbose),
        reset: true,
    })
    state.verbose = verbose
}

/** Configures the console sink. Later calls are no-ops. */
export async function initLogger(options: { verbose?: boolean } = {}): Promise<void> {
    if (state.initialized) return
    await reconfigure(options.verbose ?? false)
    state.initialized = true

    const log = getLogger(['app', 'logger'])
    log.info('Logging at {level} and up', { level: state.verbose ? 'debug' : production ? 'error' : 'info' })
    if (!state.verbose && debugFeatures.length > 0) {
        log.info('Debug enabled for: {features}', { features: debugFeatures.join(', ') })
    }
}

/** Follows the `developer.verboseLogging` setting. Does nothing before `initLogger`. */
export async function setVerboseLogging(enabled: boolean): Promise<void> {
    if (!state.initialized || state.verbose === enabled) return
    await reconfigure(enabled)
    getLogger(['app', 'logger']).info(enabled ? 'Verbose logging on' : 'Verbose logging off')
}

/** Logger for one feature, under the `app` category. */
export function getAppLogger(feature: string): Logger {
    return getLogger(['app', feature])
}
