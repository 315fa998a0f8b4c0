/**
 * Vitest test setup file.
 * Routes all engine logs (debug included) into a discarding sink so templates get exercised
 * without flooding the test output.
 */

import { configure } from '@logtape/logtape'

await configure({
    sinks: {
        discard: () => {},
    },
    loggers: [
        { category: 'app', lowestLevel: 'debug', sinks: ['discard'] },
        { category: ['logtape', 'meta'], lowestLevel: 'warning', sinks: ['discard'] },
    ],
    reset: true,
})
