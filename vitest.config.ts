import { defineConfig } from 'vitest/config'
import path from 'path'

export default defineConfig({
    test: {
        include: ['src/**/*.test.ts'],
        environment: 'node',
        setupFiles: ['./src/test-setup.ts'],
        testTimeout: 15000,
    },
    resolve: {
        alias: {
            $lib: path.resolve('./src/lib'),
        },
    },
})
