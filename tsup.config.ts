import { defineConfig } from 'tsup'

/**
 * Bundled build of drivekit (`npm run bundle`)
 *
 * - splitting: true → shared code lands in chunk files instead of being duplicated per entry
 * - dts: true → one declaration bundle per entry
 */
export default defineConfig({
    name: 'drivekit',

    entry: {
        // ==================== Main Entry ====================
        index: 'index.ts',

        // ==================== Sub-path Exports ====================
        'src/core': 'src/core/index.ts',
        'src/config': 'src/config/index.ts',
        'src/models': 'src/models/index.ts',
    },

    format: ['cjs', 'esm'],
    dts: true,

    splitting: true,
    treeshake: true,

    sourcemap: false,
    clean: true,

    // Node.js built-ins are resolved at runtime; the settings loader needs them
    external: [
        'fs',
        'path',
    ],

    outDir: 'dist/bundle',
    target: 'es2022',
    platform: 'node',
})
