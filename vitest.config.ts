import { defineConfig } from 'vitest/config'

export default defineConfig({
  test: {
    globals: true,
    environment: 'node',
    include: ['tests/**/*.test.ts'],
    coverage: {
      provider: 'v8',
      reporter: ['text', 'json', 'html'],
      include: ['src/**/*.ts'],
      exclude: [
        'node_modules/**',
        'dist/**',
        '**/*.d.ts',
        'vitest.config.ts',
        'src/cli/**',       // Thin argument mapping over the domain layer
        'src/index.ts',     // Re-exports only
        'src/lib/spawner.ts' // Real process spawning
      ]
    },
    testTimeout: 30000
  }
})
