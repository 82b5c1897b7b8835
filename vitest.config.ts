import { defineConfig } from 'vitest/config'

export default defineConfig({
  test: {
    environment: 'node',
    include: ['src/**/*.{test,spec}.ts'],
    coverage: {
      provider: 'v8',
      reporter: ['text', 'json', 'html'],
      include: [
        'src/services/**/*.ts',
        'src/domain/**/*.ts',
        'src/infrastructure/**/*.ts',
        'src/utils/**/*.ts'
      ],
      exclude: [
        'src/test/**',
        '**/*.test.ts',
        '**/index.ts'
      ]
    },
    testTimeout: 10000,
    hookTimeout: 10000
  }
})
