import { defineConfig } from 'vitest/config'

export default defineConfig({
  test: {
    environment: 'node',
    include: ['bridge-service/src/**/*.test.ts'],
    restoreMocks: true,
  },
})
