// Vitest configuration for mailsweep.
// Tests live beside their sources as *.test.ts.

import { defineConfig } from 'vitest/config'

export default defineConfig({
  test: {
    include: ['src/**/*.test.ts'],
  },
})
