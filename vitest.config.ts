import { defineConfig } from 'vitest/config'
import react from '@vitejs/plugin-react'

export default defineConfig({
  plugins: [react()],
  test: {
    globals: true,
    environment: 'jsdom',
    include: ['frontend/tests/**/*.test.{ts,tsx}'],
    setupFiles: ['./frontend/tests/setup.ts'],
  },
})
