import { defineConfig } from 'vite'
import react from '@vitejs/plugin-react'

// The app lives under frontend/; the CSV is served from frontend/public.
export default defineConfig({
  root: 'frontend',
  envDir: '..',
  plugins: [react()],
  build: {
    outDir: '../dist',
    emptyOutDir: true,
    sourcemap: process.env.NODE_ENV === 'development',
  },
})
