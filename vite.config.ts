import { defineConfig } from 'vite'
import react from '@vitejs/plugin-react'

const API = `http://localhost:${process.env.PORT ?? 8050}`

export default defineConfig({
  root: 'client',
  plugins: [react()],
  server: {
    port: 5173,
    proxy: {
      '/api': API,
      '/health': API,
    },
  },
  build: {
    outDir: '../dist/client',
    emptyOutDir: true,
  },
})
