import { fileURLToPath, URL } from 'node:url'
import { defineConfig } from 'vite'
import react from '@vitejs/plugin-react'
import tailwindcss from '@tailwindcss/vite'

const REGISTRY_ORIGIN = 'https://api.company-information.service.gov.uk'
const SANDBOX_REGISTRY_ORIGIN = 'https://api-sandbox.company-information.service.gov.uk'

export default defineConfig({
  plugins: [react(), tailwindcss()],
  resolve: {
    alias: {
      '@': fileURLToPath(new URL('./src', import.meta.url)),
    },
  },
  server: {
    port: 5173,
    host: '0.0.0.0', // Listen on all network interfaces for LAN access
    proxy: {
      '/registry-sandbox': {
        target: SANDBOX_REGISTRY_ORIGIN,
        changeOrigin: true,
        rewrite: (path) => path.replace(/^\/registry-sandbox/, ''),
      },
      '/registry': {
        target: REGISTRY_ORIGIN,
        changeOrigin: true,
        rewrite: (path) => path.replace(/^\/registry/, ''),
      },
    },
  },
})
