import { defineConfig } from 'vite'
import react from '@vitejs/plugin-react'

const serverPort = Number(process.env.VITE_SERVER_PORT) || 9090
const clientPort = Number(process.env.VITE_CLIENT_PORT) || 5173

// https://vitejs.dev/config/
export default defineConfig({
  plugins: [react()],
  server: {
    port: clientPort,
    strictPort: false,
    proxy: {
      '/api': {
        target: `http://localhost:${serverPort}`,
        changeOrigin: true,
      },
    },
  },
  build: {
    outDir: 'dist/client',
  },
})
