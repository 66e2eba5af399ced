import { defineConfig } from 'vite'
import react from '@vitejs/plugin-react'

const DEFAULT_ARCHIVE_DEV_PORT = 5417

function resolveArchiveDevPort(): number {
  const rawPort = process.env.ARCHIVE_DEV_PORT
  if (!rawPort) return DEFAULT_ARCHIVE_DEV_PORT

  const parsedPort = Number.parseInt(rawPort, 10)
  if (Number.isNaN(parsedPort) || parsedPort < 1 || parsedPort > 65535) {
    console.warn(
      `[archive] Invalid ARCHIVE_DEV_PORT "${rawPort}". Falling back to ${DEFAULT_ARCHIVE_DEV_PORT}.`,
    )
    return DEFAULT_ARCHIVE_DEV_PORT
  }

  return parsedPort
}

export default defineConfig(() => {
  const devPort = resolveArchiveDevPort()

  return {
    plugins: [react()],
    server: {
      host: '127.0.0.1',
      port: devPort,
      strictPort: true,
    },
    preview: {
      host: '127.0.0.1',
      port: devPort,
      strictPort: true,
    },
    build: {
      outDir: 'dist',
    },
  }
})
