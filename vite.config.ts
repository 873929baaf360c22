import { defineConfig, loadEnv } from 'vite'
import react from '@vitejs/plugin-react'

export default defineConfig(({ mode }) => {
  const env = loadEnv(mode, process.cwd(), '')
  return {
    plugins: [react()],
    // The TSV files are served as static assets: institution.txt, topic.txt, type.txt
    publicDir: env.DATA_DIR || 'data',
  }
})
