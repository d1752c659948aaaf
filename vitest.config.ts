import { defineConfig } from 'vitest/config'

export default defineConfig({
  test: {
    include: ['tests/**/*.test.ts'],
    environment: 'node',
    env: {
      LOG_LEVEL: 'error',
      LOG_FORMAT: 'json',
      DISABLE_DB: 'true',
      YTDLP_BIN: 'yt-dlp',
      YTDLP_PYTHON_BIN: '',
      YTDLP_COOKIES_FILE: '',
      YTDLP_EXTRA_ARGS: '',
    },
  },
})
