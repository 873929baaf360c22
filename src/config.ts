// src/config.ts
// Runtime settings. The data directory itself is chosen at build time:
// vite.config.ts serves DATA_DIR (default data/) as the public directory.

import { httpSource } from './services/loader'

/** Abort a data file request after this long. */
export const DATA_TIMEOUT_MS = 12000

export const dataSource = httpSource(import.meta.env.BASE_URL, { timeoutMs: DATA_TIMEOUT_MS })
