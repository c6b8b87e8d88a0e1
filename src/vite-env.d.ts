/// <reference types="vite/client" />

interface ImportMetaEnv {
  readonly VITE_AGE_GRID_POLICY?: string
  readonly VITE_FIXED_GRID_MAX_AGE?: string
  readonly VITE_ORACLE_TIMEOUT_MS?: string
  readonly VITE_ALLOW_UNSEEN_BREEDS?: string
  readonly VITE_LOG_LEVEL?: string
}

interface ImportMeta {
  readonly env: ImportMetaEnv
}
