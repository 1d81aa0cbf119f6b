/// <reference types="vite/client" />

interface ImportMetaEnv {
  readonly VITE_KITCHEN_CAPACITY?: string
}

interface ImportMeta {
  readonly env: ImportMetaEnv
}
