/// <reference types="vite/client" />

interface ImportMetaEnv {
  readonly VITE_TASKS_STORAGE_KEY?: string;
  readonly VITE_APP_TITLE?: string;
}

interface ImportMeta {
  readonly env: ImportMetaEnv;
}
