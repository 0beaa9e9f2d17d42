/// <reference types="vite/client" />

interface ImportMetaEnv {
  readonly VITE_CHAT_ENDPOINT?: string;
}

interface ImportMeta {
  readonly env: ImportMetaEnv;
}
