// config.ts - Client configuration from Vite environment variables

const DEFAULT_CHAT_ENDPOINT = '/api/chat';

export const CONFIG = {
  // Relative by default so the page works behind the same origin as the server
  CHAT_ENDPOINT: String(import.meta.env.VITE_CHAT_ENDPOINT || '').trim() || DEFAULT_CHAT_ENDPOINT,
} as const;
