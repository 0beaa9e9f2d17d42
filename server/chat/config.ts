// config.ts - Server configuration read once from the environment at startup

type Env = Record<string, string | undefined>;

export interface ServerConfig {
  supabaseUrl: string;
  supabaseServiceRoleKey: string;
  googleApiKey: string;
  fileBucketName: string;
  logBucketName: string | null;
  enableUsageLog: boolean;
  maxPromptSizeMb: number;
  textModel: string;
  multimodalModel: string;
  filePollIntervalMs: number;
  filePollMaxAttempts: number;
  userIdentityHeader: string;
  logTimeZone: string;
  host: string;
  port: number;
  staticRoot: string;
  devMode: boolean;
}

export class ConfigError extends Error {
  constructor(readonly missing: string[]) {
    super(`Missing required environment variables: ${missing.join(', ')}`);
    this.name = 'ConfigError';
  }
}

export const DEFAULT_MAX_PROMPT_SIZE_MB = 4.0;
export const DEFAULT_LOG_TIMEZONE = 'Asia/Tokyo';
const DEFAULT_GEMINI_MODEL = 'gemini-2.0-flash';

export function envFlag(env: Env, name: string, defaultValue: boolean): boolean {
  const raw = env[name];
  if (raw === undefined || raw.trim() === '') return defaultValue;
  const normalized = raw.trim().toLowerCase();
  if (['1', 'true', 'yes', 'on'].includes(normalized)) return true;
  if (['0', 'false', 'no', 'off'].includes(normalized)) return false;
  return defaultValue;
}

export function envNumber(env: Env, name: string, defaultValue: number): number {
  const raw = env[name]?.trim();
  if (!raw) return defaultValue;
  const value = Number(raw);
  return Number.isFinite(value) && value > 0 ? value : defaultValue;
}

function envString(env: Env, name: string, defaultValue: string): string {
  return env[name]?.trim() || defaultValue;
}

export function isValidTimeZone(timeZone: string): boolean {
  try {
    new Intl.DateTimeFormat('en-US', { timeZone });
    return true;
  } catch {
    return false;
  }
}

function envTimeZone(env: Env, name: string, defaultValue: string): string {
  const timeZone = envString(env, name, defaultValue);
  if (isValidTimeZone(timeZone)) return timeZone;
  console.warn(`[Config] ${name} is not a known time zone, using ${defaultValue}:`, timeZone);
  return defaultValue;
}

/**
 * Throws a ConfigError naming every missing variable, so the process exits
 * before it starts listening.
 */
export function loadConfig(env: Env = process.env): ServerConfig {
  const enableUsageLog = envFlag(env, 'ENABLE_USAGE_LOG', true);
  const required = [
    'SUPABASE_URL',
    'SUPABASE_SERVICE_ROLE_KEY',
    'GOOGLE_API_KEY',
    'FILE_BUCKET_NAME',
    ...(enableUsageLog ? ['LOG_BUCKET_NAME'] : []),
  ];
  const missing = required.filter((name) => !env[name]?.trim());
  if (missing.length > 0) {
    throw new ConfigError(missing);
  }

  const value = (name: string) => env[name]?.trim() ?? '';

  return {
    supabaseUrl: value('SUPABASE_URL'),
    supabaseServiceRoleKey: value('SUPABASE_SERVICE_ROLE_KEY'),
    googleApiKey: value('GOOGLE_API_KEY'),
    fileBucketName: value('FILE_BUCKET_NAME'),
    logBucketName: enableUsageLog ? value('LOG_BUCKET_NAME') : null,
    enableUsageLog,
    maxPromptSizeMb: envNumber(env, 'MAX_PROMPT_SIZE_MB', DEFAULT_MAX_PROMPT_SIZE_MB),
    textModel: envString(env, 'GEMINI_TEXT_MODEL', DEFAULT_GEMINI_MODEL),
    multimodalModel: envString(env, 'GEMINI_MULTIMODAL_MODEL', DEFAULT_GEMINI_MODEL),
    filePollIntervalMs: envNumber(env, 'GEMINI_FILE_POLL_INTERVAL_MS', 2000),
    filePollMaxAttempts: Math.floor(envNumber(env, 'GEMINI_FILE_POLL_MAX_ATTEMPTS', 30)),
    userIdentityHeader: envString(env, 'USER_IDENTITY_HEADER', 'x-goog-authenticated-user-email'),
    logTimeZone: envTimeZone(env, 'LOG_TIMEZONE', DEFAULT_LOG_TIMEZONE),
    host: envString(env, 'HOST', '0.0.0.0'),
    port: Math.floor(envNumber(env, 'PORT', 7860)),
    staticRoot: envString(env, 'STATIC_ROOT', './dist'),
    devMode: envFlag(env, 'DEV_MODE', false),
  };
}
