// request_context.ts - Per-request user identity and log timestamp

export const UNKNOWN_USER = 'unknown';

/**
 * The identity proxy sends e.g. `accounts.google.com:alice@example.com`;
 * the user name is the local part of the address.
 */
export function resolveUserName(headers: Headers, headerName: string): string {
  const raw = headers.get(headerName)?.trim();
  if (!raw) return UNKNOWN_USER;

  const colonIndex = raw.indexOf(':');
  const email = colonIndex >= 0 ? raw.slice(colonIndex + 1) : raw;
  const localPart = email.split('@')[0]?.trim() ?? '';
  const safe = localPart.replace(/[^A-Za-z0-9._+-]/g, '_');
  return safe || UNKNOWN_USER;
}

/**
 * `YYYYMMDD-HHmmss` in the given IANA time zone.
 */
export function formatLogTimestamp(date: Date, timeZone: string): string {
  const parts = new Intl.DateTimeFormat('en-US', {
    timeZone,
    year: 'numeric',
    month: '2-digit',
    day: '2-digit',
    hour: '2-digit',
    minute: '2-digit',
    second: '2-digit',
    hourCycle: 'h23',
  }).formatToParts(date);

  const part = (type: Intl.DateTimeFormatPartTypes) =>
    parts.find((p) => p.type === type)?.value ?? '00';

  return `${part('year')}${part('month')}${part('day')}-${part('hour')}${part('minute')}${part('second')}`;
}
