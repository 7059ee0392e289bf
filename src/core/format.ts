/**
 * Text formatting helpers shared by read models and screens
 *
 * @module format
 */

/**
 * Render an ISO timestamp as `YYYY-MM-DD HH:MM:SS` (UTC).
 * Returns null when the value cannot be parsed.
 */
export function formatTimestamp(value: string | null | undefined): string | null {
  if (!value) return null;

  const date = new Date(value);
  if (Number.isNaN(date.getTime())) return null;

  const pad = (n: number): string => String(n).padStart(2, '0');
  const day = `${date.getUTCFullYear()}-${pad(date.getUTCMonth() + 1)}-${pad(date.getUTCDate())}`;
  const time = `${pad(date.getUTCHours())}:${pad(date.getUTCMinutes())}:${pad(date.getUTCSeconds())}`;
  return `${day} ${time}`;
}

/**
 * Cut text to `maxLength` characters, appending an ellipsis when shortened
 */
export function preview(text: string, maxLength: number): string {
  if (text.length <= maxLength) return text;
  return text.substring(0, maxLength) + '...';
}

/**
 * Hide all but the edges of an API key
 */
export function maskApiKey(apiKey: string | null): string {
  if (!apiKey) return 'not set';
  if (apiKey.length <= 8) return '*'.repeat(apiKey.length);
  return `${apiKey.slice(0, 4)}…${apiKey.slice(-4)}`;
}

/**
 * Render an arbitrary JSON value on one line
 */
export function inlineValue(value: unknown): string {
  if (value === null || value === undefined) return 'None';
  if (typeof value === 'object') {
    return JSON.stringify(value);
  }
  return String(value);
}
