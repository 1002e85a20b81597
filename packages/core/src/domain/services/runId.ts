const MAX_IDENTITY_CHARS = 50;

/** Reduce an identity to a lowercase, hyphenated, filesystem-safe token. */
export function sanitizeIdentity(identity: string): string {
  return identity
    .replace(/[^\p{L}\p{N}_\s-]/gu, '')
    .replace(/[\s_]+/g, '-')
    .replace(/^-+|-+$/g, '')
    .slice(0, MAX_IDENTITY_CHARS)
    .toLowerCase();
}

function pad(n: number, width = 2): string {
  return String(n).padStart(width, '0');
}

/** `YYYYMMDD_HHMMSS` in local time. */
export function formatBatchTimestamp(date: Date): string {
  return (
    `${String(date.getFullYear())}${pad(date.getMonth() + 1)}${pad(date.getDate())}_` +
    `${pad(date.getHours())}${pad(date.getMinutes())}${pad(date.getSeconds())}`
  );
}

/** `YYYYMMDD` in local time. */
export function formatDay(date: Date): string {
  return `${String(date.getFullYear())}${pad(date.getMonth() + 1)}${pad(date.getDate())}`;
}

/** `YYYY-MM-DD HH:MM:SS` in local time. */
export function formatLogTime(date: Date): string {
  return (
    `${String(date.getFullYear())}-${pad(date.getMonth() + 1)}-${pad(date.getDate())} ` +
    `${pad(date.getHours())}:${pad(date.getMinutes())}:${pad(date.getSeconds())}`
  );
}

/**
 * Build a run id from the batch start time, the item's position and its identity.
 *
 * Unique within a batch as long as positions are: `20260101_120000_007_acme-co`.
 */
export function makeRunId(batchTimestamp: string, index: number, identity: string): string {
  return `${batchTimestamp}_${pad(index, 3)}_${sanitizeIdentity(identity)}`;
}
