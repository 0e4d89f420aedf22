// ── Timestamps ───────────────────────────────────────────────

/** `YYYYMMDD_HHMMSS` in local time. */
export function timestamp(date: Date = new Date()): string {
  const pad = (n: number): string => String(n).padStart(2, '0');
  return (
    `${String(date.getFullYear())}${pad(date.getMonth() + 1)}${pad(date.getDate())}` +
    `_${pad(date.getHours())}${pad(date.getMinutes())}${pad(date.getSeconds())}`
  );
}

// ── File names ───────────────────────────────────────────────

/**
 * Reduce an arbitrary label (a CSS selector, an XPath, a test title)
 * to something safe as a file name on every platform.
 */
export function toFileName(label: string): string {
  const cleaned = label
    .replace(/[^A-Za-z0-9._-]+/g, '_')
    .replace(/_+/g, '_')
    .replace(/^_|_$/g, '');
  return cleaned.length > 0 ? cleaned.slice(0, 120) : 'unnamed';
}
