/**
 * Parse a human-readable duration into milliseconds.
 *
 * Supported formats:
 *   "1500"    → 1500
 *   "500ms"   → 500
 *   "30s"     → 30 * 1000
 *   "2m"      → 2 * 60 * 1000
 *   "1h30m"   → (60 + 30) * 60 * 1000
 *   "1m30s"   → 90 * 1000
 *
 * Zero is allowed ("0", "0s"): several pauses can be switched off.
 */
export function parseDuration(input: string | number): number {
  if (typeof input === 'number') {
    if (!Number.isInteger(input) || input < 0) {
      throw new Error(`Invalid duration: ${input} is not a non-negative integer`);
    }
    return input;
  }

  const text = input.trim();
  if (text.length === 0) {
    throw new Error('Invalid duration: empty string');
  }

  if (/^\d+$/.test(text)) {
    return parseInt(text, 10);
  }

  const pattern = /^(?:(\d+)h)?(?:(\d+)m(?!s))?(?:(\d+)s)?(?:(\d+)ms)?$/;
  const match = pattern.exec(text);

  if (!match || match.slice(1).every((part) => part === undefined)) {
    throw new Error(`Invalid duration format: "${input}". Expected format like "500ms", "30s", "2m", "1h30m"`);
  }

  const [hours, minutes, seconds, millis] = match.slice(1).map((part) => (part ? parseInt(part, 10) : 0));

  return ((hours ?? 0) * 3600 + (minutes ?? 0) * 60 + (seconds ?? 0)) * 1000 + (millis ?? 0);
}

/** Format milliseconds as seconds with one decimal, e.g. 12345 → "12.3s". */
export function formatSeconds(ms: number): string {
  return `${(ms / 1000).toFixed(1)}s`;
}
