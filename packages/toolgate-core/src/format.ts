const KIB = 1024;
const MIB = 1024 * 1024;

export function groupDigits(n: number): string {
  return String(Math.trunc(n)).replace(/\B(?=(\d{3})+(?!\d))/g, ',');
}

/**
 * Human-readable byte count, e.g. `1,048,577 bytes (1.0 MB)`.
 */
export function formatBytes(bytes: number): string {
  const exact = `${groupDigits(bytes)} bytes`;
  if (bytes >= MIB) {
    return `${exact} (${(bytes / MIB).toFixed(1)} MB)`;
  }
  if (bytes >= KIB) {
    return `${exact} (${(bytes / KIB).toFixed(1)} KB)`;
  }
  return exact;
}

/** Clip a string for single-line audit messages. */
export function clip(text: string, max = 200): string {
  return text.length > max ? text.slice(0, max) : text;
}
