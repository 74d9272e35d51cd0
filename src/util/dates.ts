/**
 * Calendar-date helpers. Dates travel through the app as "YYYY-MM-DD"
 * strings; only these helpers turn them into numbers.
 */

const ISO_DATE = /^(\d{4})-(\d{2})-(\d{2})$/;
const MS_PER_DAY = 86_400_000;

function parts(iso: string): [number, number, number] | null {
  const match = iso.match(ISO_DATE);
  if (!match) return null;
  const year = parseInt(match[1], 10);
  const month = parseInt(match[2], 10);
  const day = parseInt(match[3], 10);

  // Reject 2024-02-30 and friends: the UTC date must round-trip
  const probe = new Date(Date.UTC(year, month - 1, day));
  if (
    probe.getUTCFullYear() !== year ||
    probe.getUTCMonth() !== month - 1 ||
    probe.getUTCDate() !== day
  ) {
    return null;
  }
  return [year, month, day];
}

export function isIsoDate(value: string): boolean {
  return parts(value) !== null;
}

function requireParts(iso: string): [number, number, number] {
  const p = parts(iso);
  if (!p) throw new Error(`Invalid date: ${iso}. Use format YYYY-MM-DD`);
  return p;
}

/** Local calendar date of `now` as "YYYY-MM-DD". */
export function toIsoDate(now: Date = new Date()): string {
  const y = now.getFullYear();
  const m = String(now.getMonth() + 1).padStart(2, "0");
  const d = String(now.getDate()).padStart(2, "0");
  return `${y}-${m}-${d}`;
}

/** "2024-01-09" → "09.01.2024" */
export function formatDate(iso: string): string {
  const [y, m, d] = requireParts(iso);
  return `${String(d).padStart(2, "0")}.${String(m).padStart(2, "0")}.${y}`;
}

/** "2024-01-09" → "20240109" */
export function compactDate(iso: string): string {
  const [y, m, d] = requireParts(iso);
  return `${y}${String(m).padStart(2, "0")}${String(d).padStart(2, "0")}`;
}

/** Whole days from `from` to `to`; negative when `to` is earlier. */
export function daysBetween(from: string, to: string): number {
  const [fy, fm, fd] = requireParts(from);
  const [ty, tm, td] = requireParts(to);
  return Math.round((Date.UTC(ty, tm - 1, td) - Date.UTC(fy, fm - 1, fd)) / MS_PER_DAY);
}
