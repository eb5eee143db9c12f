export function parseDateToIso(value: string): string {
  if (!value) {
    return '';
  }
  const date = new Date(value);
  if (Number.isNaN(date.getTime())) {
    return '';
  }
  return date.toISOString();
}

export function isWithinLookback(
  iso: string,
  lookbackHours: number,
  now: Date,
): boolean {
  if (!iso) {
    return false;
  }
  const parsed = new Date(iso).getTime();
  if (Number.isNaN(parsed)) {
    return false;
  }
  return parsed >= now.getTime() - lookbackHours * 60 * 60 * 1000;
}

export function formatReportTimestamp(date: Date): string {
  const y = date.getUTCFullYear();
  const m = String(date.getUTCMonth() + 1).padStart(2, '0');
  const d = String(date.getUTCDate()).padStart(2, '0');
  const hh = String(date.getUTCHours()).padStart(2, '0');
  const mm = String(date.getUTCMinutes()).padStart(2, '0');
  const ss = String(date.getUTCSeconds()).padStart(2, '0');
  return `${y}${m}${d}_${hh}${mm}${ss}`;
}
