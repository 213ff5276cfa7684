/**
 * Numeric environment setting; unset, blank or non-numeric values fall back.
 */
export function envNumber(raw: string | undefined, fallback: number): number {
  if (raw === undefined || raw.trim() === '') return fallback;
  const value = Number(raw);
  return Number.isFinite(value) ? value : fallback;
}
