import Decimal from 'decimal.js';

/** Trims and turns a decimal comma into a point; non-inputs become ''. */
export function normalizeDecimal(v: unknown): string {
  if (typeof v === 'number') return Number.isFinite(v) ? String(v) : '';
  if (typeof v === 'string') return v.trim().replace(',', '.');
  return '';
}

export function parseDecimal(value: unknown): Decimal | null {
  const s = normalizeDecimal(value);
  if (!s) return null;
  try {
    const d = new Decimal(s);
    return d.isFinite() ? d : null;
  } catch {
    return null;
  }
}
