export const roundMoney = (value: number): number =>
  Math.round((value + Number.EPSILON) * 100) / 100;

/**
 * Coerces extracted values such as `"$1,234.50"`, `"12,5"` or `7` to a number.
 * A comma is read as the decimal separator only when no dot is present.
 */
export const normalizeNumber = (value: unknown): number | null => {
  if (value === null || value === undefined) {
    return null;
  }

  if (typeof value === 'number') {
    return Number.isFinite(value) ? value : null;
  }

  if (typeof value === 'string') {
    let cleaned = value.replace(/[^0-9.,-]/g, '');
    cleaned = cleaned.includes('.') ? cleaned.replace(/,/g, '') : cleaned.replace(',', '.');
    if (cleaned.length === 0) {
      return null;
    }
    const parsed = Number.parseFloat(cleaned);
    return Number.isFinite(parsed) ? parsed : null;
  }

  return null;
};
