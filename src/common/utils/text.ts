export const normalizeText = (value: unknown): string | null => {
  if (typeof value === 'string') {
    const trimmed = value.trim();
    return trimmed.length > 0 ? trimmed : null;
  }

  if (typeof value === 'number') {
    return value.toString();
  }

  return null;
};

/** Ledger matching key for an item description. */
export const normalizeItemKey = (description: string | null | undefined): string =>
  (description ?? '').trim().toLowerCase();

export const nowIso = (): string => new Date().toISOString();
