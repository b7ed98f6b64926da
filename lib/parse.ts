// Narrowing helpers for provider payloads, which arrive as untyped JSON.

export function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === 'object' && value !== null && !Array.isArray(value);
}

export function readNumber(value: unknown): number | null {
  if (typeof value === 'number') return Number.isFinite(value) ? value : null;
  if (typeof value === 'string' && value.trim() !== '') {
    const parsed = Number(value);
    return Number.isFinite(parsed) ? parsed : null;
  }
  return null;
}

export function readString(value: unknown): string | null {
  if (typeof value !== 'string') return null;
  const trimmed = value.trim();
  return trimmed ? trimmed : null;
}

export function readPath(source: unknown, ...path: string[]): unknown {
  let current = source;
  for (const key of path) {
    if (!isRecord(current)) return undefined;
    current = current[key];
  }
  return current;
}

/**
 * Parses display money strings: "$1,234,567" → 1234567, "($0.12)" and
 * "$-0.12" → -0.12, "N/A" and "" → null.
 */
export function parseMoney(value: unknown): number | null {
  if (typeof value === 'number') return Number.isFinite(value) ? value : null;
  if (typeof value !== 'string') return null;
  const trimmed = value.trim();
  if (!trimmed) return null;
  const negative = /^\(.*\)$/u.test(trimmed) || /^[^\d]*-/u.test(trimmed);
  const digits = trimmed.replace(/[()$,\s-]/gu, '');
  if (!/^\d+(\.\d+)?$/u.test(digits)) return null;
  const parsed = Number(digits);
  return negative ? -parsed : parsed;
}
