export type LengthUnit = 'cm' | 'mm' | 'm';

export type ParsedDimension = {
  /** Centimetres, rounded to 2dp. */
  value: number | null;
  unit: LengthUnit;
  wasConverted: boolean;
  reason?: 'INVALID_FORMAT' | 'NON_POSITIVE';
};

/**
 * Numeric token as it may appear in a lot description: "162", "12,5", "12.5".
 * A comma must be directly followed by a digit; "12, 5" is two numbers.
 * That case is indistinguishable from grouping and is left for manual correction.
 */
export const DIMENSION_NUMBER_SOURCE = '\\d+(?:[.,]\\d+)?';

const DIMENSION_NUMBER_RE = new RegExp(`^${DIMENSION_NUMBER_SOURCE}$`);

const TO_CM: Record<LengthUnit, number> = {
  cm: 1,
  mm: 0.1,
  m: 100,
};

function roundTo(n: number, dp: number): number {
  const p = Math.pow(10, dp);
  return Math.round(n * p) / p;
}

export function normalizeUnit(raw: string | null | undefined): LengthUnit {
  const u = (raw ?? '').trim().toLowerCase();
  if (u === 'mm') return 'mm';
  if (u === 'm') return 'm';
  return 'cm';
}

/**
 * parseDimensionNumber
 *
 * - Decimal comma or dot, no thousands grouping.
 * - Returns the value in centimetres; unit defaults to cm when absent.
 */
export function parseDimensionNumber(input: string, unitRaw?: string | null): ParsedDimension {
  const unit = normalizeUnit(unitRaw);
  const cleaned = String(input ?? '').trim();

  if (!DIMENSION_NUMBER_RE.test(cleaned)) {
    return { value: null, unit, wasConverted: false, reason: 'INVALID_FORMAT' };
  }

  const n = Number(cleaned.replace(',', '.'));
  if (!Number.isFinite(n)) {
    return { value: null, unit, wasConverted: false, reason: 'INVALID_FORMAT' };
  }
  if (n <= 0) {
    return { value: null, unit, wasConverted: false, reason: 'NON_POSITIVE' };
  }

  return {
    value: roundTo(n * TO_CM[unit], 2),
    unit,
    wasConverted: unit !== 'cm',
  };
}

export function formatCm(n: number): string {
  return String(roundTo(n, 2));
}
